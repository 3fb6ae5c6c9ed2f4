import path from 'path';

/**
 * Reference counts on cached artifacts that a running flash is using.
 * Cache pruning leaves leased files on disk.
 */
export class ArtifactLeases {
  private counts = new Map<string, number>();

  /** Returns the release function; calling it more than once is a no-op. */
  lease(artifactPath: string): () => void {
    const key = path.resolve(artifactPath);
    this.counts.set(key, (this.counts.get(key) ?? 0) + 1);
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const remaining = (this.counts.get(key) ?? 1) - 1;
      if (remaining <= 0) {
        this.counts.delete(key);
      } else {
        this.counts.set(key, remaining);
      }
    };
  }

  isLeased(artifactPath: string): boolean {
    return this.counts.has(path.resolve(artifactPath));
  }
}
