import fs from 'fs';
import { SourceDescriptor } from '../models/SourceDescriptor';
import { ResolvedFirmware, unresolvedFirmware } from '../models/Firmware';
import { UnknownSourceError, errorMessage } from '../utils/errors';

export interface FirmwareResolver {
  resolve(descriptor: SourceDescriptor, cacheDir: string): Promise<ResolvedFirmware>;
  inspect(descriptor: SourceDescriptor, cacheDir: string): Promise<ResolvedFirmware | null>;
}

export interface RefreshOutcome {
  name: string;
  firmware: ResolvedFirmware;
  error?: string;
}

interface CatalogEntry {
  descriptor: SourceDescriptor;
  firmware: ResolvedFirmware;
}

/**
 * In-memory view of every declared source. Entries are created once and
 * only ever updated; a failed resolution keeps the previous artifact.
 */
export class FirmwareCatalog {
  private entries = new Map<string, CatalogEntry>();
  private inFlight = new Map<string, Promise<RefreshOutcome>>();
  private resolver: FirmwareResolver;
  private fetchDir: string;

  constructor(descriptors: SourceDescriptor[], resolver: FirmwareResolver, fetchDir: string) {
    this.resolver = resolver;
    this.fetchDir = fetchDir;
    for (const descriptor of descriptors) {
      this.entries.set(descriptor.name, { descriptor, firmware: unresolvedFirmware(descriptor) });
    }
  }

  /** Rebuilds the view from the cache directory without touching the network. */
  async initialize(): Promise<void> {
    await Promise.all(Array.from(this.entries.values()).map(async (entry) => {
      try {
        const found = await this.resolver.inspect(entry.descriptor, this.fetchDir);
        if (found) {
          entry.firmware = found;
        }
      } catch (err) {
        console.warn(`Catalog: startup scan of ${entry.descriptor.name} failed: ${errorMessage(err)}`);
      }
    }));
    const available = this.list().filter((firmware) => firmware.available).length;
    console.log(`Catalog: ${available} of ${this.entries.size} firmware sources available locally`);
  }

  list(): ResolvedFirmware[] {
    return Array.from(this.entries.values()).map((entry) => snapshot(entry.firmware));
  }

  get(name: string): ResolvedFirmware | undefined {
    const entry = this.entries.get(name);
    return entry ? snapshot(entry.firmware) : undefined;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  isResolving(name: string): boolean {
    return this.inFlight.has(name);
  }

  /**
   * Starts resolution in the background and returns the current snapshot.
   * Throws UnknownSourceError for an undeclared name.
   */
  refresh(name?: string): ResolvedFirmware[] {
    if (name !== undefined) {
      if (!this.entries.has(name)) throw new UnknownSourceError(name);
      void this.resolve(name);
    } else {
      void this.resolveAll();
    }
    return this.list();
  }

  /**
   * Resolves one source. Concurrent calls for the same name share a single
   * resolution. Only rejects for an undeclared name.
   */
  resolve(name: string): Promise<RefreshOutcome> {
    const entry = this.entries.get(name);
    if (!entry) return Promise.reject(new UnknownSourceError(name));

    const pending = this.inFlight.get(name);
    if (pending) return pending;

    const run = this.runResolution(entry).finally(() => {
      this.inFlight.delete(name);
    });
    this.inFlight.set(name, run);
    return run;
  }

  async resolveAll(onOutcome?: (outcome: RefreshOutcome) => void): Promise<RefreshOutcome[]> {
    return Promise.all(Array.from(this.entries.keys()).map(async (name) => {
      const outcome = await this.resolve(name);
      onOutcome?.(outcome);
      return outcome;
    }));
  }

  private async runResolution(entry: CatalogEntry): Promise<RefreshOutcome> {
    const name = entry.descriptor.name;
    try {
      const firmware = await this.resolver.resolve(entry.descriptor, this.fetchDir);
      entry.firmware = { ...firmware, last_error: null };
      return { name, firmware: snapshot(entry.firmware) };
    } catch (err) {
      const message = errorMessage(err);
      console.warn(`Catalog: resolution of ${name} failed: ${message}`);
      entry.firmware = { ...entry.firmware, last_error: message };
      return { name, firmware: snapshot(entry.firmware), error: message };
    }
  }
}

function snapshot(firmware: ResolvedFirmware): ResolvedFirmware {
  const onDisk = firmware.local_artifact_path !== null && fs.existsSync(firmware.local_artifact_path);
  return { ...firmware, available: firmware.available && onDisk };
}
