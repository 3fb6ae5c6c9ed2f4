import fs from 'fs';
import path from 'path';
import {
  BuildFromSourceDescriptor,
  LocalPathDescriptor,
  RemoteReleaseDescriptor,
  SourceDescriptor,
  compileAssetPattern,
} from '../models/SourceDescriptor';
import { ResolvedFirmware, resolvedFirmware } from '../models/Firmware';
import { BuildError, NetworkError, NotFoundError, errorMessage } from '../utils/errors';
import { isValidFilename } from '../utils/validation';
import { ArtifactLeases } from './ArtifactLeases';
import { ReleaseAsset, ReleaseInfo, ReleaseSource } from './GitHubReleaseSource';
import { ProcessLauncher, startProcess } from './ProcessRunner';

export const BUILD_TAIL_LINES = 40;
export const DEFAULT_BUILD_COMMAND = ['pio'];
const FIRMWARE_FILE = 'firmware.bin';

export interface FetchResolverDeps {
  releases: ReleaseSource;
  launcher: ProcessLauncher;
  buildCommand?: string[];
  leases?: ArtifactLeases;
}

interface Artifact {
  path: string;
  size: number;
  mtime: Date;
}

// `<encoded tag>@<asset>`: the tag is percent-encoded, so the first '@' separates the two
function cacheFileName(revision: string, assetName: string): string {
  return `${encodeURIComponent(revision)}@${assetName}`;
}

function parseCacheFileName(entry: string): { revision: string; assetName: string } | null {
  const separator = entry.indexOf('@');
  if (separator <= 0 || entry.endsWith('.part')) return null;
  try {
    return { revision: decodeURIComponent(entry.slice(0, separator)), assetName: entry.slice(separator + 1) };
  } catch {
    return null;
  }
}

function statFile(filePath: string): fs.Stats | null {
  try {
    const stats = fs.statSync(filePath);
    return stats.isFile() ? stats : null;
  } catch {
    return null;
  }
}

function readTrimmed(filePath: string): string | null {
  const stats = statFile(filePath);
  if (!stats) return null;
  const text = fs.readFileSync(filePath, 'utf-8').trim();
  return text.length > 0 ? text : null;
}

/** `<file>.version`, then VERSION beside it, then the modification time. */
export function artifactVersion(artifactPath: string, mtime: Date): string {
  return readTrimmed(`${artifactPath}.version`)
    ?? readTrimmed(path.join(path.dirname(artifactPath), 'VERSION'))
    ?? mtime.toISOString();
}

function newestBinary(directory: string): Artifact | null {
  let newest: Artifact | null = null;
  for (const entry of fs.readdirSync(directory)) {
    if (!entry.endsWith('.bin')) continue;
    const filePath = path.join(directory, entry);
    const stats = statFile(filePath);
    if (!stats) continue;
    if (!newest || stats.mtimeMs > newest.mtime.getTime()) {
      newest = { path: filePath, size: stats.size, mtime: stats.mtime };
    }
  }
  return newest;
}

export class FetchResolver {
  private releases: ReleaseSource;
  private launcher: ProcessLauncher;
  private buildCommand: string[];
  private leases: ArtifactLeases;

  constructor(deps: FetchResolverDeps) {
    this.releases = deps.releases;
    this.launcher = deps.launcher;
    this.leases = deps.leases ?? new ArtifactLeases();
    this.buildCommand = deps.buildCommand && deps.buildCommand.length > 0 ? deps.buildCommand : DEFAULT_BUILD_COMMAND;
  }

  async resolve(descriptor: SourceDescriptor, cacheDir: string): Promise<ResolvedFirmware> {
    switch (descriptor.kind) {
      case 'remote-release':
        return this.resolveRemote(descriptor, cacheDir);
      case 'local-path':
        return this.resolveLocal(descriptor);
      case 'build-from-source':
        return this.resolveBuild(descriptor);
    }
  }

  /** Looks only at the local filesystem; used to rebuild the catalog at startup. */
  async inspect(descriptor: SourceDescriptor, cacheDir: string): Promise<ResolvedFirmware | null> {
    switch (descriptor.kind) {
      case 'remote-release':
        return this.inspectCache(descriptor, cacheDir);
      case 'local-path': {
        const artifact = this.findLocalArtifact(descriptor);
        return artifact ? resolvedFirmware(descriptor, artifactVersion(artifact.path, artifact.mtime), artifact.path, artifact.size) : null;
      }
      case 'build-from-source': {
        const artifact = this.findBuildArtifact(descriptor);
        return artifact ? resolvedFirmware(descriptor, artifactVersion(artifact.path, artifact.mtime), artifact.path, artifact.size) : null;
      }
    }
  }

  private async resolveRemote(descriptor: RemoteReleaseDescriptor, cacheDir: string): Promise<ResolvedFirmware> {
    const match = await this.findRelease(descriptor);
    if (!match) {
      throw new NotFoundError(
        `No release of ${descriptor.repo} has an asset matching ${descriptor.asset}`,
        descriptor.name,
      );
    }

    const { release, asset } = match;
    const sourceDir = path.join(cacheDir, descriptor.name);
    const fileName = cacheFileName(release.tag, asset.name);
    const target = path.join(sourceDir, fileName);

    const cached = statFile(target);
    if (!cached || cached.size !== asset.size) {
      await fs.promises.mkdir(sourceDir, { recursive: true });
      const partial = `${target}.part`;
      try {
        const written = await this.releases.download(asset, partial, descriptor.name);
        if (written !== asset.size) {
          throw new NetworkError(
            `Download of ${asset.name} is incomplete (${written} of ${asset.size} bytes)`,
            descriptor.name,
          );
        }
        await fs.promises.rename(partial, target);
      } catch (err) {
        await fs.promises.rm(partial, { force: true });
        throw err;
      }
      console.log(`FetchResolver: downloaded ${descriptor.name} ${release.tag} (${asset.name}, ${asset.size} bytes)`);
    }

    await this.pruneCache(sourceDir, fileName);
    return resolvedFirmware(descriptor, release.tag, target, asset.size);
  }

  /** Newest release first; within a release, the first listed asset wins. */
  private async findRelease(descriptor: RemoteReleaseDescriptor): Promise<{ release: ReleaseInfo; asset: ReleaseAsset } | null> {
    for await (const release of this.releases.listReleases(descriptor.repo, descriptor.name)) {
      if (release.draft) continue;
      if (release.prerelease && !descriptor.prerelease) continue;

      const pattern = compileAssetPattern(descriptor.asset, release.tag);
      const asset = release.assets.find((candidate) => isValidFilename(candidate.name) && pattern.test(candidate.name));
      if (asset) return { release, asset };
    }
    return null;
  }

  /** Removes older revisions, except files a running flash still holds. */
  private async pruneCache(sourceDir: string, keep: string): Promise<void> {
    for (const entry of await fs.promises.readdir(sourceDir)) {
      if (entry === keep) continue;
      const entryPath = path.join(sourceDir, entry);
      if (this.leases.isLeased(entryPath)) {
        console.log(`FetchResolver: keeping ${entry} while it is being flashed`);
        continue;
      }
      try {
        await fs.promises.rm(entryPath, { force: true, recursive: true });
      } catch (err) {
        console.warn(`FetchResolver: could not remove stale ${entry}: ${errorMessage(err)}`);
      }
    }
  }

  private inspectCache(descriptor: RemoteReleaseDescriptor, cacheDir: string): ResolvedFirmware | null {
    const sourceDir = path.join(cacheDir, descriptor.name);
    if (!fs.existsSync(sourceDir)) return null;

    let best: { revision: string; path: string; stats: fs.Stats } | null = null;
    for (const entry of fs.readdirSync(sourceDir)) {
      const parsed = parseCacheFileName(entry);
      if (!parsed) continue;
      const { revision, assetName } = parsed;
      if (!compileAssetPattern(descriptor.asset, revision).test(assetName)) continue;

      const filePath = path.join(sourceDir, entry);
      const stats = statFile(filePath);
      if (!stats) continue;
      if (!best || stats.mtimeMs > best.stats.mtimeMs) {
        best = { revision, path: filePath, stats };
      }
    }
    return best ? resolvedFirmware(descriptor, best.revision, best.path, best.stats.size) : null;
  }

  private resolveLocal(descriptor: LocalPathDescriptor): ResolvedFirmware {
    const artifact = this.findLocalArtifact(descriptor);
    if (!artifact) {
      throw new NotFoundError(`No firmware binary at ${descriptor.path}`, descriptor.name);
    }
    return resolvedFirmware(descriptor, artifactVersion(artifact.path, artifact.mtime), artifact.path, artifact.size);
  }

  private findLocalArtifact(descriptor: LocalPathDescriptor): Artifact | null {
    let stats: fs.Stats;
    try {
      stats = fs.statSync(descriptor.path);
    } catch {
      return null;
    }
    if (stats.isDirectory()) return newestBinary(descriptor.path);
    return stats.isFile() ? { path: descriptor.path, size: stats.size, mtime: stats.mtime } : null;
  }

  private async resolveBuild(descriptor: BuildFromSourceDescriptor): Promise<ResolvedFirmware> {
    const [command, ...prefix] = this.buildCommand;
    const args = [...prefix, 'run', '-d', descriptor.project];
    if (descriptor.environment) {
      args.push('-e', descriptor.environment);
    }

    console.log(`FetchResolver: building ${descriptor.name}: ${command} ${args.join(' ')}`);
    const running = startProcess(this.launcher, command, args);
    const tail: string[] = [];
    for await (const line of running.output) {
      if (line.kind === 'partial') continue;
      tail.push(line.text);
      if (tail.length > BUILD_TAIL_LINES) tail.shift();
    }
    const exit = await running.exited;

    if (exit.error) {
      throw new BuildError(`Build of ${descriptor.name} could not start: ${exit.error.message}`, descriptor.name, tail);
    }
    if (exit.code !== 0) {
      const reason = exit.code === null ? `signal ${exit.signal}` : `code ${exit.code}`;
      throw new BuildError(`Build of ${descriptor.name} failed with ${reason}`, descriptor.name, tail);
    }

    const artifact = this.findBuildArtifact(descriptor);
    if (!artifact) {
      throw new BuildError(`Build of ${descriptor.name} produced no firmware binary`, descriptor.name, tail);
    }
    return resolvedFirmware(descriptor, artifactVersion(artifact.path, artifact.mtime), artifact.path, artifact.size);
  }

  private findBuildArtifact(descriptor: BuildFromSourceDescriptor): Artifact | null {
    const candidates: string[] = [];
    if (descriptor.artifact) {
      candidates.push(path.resolve(descriptor.project, descriptor.artifact));
    } else if (descriptor.environment) {
      candidates.push(path.join(descriptor.project, '.pio', 'build', descriptor.environment, FIRMWARE_FILE));
    } else {
      const buildDir = path.join(descriptor.project, '.pio', 'build');
      if (fs.existsSync(buildDir)) {
        for (const env of fs.readdirSync(buildDir).sort()) {
          candidates.push(path.join(buildDir, env, FIRMWARE_FILE));
        }
      }
    }

    for (const candidate of candidates) {
      const stats = statFile(candidate);
      if (stats) return { path: candidate, size: stats.size, mtime: stats.mtime };
    }
    return null;
  }
}
