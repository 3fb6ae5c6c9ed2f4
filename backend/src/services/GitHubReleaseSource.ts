import fs from 'fs';
import { z } from 'zod';
import { NetworkError, NotFoundError, errorMessage } from '../utils/errors';

export interface ReleaseAsset {
  name: string;
  size: number;
  downloadUrl: string;
}

export interface ReleaseInfo {
  tag: string;
  draft: boolean;
  prerelease: boolean;
  assets: ReleaseAsset[];
}

/** Where remote-release descriptors look for releases, newest first. */
export interface ReleaseSource {
  listReleases(repo: string, sourceName: string): AsyncIterable<ReleaseInfo>;
  /** Streams the asset into `destination` and returns the number of bytes written. */
  download(asset: ReleaseAsset, destination: string, sourceName: string): Promise<number>;
}

export interface GitHubReleaseSourceOptions {
  token?: string;
  apiBaseUrl?: string;
  perPage?: number;
  maxPages?: number;
  timeoutMs?: number;
}

export const DEFAULT_GITHUB_API_URL = 'https://api.github.com';

const ReleaseListSchema = z.array(z.object({
  tag_name: z.string(),
  draft: z.boolean().default(false),
  prerelease: z.boolean().default(false),
  assets: z.array(z.object({
    name: z.string(),
    size: z.number().int().nonnegative(),
    browser_download_url: z.string().url(),
  })).default([]),
}));

export class GitHubReleaseSource implements ReleaseSource {
  private token?: string;
  private apiBaseUrl: string;
  private perPage: number;
  private maxPages: number;
  private timeoutMs: number;

  constructor(options: GitHubReleaseSourceOptions = {}) {
    this.token = options.token;
    this.apiBaseUrl = (options.apiBaseUrl || DEFAULT_GITHUB_API_URL).replace(/\/+$/, '');
    this.perPage = options.perPage ?? 30;
    this.maxPages = options.maxPages ?? Number.POSITIVE_INFINITY;
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  /**
   * Pages through the release list only as far as the consumer reads, until
   * a short page ends the list or `maxPages` (unbounded by default) is reached.
   */
  async *listReleases(repo: string, sourceName: string): AsyncGenerator<ReleaseInfo> {
    for (let page = 1; page <= this.maxPages; page++) {
      const url = `${this.apiBaseUrl}/repos/${repo}/releases?per_page=${this.perPage}&page=${page}`;
      const releases = await this.fetchReleasePage(url, repo, sourceName);

      for (const release of releases) {
        yield release;
      }
      if (releases.length < this.perPage) return;
    }
  }

  async download(asset: ReleaseAsset, destination: string, sourceName: string): Promise<number> {
    let response: Response;
    try {
      response = await fetch(asset.downloadUrl, {
        headers: this.headers('application/octet-stream'),
        redirect: 'follow',
      });
    } catch (err) {
      throw new NetworkError(`Download of ${asset.name} failed: ${errorMessage(err)}`, sourceName);
    }

    if (!response.ok) {
      throw new NetworkError(`Download of ${asset.name} failed: HTTP ${response.status}`, sourceName, response.status);
    }
    if (!response.body) {
      throw new NetworkError(`Download of ${asset.name} returned no body`, sourceName);
    }

    const reader = response.body.getReader();
    const handle = await fs.promises.open(destination, 'w');
    let written = 0;
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        await handle.write(value);
        written += value.length;
      }
    } catch (err) {
      throw new NetworkError(`Download of ${asset.name} interrupted: ${errorMessage(err)}`, sourceName);
    } finally {
      await handle.close();
    }
    return written;
  }

  private async fetchReleasePage(url: string, repo: string, sourceName: string): Promise<ReleaseInfo[]> {
    let response: Response;
    try {
      response = await fetch(url, {
        headers: this.headers('application/vnd.github+json'),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new NetworkError(`Failed to reach GitHub for ${repo}: ${errorMessage(err)}`, sourceName);
    }

    if (response.status === 404) {
      throw new NotFoundError(`Repository ${repo} not found`, sourceName);
    }
    if (!response.ok) {
      throw new NetworkError(`GitHub API returned HTTP ${response.status} for ${repo}`, sourceName, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new NetworkError(`Malformed release list for ${repo}: ${errorMessage(err)}`, sourceName);
    }

    const parsed = ReleaseListSchema.safeParse(body);
    if (!parsed.success) {
      throw new NetworkError(`Malformed release list for ${repo}: ${parsed.error.issues[0]?.message}`, sourceName);
    }

    return parsed.data.map((release) => ({
      tag: release.tag_name,
      draft: release.draft,
      prerelease: release.prerelease,
      assets: release.assets.map((asset) => ({
        name: asset.name,
        size: asset.size,
        downloadUrl: asset.browser_download_url,
      })),
    }));
  }

  private headers(accept: string): Record<string, string> {
    const headers: Record<string, string> = {
      'Accept': accept,
      'User-Agent': 'firmware-flash-station',
    };
    if (this.token) {
      headers['Authorization'] = `Bearer ${this.token}`;
    }
    return headers;
  }
}
