import { z } from 'zod';
import { PackageManifestSchema } from '../config/schema.js';
import type { PackageIdentifier, PackageInfo, SourceCredentials } from '../config/schema.js';
import { SourceRequestError } from '../utils/errors.js';
import type { PackageSource, SearchQuery, UpdateQuery } from './types.js';
import { pickUpdate } from './versions.js';

const SearchResponseSchema = z.object({ data: z.array(PackageManifestSchema) });
const VersionsResponseSchema = z.object({ versions: z.array(PackageManifestSchema) });

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpRegistrySourceOptions {
  credentials?: SourceCredentials;
  fetch?: FetchLike;
}

/**
 * Package source talking to a JSON registry:
 *   GET /search?q=&prerelease=&take=&skip=   → { data: [...] }
 *   GET /packages/:id                        → { versions: [...] }
 *   GET /packages/:id/:version               → { ... } | 404
 * Cancellation is handled by fetch itself; no retries or timeouts here.
 */
export class HttpRegistrySource implements PackageSource {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly credentials?: SourceCredentials;

  constructor(
    readonly name: string,
    baseUrl: string,
    options: HttpRegistrySourceOptions = {},
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? fetch;
    this.credentials = options.credentials;
  }

  async search(query: SearchQuery, signal?: AbortSignal): Promise<PackageInfo[]> {
    const params = new URLSearchParams({
      q: query.term,
      prerelease: String(query.includePrerelease),
      take: String(query.take),
      skip: String(query.skip),
    });
    const body = await this.getJson(`${this.baseUrl}/search?${params.toString()}`, signal);
    return SearchResponseSchema.parse(body).data.map((p) => ({ ...p, source: this.name }));
  }

  async getUpdates(installed: PackageIdentifier[], query: UpdateQuery): Promise<PackageInfo[]> {
    const updates: PackageInfo[] = [];
    for (const pkg of installed) {
      const body = await this.getJsonOrNull(`${this.baseUrl}/packages/${encodeURIComponent(pkg.id)}`);
      if (body === null) continue;
      const versions = VersionsResponseSchema.parse(body).versions.map((p) => ({ ...p, source: this.name }));
      const update = pickUpdate(versions, pkg.version, query);
      if (update) updates.push(update);
    }
    return updates;
  }

  async getSpecificPackage(identifier: PackageIdentifier): Promise<PackageInfo | null> {
    const url = `${this.baseUrl}/packages/${encodeURIComponent(identifier.id)}/${encodeURIComponent(identifier.version)}`;
    const body = await this.getJsonOrNull(url);
    if (body === null) return null;
    return { ...PackageManifestSchema.parse(body), source: this.name };
  }

  // ─── HTTP ─────────────────────────────────────────────────────────

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.credentials) {
      const token = Buffer.from(`${this.credentials.username}:${this.credentials.password}`).toString('base64');
      headers.Authorization = `Basic ${token}`;
    }
    return headers;
  }

  private async request(url: string, signal?: AbortSignal): Promise<Response> {
    return this.fetchImpl(url, { headers: this.headers(), signal });
  }

  private async getJson(url: string, signal?: AbortSignal): Promise<unknown> {
    const response = await this.request(url, signal);
    if (!response.ok) throw new SourceRequestError(url, response.status, response.statusText);
    return response.json();
  }

  /** Like getJson, but a 404 means "no such package" rather than a failure. */
  private async getJsonOrNull(url: string): Promise<unknown> {
    const response = await this.request(url);
    if (response.status === 404) return null;
    if (!response.ok) throw new SourceRequestError(url, response.status, response.statusText);
    return response.json();
  }
}
