import type { PackageIdentifier, PackageInfo } from '../config/schema.js';
import type { SearchQuery, UpdateQuery } from '../sources/types.js';
import type { SourceResolver } from './resolver.js';

export const DEFAULT_SEARCH: SearchQuery = {
  term: '',
  includePrerelease: false,
  take: 15,
  skip: 0,
};

export const DEFAULT_UPDATE_QUERY: UpdateQuery = {
  includePrerelease: false,
  targetFrameworks: '',
  versionConstraints: '',
};

/**
 * Entry point for package queries. Each call goes to whatever source the
 * resolver currently designates, resolving it on first use. Nothing here
 * retries, times out or rewraps errors; the abort signal reaches the source untouched.
 */
export class PackageQueries {
  constructor(private readonly resolver: SourceResolver) {}

  /** Search across the active source(s). An empty term lists everything. */
  async search(query: Partial<SearchQuery> = {}, signal?: AbortSignal): Promise<PackageInfo[]> {
    return this.resolver.active().search({ ...DEFAULT_SEARCH, ...query }, signal);
  }

  /** Newer versions available for the given installed packages. */
  async getUpdates(installed: PackageIdentifier[], query: Partial<UpdateQuery> = {}): Promise<PackageInfo[]> {
    return this.resolver.active().getUpdates(installed, { ...DEFAULT_UPDATE_QUERY, ...query });
  }

  /** Exact id + version lookup; null when no source has it. */
  async getSpecificPackage(identifier: PackageIdentifier): Promise<PackageInfo | null> {
    return this.resolver.active().getSpecificPackage(identifier);
  }
}
