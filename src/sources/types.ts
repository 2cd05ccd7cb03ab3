import type { PackageIdentifier, PackageInfo } from '../config/schema.js';

export interface SearchQuery {
  /** Substring of the package id. Empty matches everything. */
  term: string;
  includePrerelease: boolean;
  take: number;
  skip: number;
}

export interface UpdateQuery {
  includePrerelease: boolean;
  /** Comma or semicolon separated framework names. Empty means any. */
  targetFrameworks: string;
  /** Semver range candidate versions must satisfy. Empty means any. */
  versionConstraints: string;
}

/** A queryable package repository. */
export interface PackageSource {
  readonly name: string;
  search(query: SearchQuery, signal?: AbortSignal): Promise<PackageInfo[]>;
  getUpdates(installed: PackageIdentifier[], query: UpdateQuery): Promise<PackageInfo[]>;
  getSpecificPackage(identifier: PackageIdentifier): Promise<PackageInfo | null>;
}
