import * as semver from 'semver';
import { formatPackage } from '../config/schema.js';
import type { PackageIdentifier, PackageInfo } from '../config/schema.js';
import type { PackageSource, SearchQuery, UpdateQuery } from './types.js';

export const COMPOSITE_SOURCE_NAME = 'combined';

/**
 * Fans each query out over an ordered list of sources and merges the answers.
 * Members are queried one after another in order; a member's error propagates as is.
 */
export class CompositeSource implements PackageSource {
  readonly sources: readonly PackageSource[];

  constructor(
    sources: PackageSource[],
    readonly name: string = COMPOSITE_SOURCE_NAME,
  ) {
    this.sources = [...sources];
  }

  /** Concatenated member results; the first occurrence of an id@version wins. */
  async search(query: SearchQuery, signal?: AbortSignal): Promise<PackageInfo[]> {
    const seen = new Set<string>();
    const merged: PackageInfo[] = [];
    for (const source of this.sources) {
      for (const pkg of await source.search(query, signal)) {
        const key = formatPackage(pkg).toLowerCase();
        if (seen.has(key)) continue;
        seen.add(key);
        merged.push(pkg);
      }
    }
    return merged;
  }

  /** One update per package id: the highest version any member offers. */
  async getUpdates(installed: PackageIdentifier[], query: UpdateQuery): Promise<PackageInfo[]> {
    const best = new Map<string, PackageInfo>();
    for (const source of this.sources) {
      for (const pkg of await source.getUpdates(installed, query)) {
        const key = pkg.id.toLowerCase();
        const current = best.get(key);
        if (!current || semver.gt(pkg.version, current.version)) best.set(key, pkg);
      }
    }
    return [...best.values()];
  }

  async getSpecificPackage(identifier: PackageIdentifier): Promise<PackageInfo | null> {
    for (const source of this.sources) {
      const pkg = await source.getSpecificPackage(identifier);
      if (pkg) return pkg;
    }
    return null;
  }
}
