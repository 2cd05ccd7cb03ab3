import { readdir, readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import yaml from 'js-yaml';
import * as semver from 'semver';
import { PackageManifestSchema } from '../config/schema.js';
import type { PackageIdentifier, PackageInfo } from '../config/schema.js';
import { formatError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { PackageSource, SearchQuery, UpdateQuery } from './types.js';
import { compareNewestFirst, isPrerelease, pickUpdate } from './versions.js';

export const MANIFEST_FILENAME = 'package.yaml';

/**
 * Package source backed by a directory laid out as
 * `<root>/<id>/<version>/package.yaml`. A missing root is an empty source.
 */
export class LocalDirectorySource implements PackageSource {
  constructor(
    readonly name: string,
    readonly root: string,
    private readonly logger: Logger = silentLogger,
  ) {}

  /** Matches the term against manifest ids, not directory names. */
  async search(query: SearchQuery, signal?: AbortSignal): Promise<PackageInfo[]> {
    signal?.throwIfAborted();
    const term = query.term.trim().toLowerCase();
    const latest: PackageInfo[] = [];

    for (const dir of await this.listDirectories(this.root)) {
      signal?.throwIfAborted();
      const versions = (await this.readVersions(dir))
        .filter((p) => term.length === 0 || p.id.toLowerCase().includes(term))
        .filter((p) => query.includePrerelease || !isPrerelease(p.version))
        .sort(compareNewestFirst);
      if (versions.length > 0) latest.push(versions[0]);
    }

    latest.sort((a, b) => a.id.localeCompare(b.id));
    return latest.slice(query.skip, query.skip + query.take);
  }

  async getUpdates(installed: PackageIdentifier[], query: UpdateQuery): Promise<PackageInfo[]> {
    const updates: PackageInfo[] = [];
    for (const pkg of installed) {
      const dir = await this.findPackageDirectory(pkg.id);
      if (!dir) continue;
      const update = pickUpdate(await this.readVersions(dir), pkg.version, query);
      if (update) updates.push(update);
    }
    return updates;
  }

  async getSpecificPackage(identifier: PackageIdentifier): Promise<PackageInfo | null> {
    const dir = await this.findPackageDirectory(identifier.id);
    if (!dir) return null;
    const versions = await this.readVersions(dir);
    return versions.find((p) => semver.eq(p.version, identifier.version)) ?? null;
  }

  // ─── Directory scanning ───────────────────────────────────────────

  private async listDirectories(dir: string): Promise<string[]> {
    if (!existsSync(dir)) return [];
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((e) => e.isDirectory() && !e.name.startsWith('.'))
      .map((e) => e.name)
      .sort((a, b) => a.localeCompare(b));
  }

  /** Package ids compare case-insensitively. */
  private async findPackageDirectory(id: string): Promise<string | undefined> {
    const wanted = id.toLowerCase();
    return (await this.listDirectories(this.root)).find((d) => d.toLowerCase() === wanted);
  }

  private async readVersions(packageDir: string): Promise<PackageInfo[]> {
    const base = join(this.root, packageDir);
    const packages: PackageInfo[] = [];
    for (const versionDir of await this.listDirectories(base)) {
      const manifest = await this.readManifest(join(base, versionDir, MANIFEST_FILENAME));
      if (manifest) packages.push(manifest);
    }
    return packages;
  }

  private async readManifest(filePath: string): Promise<PackageInfo | null> {
    if (!existsSync(filePath)) return null;
    try {
      const parsed = PackageManifestSchema.parse(yaml.load(await readFile(filePath, 'utf-8')));
      return { ...parsed, source: this.name };
    } catch (err) {
      this.logger.warn(`Skipping invalid manifest ${filePath}: ${formatError(err)}`);
      return null;
    }
  }
}
