import * as semver from 'semver';
import type { PackageInfo } from '../config/schema.js';
import type { UpdateQuery } from './types.js';

export function isPrerelease(version: string): boolean {
  return semver.prerelease(version) !== null;
}

/** Newest first. */
export function compareNewestFirst(a: PackageInfo, b: PackageInfo): number {
  return semver.rcompare(a.version, b.version);
}

function splitFrameworks(value: string): string[] {
  return value
    .split(/[,;]/)
    .map((f) => f.trim().toLowerCase())
    .filter((f) => f.length > 0);
}

/**
 * Whether `candidate` is an acceptable update for an installed `current` version.
 * Packages that declare no frameworks are treated as framework-neutral.
 */
export function isUpdateCandidate(candidate: PackageInfo, current: string, query: UpdateQuery): boolean {
  if (!semver.gt(candidate.version, current)) return false;
  if (!query.includePrerelease && isPrerelease(candidate.version)) return false;

  const range = query.versionConstraints.trim();
  if (range.length > 0 && !semver.satisfies(candidate.version, range, { includePrerelease: query.includePrerelease })) {
    return false;
  }

  const wanted = splitFrameworks(query.targetFrameworks);
  if (wanted.length > 0 && candidate.frameworks.length > 0) {
    const offered = new Set(candidate.frameworks.map((f) => f.toLowerCase()));
    if (!wanted.some((f) => offered.has(f))) return false;
  }
  return true;
}

/** Pick the newest acceptable update, or null. */
export function pickUpdate(candidates: PackageInfo[], current: string, query: UpdateQuery): PackageInfo | null {
  const eligible = candidates.filter((c) => isUpdateCandidate(c, current, query)).sort(compareNewestFirst);
  return eligible[0] ?? null;
}
