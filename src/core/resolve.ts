import type { Configuration } from '../config/configuration.js';
import type { PackageSourceDescriptor } from '../config/schema.js';

/** Which descriptor(s) queries are routed to for this session. */
export type ResolvedSource =
  | { kind: 'single'; descriptor: PackageSourceDescriptor }
  | { kind: 'composite'; descriptors: readonly PackageSourceDescriptor[] }
  | {
      kind: 'config';
      /** The configuration's designated source, or null when none is designated. */
      descriptor: PackageSourceDescriptor | null;
      /** Used when nothing is designated: every configured source, in file order. */
      fallback: readonly PackageSourceDescriptor[];
    };

/**
 * Pick the active source. Command-line overrides take unconditional precedence
 * and, when present, switch off install-from-cache on the configuration.
 */
export function resolve(config: Configuration, overrides: readonly PackageSourceDescriptor[]): ResolvedSource {
  if (overrides.length > 0) {
    config.setInstallFromCache(false);
  }

  if (overrides.length === 1) {
    return { kind: 'single', descriptor: overrides[0] };
  }
  if (overrides.length > 1) {
    return { kind: 'composite', descriptors: [...overrides] };
  }
  return { kind: 'config', descriptor: config.activeSource, fallback: [...config.sources] };
}

/** Descriptors queries will actually hit, in order. */
export function descriptorsOf(resolved: ResolvedSource): readonly PackageSourceDescriptor[] {
  switch (resolved.kind) {
    case 'single':
      return [resolved.descriptor];
    case 'composite':
      return resolved.descriptors;
    case 'config':
      return resolved.descriptor ? [resolved.descriptor] : resolved.fallback;
  }
}

function descriptorKey(d: PackageSourceDescriptor): string {
  return JSON.stringify([d.name, d.location, d.credentials?.username ?? null, d.credentials?.password ?? null]);
}

/** Structural equality: same kind and same descriptors in the same order. */
export function sameResolution(a: ResolvedSource, b: ResolvedSource): boolean {
  if (a.kind !== b.kind) return false;
  const left = descriptorsOf(a).map(descriptorKey);
  const right = descriptorsOf(b).map(descriptorKey);
  return left.length === right.length && left.every((key, i) => key === right[i]);
}

export function describeResolution(resolved: ResolvedSource): string {
  const names = descriptorsOf(resolved).map((d) => d.name).join(', ') || '(none)';
  switch (resolved.kind) {
    case 'single':
      return `command line: ${names}`;
    case 'composite':
      return `command line (combined): ${names}`;
    case 'config':
      return resolved.descriptor ? `config: ${names}` : `config (all sources): ${names}`;
  }
}
