import { z } from 'zod';
import * as semver from 'semver';

// ─── Package Source Descriptor ─────────────────────────────────────

export const SourceCredentialsSchema = z.object({
  username: z.string(),
  password: z.string(),
});

export type SourceCredentials = z.infer<typeof SourceCredentialsSchema>;

export const PackageSourceDescriptorSchema = z.object({
  name: z.string().min(1),
  /** http(s) URL or a directory path (relative paths resolve against the project root). */
  location: z.string().min(1),
  credentials: SourceCredentialsSchema.optional(),
});

export type PackageSourceDescriptor = Readonly<z.infer<typeof PackageSourceDescriptorSchema>>;

/** Build a frozen descriptor. Descriptors never change after construction. */
export function defineSource(
  name: string,
  location: string,
  credentials?: SourceCredentials,
): PackageSourceDescriptor {
  const descriptor = credentials
    ? { name, location, credentials: Object.freeze({ ...credentials }) }
    : { name, location };
  return Object.freeze(descriptor);
}

// ─── Persisted Configuration ───────────────────────────────────────

export const DEFAULT_SOURCE_NAME = 'default';
export const DEFAULT_SOURCE_LOCATION = 'feed';
export const DEFAULT_REPOSITORY_PATH = 'Packages';

export const ConfigurationDataSchema = z
  .object({
    verbose: z.boolean().default(false),
    install_from_cache: z.boolean().default(true),
    repository_path: z.string().default(DEFAULT_REPOSITORY_PATH),
    active_source: z.string().nullable().default(null),
    sources: z.array(PackageSourceDescriptorSchema).default([]),
  })
  .superRefine((data, ctx) => {
    const seen = new Set<string>();
    data.sources.forEach((source, index) => {
      if (seen.has(source.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['sources', index, 'name'],
          message: `Duplicate source name "${source.name}"`,
        });
      }
      seen.add(source.name);
    });
    if (data.active_source !== null && !seen.has(data.active_source)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['active_source'],
        message: `Active source "${data.active_source}" is not a configured source`,
      });
    }
  });

export type ConfigurationData = z.infer<typeof ConfigurationDataSchema>;

// ─── Packages ──────────────────────────────────────────────────────

const SemverString = z.string().refine((v) => semver.valid(v) !== null, {
  message: 'Expected a semantic version',
});

export const PackageIdentifierSchema = z.object({
  id: z.string().min(1),
  version: SemverString,
});

export type PackageIdentifier = z.infer<typeof PackageIdentifierSchema>;

/** Manifest stored beside each package in a local directory source. */
export const PackageManifestSchema = PackageIdentifierSchema.extend({
  description: z.string().optional(),
  authors: z.array(z.string()).default([]),
  frameworks: z.array(z.string()).default([]),
});

export type PackageManifest = z.infer<typeof PackageManifestSchema>;

export const PackageInfoSchema = PackageManifestSchema.extend({
  /** Name of the source the package was found in. */
  source: z.string(),
});

export type PackageInfo = z.infer<typeof PackageInfoSchema>;

/** Parse "id@version" as typed on the command line. */
export function parsePackageIdentifier(spec: string): PackageIdentifier {
  const at = spec.lastIndexOf('@');
  if (at <= 0) {
    throw new Error(`Expected <id>@<version>, got "${spec}"`);
  }
  const result = PackageIdentifierSchema.safeParse({ id: spec.slice(0, at), version: spec.slice(at + 1) });
  if (!result.success) {
    throw new Error(`Invalid package "${spec}": ${result.error.issues[0]?.message ?? 'unknown error'}`);
  }
  return result.data;
}

export function formatPackage(pkg: PackageIdentifier): string {
  return `${pkg.id}@${pkg.version}`;
}
