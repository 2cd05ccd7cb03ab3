import { isAbsolute, resolve } from 'node:path';
import { homedir } from 'node:os';
import type { PackageSourceDescriptor } from '../config/schema.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { HttpRegistrySource, type FetchLike } from './http-source.js';
import { LocalDirectorySource } from './local-source.js';
import type { PackageSource } from './types.js';

export interface SourceFactoryOptions {
  /** Relative directory locations resolve against this. */
  projectRoot: string;
  logger?: Logger;
  fetch?: FetchLike;
}

/** Builds a live PackageSource from a descriptor. */
export type SourceFactory = (descriptor: PackageSourceDescriptor) => PackageSource;

export function isRemoteLocation(location: string): boolean {
  return /^https?:\/\//i.test(location);
}

/** Resolve a directory location the same way config paths are: ~ and relative paths included. */
export function resolveLocalLocation(location: string, projectRoot: string): string {
  if (location === '~' || location.startsWith('~/')) return resolve(homedir(), location.slice(2));
  return isAbsolute(location) ? location : resolve(projectRoot, location);
}

export function createSourceFactory(options: SourceFactoryOptions): SourceFactory {
  const logger = options.logger ?? silentLogger;
  return (descriptor) => {
    if (isRemoteLocation(descriptor.location)) {
      return new HttpRegistrySource(descriptor.name, descriptor.location, {
        credentials: descriptor.credentials,
        fetch: options.fetch,
      });
    }
    return new LocalDirectorySource(
      descriptor.name,
      resolveLocalLocation(descriptor.location, options.projectRoot),
      logger,
    );
  };
}
