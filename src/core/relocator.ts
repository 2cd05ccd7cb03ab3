import { copyFileSync, existsSync, mkdirSync, renameSync, unlinkSync } from 'node:fs';
import { isAbsolute, normalize, relative, sep } from 'node:path';
import { PREF_CONFIG_DIRECTORY, SIDECAR_SUFFIX } from '../config/branding.js';
import type { ConfigLocation, ConfigLocationSnapshot } from '../config/location.js';
import type { PreferenceStore } from '../config/preferences.js';
import { ConfigurationError, formatError } from '../utils/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { deliver, noopNotifier, type Notifier } from './notifier.js';
import type { SourceResolver } from './resolver.js';

/** The file operations a relocation needs. Swappable so failures can be simulated. */
export interface RelocationFileSystem {
  existsSync(path: string): boolean;
  mkdirSync(path: string): void;
  renameSync(from: string, to: string): void;
  copyFileSync(from: string, to: string): void;
  unlinkSync(path: string): void;
}

export const nodeFileSystem: RelocationFileSystem = {
  existsSync,
  mkdirSync: (path) => {
    mkdirSync(path, { recursive: true });
  },
  renameSync,
  copyFileSync,
  unlinkSync,
};

export type RelocationResult =
  | {
      ok: true;
      /** False when there was no file to move and a fresh one was loaded instead. */
      moved: boolean;
      sidecarMoved: boolean;
      fullPath: string;
    }
  | { ok: false; error: unknown };

export interface ConfigRelocatorOptions {
  location: ConfigLocation;
  preferences: PreferenceStore;
  resolver: SourceResolver;
  fs?: RelocationFileSystem;
  notifier?: Notifier;
  logger?: Logger;
}

export function sidecarPathFor(fullPath: string): string {
  return `${fullPath}${SIDECAR_SUFFIX}`;
}

/**
 * Moves the config file (and its .meta sidecar) to another directory under
 * the project root.
 *
 * After move() returns, the in-memory location, the preference store and the
 * file on disk all point at the same place: the new one on success, the old
 * one otherwise. Failures are logged and reported in the result, never thrown.
 */
export class ConfigRelocator {
  private readonly location: ConfigLocation;
  private readonly preferences: PreferenceStore;
  private readonly resolver: SourceResolver;
  private readonly fs: RelocationFileSystem;
  private readonly notifier: Notifier;
  private readonly logger: Logger;

  constructor(options: ConfigRelocatorOptions) {
    this.location = options.location;
    this.preferences = options.preferences;
    this.resolver = options.resolver;
    this.fs = options.fs ?? nodeFileSystem;
    this.notifier = options.notifier ?? noopNotifier;
    this.logger = options.logger ?? silentLogger;
  }

  /** @param newDirectory target directory, relative to the project root (absolute paths are converted) */
  move(newDirectory: string): RelocationResult {
    const previous = this.location.snapshot();
    const directory = this.toProjectRelative(newDirectory);

    if (escapesRoot(directory)) {
      const error = new ConfigurationError(`${newDirectory} is outside the project root`);
      this.logger.error(error.message);
      return { ok: false, error };
    }

    if (normalize(directory || '.') === normalize(previous.directoryPath || '.')) {
      return { ok: true, moved: false, sidecarMoved: false, fullPath: previous.fullPath };
    }

    this.location.setDirectoryPath(directory);
    const target = this.location.fullPath;
    this.logger.verbose(`Moving ${previous.fullPath} → ${target}`);

    try {
      // Point future loads at the new place before touching the disk. If the
      // process dies mid-move, the next load recreates the file there.
      this.preferences.set(PREF_CONFIG_DIRECTORY, directory);

      if (!this.fs.existsSync(previous.fullPath)) {
        this.resolver.reload();
        deliver(this.notifier, 'assets:rescan', this.logger);
        return { ok: true, moved: false, sidecarMoved: false, fullPath: target };
      }

      if (this.fs.existsSync(target)) {
        throw new Error(`${target} already exists`);
      }
      this.fs.mkdirSync(this.location.fullDirectoryPath);
      this.moveFile(previous.fullPath, target);
    } catch (err) {
      this.logger.error(`Failed to move config to ${target}: ${formatError(err)}`, err);
      this.restore(previous);
      return { ok: false, error: err };
    }

    const sidecarMoved = this.moveSidecar(previous.fullPath, target);
    this.resolver.loadedConfiguration()?.setFilePath(target);
    deliver(this.notifier, 'assets:rescan', this.logger);
    this.logger.verbose(`Config now at ${target}`);

    return { ok: true, moved: true, sidecarMoved, fullPath: target };
  }

  private restore(previous: ConfigLocationSnapshot): void {
    this.location.setDirectoryPath(previous.directoryPath);
    try {
      this.preferences.set(PREF_CONFIG_DIRECTORY, previous.directoryPath);
    } catch (err) {
      this.logger.error(`Could not restore preference ${PREF_CONFIG_DIRECTORY}: ${formatError(err)}`, err);
    }
  }

  /** The sidecar is optional; failing to move it leaves the primary move in place. */
  private moveSidecar(fromPrimary: string, toPrimary: string): boolean {
    const from = sidecarPathFor(fromPrimary);
    if (!this.fs.existsSync(from)) return false;
    try {
      this.moveFile(from, sidecarPathFor(toPrimary));
      return true;
    } catch (err) {
      this.logger.warn(`Could not move ${from}: ${formatError(err)}`);
      return false;
    }
  }

  /** rename, falling back to copy + unlink across devices. */
  private moveFile(from: string, to: string): void {
    try {
      this.fs.renameSync(from, to);
    } catch (err) {
      if (!isCrossDevice(err)) throw err;
      this.fs.copyFileSync(from, to);
      try {
        this.fs.unlinkSync(from);
      } catch (unlinkErr) {
        this.discardCopy(to);
        throw unlinkErr;
      }
    }
  }

  /** Best effort; a failure here is only logged. */
  private discardCopy(path: string): void {
    try {
      this.fs.unlinkSync(path);
    } catch (err) {
      this.logger.warn(`Could not remove partial copy ${path}: ${formatError(err)}`);
    }
  }

  private toProjectRelative(directory: string): string {
    return isAbsolute(directory) ? relative(this.location.projectRoot, directory) : directory;
  }
}

function escapesRoot(directory: string): boolean {
  const normalized = normalize(directory || '.');
  return isAbsolute(normalized) || normalized === '..' || normalized.startsWith(`..${sep}`);
}

function isCrossDevice(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EXDEV';
}
