import { join, resolve } from 'node:path';
import { CONFIG_FILENAME, PREF_CONFIG_DIRECTORY } from './branding.js';
import type { PreferenceStore } from './preferences.js';

export interface ConfigLocationSnapshot {
  directoryPath: string;
  filePath: string;
  fullPath: string;
}

/**
 * Where the config file lives: a directory relative to the project root plus
 * the fixed CONFIG_FILENAME. The directory choice is remembered in the
 * preference store across sessions.
 */
export class ConfigLocation {
  private _directoryPath: string;

  constructor(
    readonly projectRoot: string,
    directoryPath = '',
  ) {
    this.projectRoot = resolve(projectRoot);
    this._directoryPath = directoryPath;
  }

  /** Restore the directory last chosen for this tool (project root when unset). */
  static fromPreferences(projectRoot: string, prefs: PreferenceStore): ConfigLocation {
    return new ConfigLocation(projectRoot, prefs.get(PREF_CONFIG_DIRECTORY, ''));
  }

  /** Config directory, relative to the project root. */
  get directoryPath(): string {
    return this._directoryPath;
  }

  /** Config file path, relative to the project root. */
  get filePath(): string {
    return join(this._directoryPath, CONFIG_FILENAME);
  }

  /** Absolute config directory. */
  get fullDirectoryPath(): string {
    return resolve(this.projectRoot, this._directoryPath);
  }

  /** Absolute config file path. */
  get fullPath(): string {
    return resolve(this.projectRoot, this.filePath);
  }

  setDirectoryPath(directoryPath: string): void {
    this._directoryPath = directoryPath;
  }

  snapshot(): ConfigLocationSnapshot {
    return { directoryPath: this.directoryPath, filePath: this.filePath, fullPath: this.fullPath };
  }
}
