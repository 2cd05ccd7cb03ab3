import {
  DEFAULT_REPOSITORY_PATH,
  DEFAULT_SOURCE_LOCATION,
  DEFAULT_SOURCE_NAME,
  defineSource,
} from './schema.js';
import type { ConfigurationData, PackageSourceDescriptor } from './schema.js';
import { ConfigurationError } from '../utils/errors.js';

/**
 * In-memory view of a sourcegate.yaml file.
 *
 * At most one source is designated active. All mutation goes through the
 * setters below; a reload replaces the whole instance.
 */
export class Configuration {
  private _filePath: string;
  private _verbose: boolean;
  private _installFromCache: boolean;
  private _repositoryPath: string;
  private _sources: PackageSourceDescriptor[];
  private _activeSourceName: string | null;

  constructor(filePath: string, data: ConfigurationData) {
    this._filePath = filePath;
    this._verbose = data.verbose;
    this._installFromCache = data.install_from_cache;
    this._repositoryPath = data.repository_path;
    this._sources = [];
    this._activeSourceName = null;

    for (const source of data.sources) {
      this.addSource(defineSource(source.name, source.location, source.credentials));
    }
    this.setActiveSource(data.active_source);
  }

  // ─── Accessors ────────────────────────────────────────────────────

  /** Absolute path of the file this configuration is stored in. */
  get filePath(): string {
    return this._filePath;
  }

  get verbose(): boolean {
    return this._verbose;
  }

  get installFromCache(): boolean {
    return this._installFromCache;
  }

  get repositoryPath(): string {
    return this._repositoryPath;
  }

  get sources(): readonly PackageSourceDescriptor[] {
    return this._sources;
  }

  get activeSourceName(): string | null {
    return this._activeSourceName;
  }

  /** The designated source, or null when none is designated. */
  get activeSource(): PackageSourceDescriptor | null {
    if (this._activeSourceName === null) return null;
    return this.getSource(this._activeSourceName) ?? null;
  }

  getSource(name: string): PackageSourceDescriptor | undefined {
    return this._sources.find((s) => s.name === name);
  }

  // ─── Setters ──────────────────────────────────────────────────────

  setFilePath(filePath: string): void {
    this._filePath = filePath;
  }

  setVerbose(verbose: boolean): void {
    this._verbose = verbose;
  }

  setInstallFromCache(installFromCache: boolean): void {
    this._installFromCache = installFromCache;
  }

  setRepositoryPath(repositoryPath: string): void {
    this._repositoryPath = repositoryPath;
  }

  /** Append a source. Names are unique within a configuration. */
  addSource(source: PackageSourceDescriptor): void {
    if (this.getSource(source.name)) {
      throw new ConfigurationError(`Source "${source.name}" already exists`);
    }
    this._sources.push(source);
  }

  /** Remove a source by name. Removing the active source clears the designation. */
  removeSource(name: string): void {
    const idx = this._sources.findIndex((s) => s.name === name);
    if (idx === -1) throw new ConfigurationError(`Source "${name}" not found`);
    this._sources.splice(idx, 1);
    if (this._activeSourceName === name) this._activeSourceName = null;
  }

  /** Designate the active source by name, or clear the designation with null. */
  setActiveSource(name: string | null): void {
    if (name !== null && !this.getSource(name)) {
      throw new ConfigurationError(`Source "${name}" not found`);
    }
    this._activeSourceName = name;
  }

  // ─── Serialization ────────────────────────────────────────────────

  toData(): ConfigurationData {
    return {
      verbose: this._verbose,
      install_from_cache: this._installFromCache,
      repository_path: this._repositoryPath,
      active_source: this._activeSourceName,
      sources: this._sources.map((s) =>
        s.credentials
          ? { name: s.name, location: s.location, credentials: { ...s.credentials } }
          : { name: s.name, location: s.location },
      ),
    };
  }
}

/** Default settings written when no config file exists yet. */
export function defaultConfigurationData(): ConfigurationData {
  return {
    verbose: false,
    install_from_cache: true,
    repository_path: DEFAULT_REPOSITORY_PATH,
    active_source: DEFAULT_SOURCE_NAME,
    sources: [{ name: DEFAULT_SOURCE_NAME, location: DEFAULT_SOURCE_LOCATION }],
  };
}

export function createDefaultConfiguration(filePath: string): Configuration {
  return new Configuration(filePath, defaultConfigurationData());
}
