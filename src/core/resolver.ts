import type { Configuration } from '../config/configuration.js';
import type { ConfigStore } from '../config/config-store.js';
import type { ConfigLocation } from '../config/location.js';
import { CompositeSource } from '../sources/composite-source.js';
import type { SourceFactory } from '../sources/factory.js';
import type { PackageSource } from '../sources/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { deliver, noopNotifier, type Notifier } from './notifier.js';
import { scanSourceOverrides } from './override-scanner.js';
import { describeResolution, descriptorsOf, resolve, sameResolution, type ResolvedSource } from './resolve.js';

export interface SourceResolverOptions {
  store: ConfigStore;
  location: ConfigLocation;
  createSource: SourceFactory;
  /** Invocation arguments scanned for source overrides on every reload. */
  args?: readonly string[];
  notifier?: Notifier;
  logger?: Logger;
}

export type ResolverState =
  | { status: 'unresolved' }
  | {
      status: 'resolved';
      configuration: Configuration;
      resolved: ResolvedSource;
      source: PackageSource;
    };

type Resolved = Extract<ResolverState, { status: 'resolved' }>;

/**
 * Owns the loaded configuration and the active package source for a session.
 *
 * The first read resolves; later reads return the cached result until
 * reload() or invalidate(). Expected to be driven from a single caller:
 * overlapping reload/invalidate calls are not supported.
 */
export class SourceResolver {
  private state: ResolverState = { status: 'unresolved' };
  /** Survives invalidate() so an unchanged re-resolution does not re-notify. */
  private lastResolved: ResolvedSource | null = null;
  /** The configuration being resolved, visible to isVerbose() before state is set. */
  private loading: Configuration | null = null;

  private readonly store: ConfigStore;
  private readonly createSource: SourceFactory;
  private readonly args: readonly string[];
  private readonly notifier: Notifier;
  private readonly logger: Logger;
  readonly location: ConfigLocation;

  constructor(options: SourceResolverOptions) {
    this.store = options.store;
    this.location = options.location;
    this.createSource = options.createSource;
    this.args = options.args ?? [];
    this.notifier = options.notifier ?? noopNotifier;
    this.logger = options.logger ?? silentLogger;
  }

  get status(): ResolverState['status'] {
    return this.state.status;
  }

  /** The package source queries go to. Resolves on first use. */
  active(): PackageSource {
    return this.ensureResolved().source;
  }

  resolved(): ResolvedSource {
    return this.ensureResolved().resolved;
  }

  configuration(): Configuration {
    return this.ensureResolved().configuration;
  }

  /** The configuration if one is already loaded. Never triggers a load. */
  loadedConfiguration(): Configuration | null {
    return this.state.status === 'resolved' ? this.state.configuration : null;
  }

  /** Verbose flag of the configuration being loaded or already loaded; false before either. */
  isVerbose(): boolean {
    return (this.loading ?? this.loadedConfiguration())?.verbose ?? false;
  }

  /** Load the configuration again and recompute the active source. */
  reload(): ResolvedSource {
    const configuration = this.store.loadOrCreate(this.location.fullPath);
    const { resolved, source } = this.resolveLoaded(configuration);
    this.state = { status: 'resolved', configuration, resolved, source };
    this.logger.verbose(`Active source: ${describeResolution(resolved)}`);

    const changed = this.lastResolved === null || !sameResolution(this.lastResolved, resolved);
    this.lastResolved = resolved;
    if (changed) deliver(this.notifier, 'plugins:reinitialize', this.logger);

    return resolved;
  }

  /** Drop the cached resolution; the next read reloads. */
  invalidate(): void {
    this.state = { status: 'unresolved' };
  }

  private resolveLoaded(configuration: Configuration): { resolved: ResolvedSource; source: PackageSource } {
    this.loading = configuration;
    try {
      const overrides = scanSourceOverrides(this.args);
      for (const o of overrides) {
        this.logger.verbose(`Adding command line package source ${o.name} at ${o.location}`);
      }
      const resolved = resolve(configuration, overrides);
      return { resolved, source: this.buildSource(resolved) };
    } finally {
      this.loading = null;
    }
  }

  private ensureResolved(): Resolved {
    if (this.state.status === 'unresolved') this.reload();
    if (this.state.status !== 'resolved') {
      throw new Error('Source resolution did not complete');
    }
    return this.state;
  }

  private buildSource(resolved: ResolvedSource): PackageSource {
    const sources = descriptorsOf(resolved).map((d) => this.createSource(d));
    if (resolved.kind !== 'composite' && sources.length === 1) return sources[0];
    return new CompositeSource(sources);
  }
}
