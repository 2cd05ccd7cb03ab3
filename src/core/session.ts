import { YamlConfigStore, type ConfigStore } from '../config/config-store.js';
import { ConfigLocation } from '../config/location.js';
import { JsonPreferenceStore, type PreferenceStore } from '../config/preferences.js';
import { createSourceFactory, type SourceFactory } from '../sources/factory.js';
import type { FetchLike } from '../sources/http-source.js';
import { createLogger, type Logger, type LogSink } from '../utils/logger.js';
import { LoggingNotifier, type Notifier } from './notifier.js';
import { PackageQueries } from './queries.js';
import { ConfigRelocator, type RelocationFileSystem } from './relocator.js';
import { SourceResolver } from './resolver.js';

export interface SessionOptions {
  projectRoot: string;
  /** Invocation arguments to scan for source overrides. */
  args?: readonly string[];
  preferences?: PreferenceStore;
  store?: ConfigStore;
  notifier?: Notifier;
  createSource?: SourceFactory;
  fetch?: FetchLike;
  fs?: RelocationFileSystem;
  /** Log output; defaults to the console. */
  sink?: LogSink;
}

/** Everything one project session needs, wired together once at the top level. */
export interface Session {
  logger: Logger;
  preferences: PreferenceStore;
  location: ConfigLocation;
  store: ConfigStore;
  resolver: SourceResolver;
  relocator: ConfigRelocator;
  queries: PackageQueries;
}

export function createSession(options: SessionOptions): Session {
  const preferences = options.preferences ?? new JsonPreferenceStore();
  const location = ConfigLocation.fromPreferences(options.projectRoot, preferences);

  // The logger reads the verbose flag lazily from whatever the resolver has
  // loaded, so the resolver can log while it is still loading.
  let resolver: SourceResolver | null = null;
  const logger = createLogger({ isVerbose: () => resolver?.isVerbose() ?? false, sink: options.sink });

  const store = options.store ?? new YamlConfigStore(logger);
  const notifier = options.notifier ?? new LoggingNotifier(logger);
  resolver = new SourceResolver({
    store,
    location,
    args: options.args,
    notifier,
    logger,
    createSource:
      options.createSource ??
      createSourceFactory({ projectRoot: location.projectRoot, logger, fetch: options.fetch }),
  });

  const relocator = new ConfigRelocator({
    location,
    preferences,
    resolver,
    fs: options.fs,
    notifier,
    logger,
  });

  return {
    logger,
    preferences,
    location,
    store,
    resolver,
    relocator,
    queries: new PackageQueries(resolver),
  };
}
