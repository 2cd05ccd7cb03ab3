export * from './core/index.js';
export { Configuration, createDefaultConfiguration, defaultConfigurationData } from './config/configuration.js';
export { YamlConfigStore, type ConfigStore } from './config/config-store.js';
export { ConfigLocation } from './config/location.js';
export { JsonPreferenceStore, MemoryPreferenceStore, type PreferenceStore } from './config/preferences.js';
export {
  defineSource,
  parsePackageIdentifier,
  type PackageIdentifier,
  type PackageInfo,
  type PackageSourceDescriptor,
} from './config/schema.js';
export { CompositeSource } from './sources/composite-source.js';
export { HttpRegistrySource } from './sources/http-source.js';
export { LocalDirectorySource } from './sources/local-source.js';
export { createSourceFactory, type SourceFactory } from './sources/factory.js';
export type { PackageSource, SearchQuery, UpdateQuery } from './sources/types.js';
export { ConfigParseError, ConfigurationError, SourceRequestError } from './utils/errors.js';
export { createLogger, silentLogger, type Logger } from './utils/logger.js';
