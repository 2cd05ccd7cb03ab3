export { SourceResolver, type ResolverState, type SourceResolverOptions } from './resolver.js';
export { resolve, descriptorsOf, sameResolution, describeResolution, type ResolvedSource } from './resolve.js';
export { scanSourceOverrides, stripSourceOverrides, type ScanOptions } from './override-scanner.js';
export { ConfigRelocator, nodeFileSystem, sidecarPathFor, type RelocationFileSystem, type RelocationResult } from './relocator.js';
export { PackageQueries, DEFAULT_SEARCH, DEFAULT_UPDATE_QUERY } from './queries.js';
export { noopNotifier, RecordingNotifier, LoggingNotifier, type Notifier, type NotifyEvent } from './notifier.js';
export { createSession, type Session, type SessionOptions } from './session.js';
