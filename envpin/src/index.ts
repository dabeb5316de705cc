export { ContentCache, locatorKey, type CacheRef, type CachedBlob } from "./cache/content-cache.js";
export { sha256Hex, sha256File } from "./cache/checksum.js";
export { SnapshotFetcher, expandUrl, type FetchOptions, type SnapshotFetcherOptions } from "./fetcher/snapshot-fetcher.js";
export { httpTransport, type Transport, type TransportResponse } from "./fetcher/transport.js";
export { PackageIndex } from "./index/package-index.js";
export { resolve, isClosed } from "./resolver/environment-resolver.js";
export { parseSpecifier, formatSpecifier, type Specifier } from "./resolver/specifier.js";
export { ManifestWriter, buildEntries, serializeManifest, storePathFor } from "./manifest/manifest-writer.js";
export { readManifest, parseManifest } from "./manifest/manifest-reader.js";
export { Pipeline, type PipelineDeps, type PipelineRequest, type PipelineResult, type PipelineState } from "./core/pipeline.js";
export { STAGES, nextState, isTerminal, type PipelineStatus, type Stage } from "./core/state-machine.js";
export { mapBounded, withDeadline } from "./core/concurrency.js";
export { loadDescriptor, parseDescriptor } from "./descriptor/loader.js";
export { loadConfig, validateConfig } from "./config/validator.js";
export { loadConfigTree } from "./config/loader.js";
export { SchemaRegistry, createRegistry, defaultRegistry } from "./schema/registry.js";
export * from "./errors.js";
export type { SourceLocator, Snapshot } from "./types/locator.js";
export type { PackageMetadata, ResolvedEnvironment } from "./types/package.js";
export type { EnvironmentManifest, ManifestEntry } from "./types/manifest.js";
export type { EnvironmentDescriptor } from "./types/descriptor.js";
export type { EnvpinConfig } from "./types/config.js";
