/**
 * assetpack - resolves asset bundle graphs into ordered script/style lists
 * and publishes bundle sources once per process.
 */

export * from './types/index.js';
export * from './utils/errors.js';
export { logger } from './utils/logger.js';
export { isRelativeUrl, isLocalRelativePath, joinUrl } from './utils/url.js';

export { AssetManager, createAssetManager } from './core/asset-manager.js';
export type { AssetManagerOptions, CreateAssetManagerOptions } from './core/asset-manager.js';
export { loadConfig, resolveConfig, parseConfig, findConfigFile } from './core/config.js';
export type { AssetPackConfig, AssetPackConfigInput } from './core/config.js';

export {
  createBundleDefinition,
  withBundleChanges,
  isBundleDefinition,
  createDummyBundle
} from './core/bundle/bundle-definition.js';
export { FactoryBundleLoader, ManifestBundleLoader } from './core/bundle/bundle-loader.js';
export type { BundleLoader, BundleFactory } from './core/bundle/bundle-loader.js';
export { BundleStore } from './core/bundle/bundle-store.js';
export type { BundleStoreOptions } from './core/bundle/bundle-store.js';

export { AssetPublisher, createPublishFilter } from './core/publish/asset-publisher.js';
export type { AssetPublisherOptions, PublisherConfig } from './core/publish/asset-publisher.js';
export { PublishCache } from './core/publish/publish-cache.js';
export { computeDirectoryHash } from './core/publish/directory-hash.js';

export { DependencyResolver } from './core/registration/dependency-resolver.js';
export type { BundlePublisher } from './core/registration/dependency-resolver.js';
export { FileCollector, createCollectedFiles } from './core/collect/file-collector.js';
export type { CollectedFiles, FileCollectorOptions, RegistryView } from './core/collect/file-collector.js';

export { AliasPathResolver } from './core/ports/path-resolver.js';
export type { PathResolver } from './core/ports/path-resolver.js';
export { nodeFilesystem } from './core/ports/filesystem.js';
export type { FilesystemOps } from './core/ports/filesystem.js';
