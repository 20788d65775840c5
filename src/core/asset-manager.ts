/**
 * Asset Manager
 *
 * Entry point for callers: registers bundles by name and returns the
 * ordered script and style entries of everything registered so far.
 */

import type { FileEntry, RegistryEntry } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { ConfigError, DisallowedBundleError } from '../utils/errors.js';
import type { AssetPackConfig, AssetPackConfigInput } from './config.js';
import { resolveConfig } from './config.js';
import type { FilesystemOps } from './ports/filesystem.js';
import { AliasPathResolver, type PathResolver } from './ports/path-resolver.js';
import { ManifestBundleLoader, type BundleLoader } from './bundle/bundle-loader.js';
import { BundleStore } from './bundle/bundle-store.js';
import { AssetPublisher } from './publish/asset-publisher.js';
import type { PublishCache } from './publish/publish-cache.js';
import { DependencyResolver } from './registration/dependency-resolver.js';
import { FileCollector, type CollectedFiles } from './collect/file-collector.js';

export interface AssetManagerOptions {
  store: BundleStore;
  resolver: DependencyResolver;
  collector: FileCollector;
  publisher?: AssetPublisher | null;
  /** When non-empty, only these bundles and their dependencies can be registered */
  allowedBundleNames?: readonly string[];
}

export class AssetManager {
  private readonly store: BundleStore;
  private readonly resolver: DependencyResolver;
  private readonly collector: FileCollector;
  private readonly publisher: AssetPublisher | null;
  private readonly allowedBundleNames: readonly string[];
  private allowedClosure: Promise<Set<string>> | null = null;
  private files: Promise<CollectedFiles> | null = null;

  constructor(options: AssetManagerOptions) {
    this.store = options.store;
    this.resolver = options.resolver;
    this.collector = options.collector;
    this.publisher = options.publisher ?? null;
    this.allowedBundleNames = [...(options.allowedBundleNames ?? [])];
  }

  /**
   * Register a bundle and its dependencies, optionally with minimum script/style positions
   */
  async register(name: string, scriptPosition: number | null = null, stylePosition: number | null = null): Promise<void> {
    await this.assertAllowed(name);
    try {
      await this.resolver.register(name, scriptPosition, stylePosition);
    } finally {
      this.files = null;
    }
  }

  /** Ordered script entries; each call returns its own copy */
  async getScriptFiles(): Promise<Map<string, FileEntry>> {
    return new Map((await this.getFiles()).scripts);
  }

  /** Ordered style entries; each call returns its own copy */
  async getStyleFiles(): Promise<Map<string, FileEntry>> {
    return new Map((await this.getFiles()).styles);
  }

  isRegistered(name: string): boolean {
    return this.resolver.isRegistered(name);
  }

  getRegisteredBundles(): ReadonlyMap<string, Readonly<RegistryEntry>> {
    return this.resolver.getRegistry();
  }

  getPublisher(): AssetPublisher | null {
    return this.publisher;
  }

  private getFiles(): Promise<CollectedFiles> {
    if (!this.files) {
      const pending: Promise<CollectedFiles> = this.collector
        .collectMany(this.resolver.getRegisteredNames())
        .catch((error: unknown) => {
          // a failed collection is retried on the next call
          if (this.files === pending) {
            this.files = null;
          }
          throw error;
        });
      this.files = pending;
    }
    return this.files;
  }

  private async assertAllowed(name: string): Promise<void> {
    if (this.allowedBundleNames.length === 0 || this.allowedBundleNames.includes(name)) {
      return;
    }
    const closure = await this.getAllowedClosure();
    if (!closure.has(name)) {
      throw new DisallowedBundleError(name, this.allowedBundleNames);
    }
  }

  private getAllowedClosure(): Promise<Set<string>> {
    if (!this.allowedClosure) {
      const pending: Promise<Set<string>> = this.collectAllowedClosure().catch((error: unknown) => {
        // a failed walk is retried on the next call
        if (this.allowedClosure === pending) {
          this.allowedClosure = null;
        }
        throw error;
      });
      this.allowedClosure = pending;
    }
    return this.allowedClosure;
  }

  private async collectAllowedClosure(): Promise<Set<string>> {
    const closure = new Set<string>();
    const visit = async (name: string): Promise<void> => {
      if (closure.has(name)) {
        return;
      }
      closure.add(name);
      const bundle = await this.store.load(name);
      for (const dependency of bundle.dependencies) {
        await visit(dependency);
      }
    };

    for (const name of this.allowedBundleNames) {
      await visit(name);
    }
    logger.debug(`Allowed bundle closure: ${[...closure].join(', ')}`);
    return closure;
  }
}

export interface CreateAssetManagerOptions {
  /** Replaces the manifest loader named by the configuration */
  loader?: BundleLoader;
  filesystem?: FilesystemOps;
  pathResolver?: PathResolver;
  /** Share published directories with other managers */
  publishCache?: PublishCache;
  /** Share loaded bundles with other managers */
  store?: BundleStore;
}

/**
 * Wire loader, store, publisher, resolver and collector from a configuration
 */
export function createAssetManager(
  configInput: AssetPackConfig | AssetPackConfigInput = {},
  options: CreateAssetManagerOptions = {}
): AssetManager {
  const config = resolveConfig(configInput);
  const pathResolver = options.pathResolver ?? new AliasPathResolver(config.rootDir, config.aliases);

  const store = options.store ?? new BundleStore(resolveLoader(config, pathResolver, options.loader), {
    customizedBundles: config.customizedBundles,
    defaultBasePath: config.basePath,
    defaultBaseUrl: config.baseUrl
  });

  const publisher = new AssetPublisher({
    pathResolver,
    filesystem: options.filesystem,
    cache: options.publishCache,
    forceCopy: config.forceCopy,
    linkAssets: config.linkAssets,
    dirMode: config.dirMode,
    fileMode: config.fileMode
  });

  const resolver = new DependencyResolver(store, publisher);
  const collector = new FileCollector(resolver, {
    pathResolver,
    filesystem: options.filesystem,
    assetMap: config.assetMap
  });

  return new AssetManager({
    store,
    resolver,
    collector,
    publisher,
    allowedBundleNames: config.allowedBundleNames
  });
}

function resolveLoader(config: AssetPackConfig, pathResolver: PathResolver, loader?: BundleLoader): BundleLoader {
  if (loader) {
    return loader;
  }
  if (!config.manifest) {
    throw new ConfigError('No bundle loader given and no manifest configured');
  }
  return new ManifestBundleLoader(pathResolver.resolve(config.manifest));
}
