import type { BundleCustomization, BundleDefinition } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { InvalidBundleError } from '../../utils/errors.js';
import type { BundleLoader } from './bundle-loader.js';
import { createDummyBundle, isBundleDefinition, withBundleChanges } from './bundle-definition.js';

export interface BundleStoreOptions {
  /** Per-name overrides; `false` disables a bundle (it loads as an empty bundle) */
  customizedBundles?: Readonly<Record<string, BundleCustomization>>;
  /** Output root given to local bundles that declare none */
  defaultBasePath?: string | null;
  /** URL of the default output root */
  defaultBaseUrl?: string | null;
}

/**
 * Loads each bundle definition once and keeps it for the lifetime of the store.
 * Concurrent loads of the same name share one loader call.
 */
export class BundleStore {
  private readonly loaded = new Map<string, BundleDefinition>();
  private readonly inflight = new Map<string, Promise<BundleDefinition>>();

  constructor(
    private readonly loader: BundleLoader,
    private readonly options: BundleStoreOptions = {}
  ) {}

  async load(name: string): Promise<BundleDefinition> {
    const cached = this.loaded.get(name);
    if (cached) {
      return cached;
    }

    const existing = this.inflight.get(name);
    if (existing) {
      return existing;
    }

    const promise = this.loadFresh(name);
    this.inflight.set(name, promise);

    try {
      const bundle = await promise;
      this.loaded.set(name, bundle);
      return bundle;
    } finally {
      this.inflight.delete(name);
    }
  }

  isLoaded(name: string): boolean {
    return this.loaded.has(name);
  }

  private async loadFresh(name: string): Promise<BundleDefinition> {
    const customization = this.getCustomization(name);

    if (customization === false) {
      logger.debug(`Bundle '${name}' is disabled by customization, using an empty bundle`);
      return createDummyBundle(name);
    }

    let bundle: BundleDefinition;
    if (isBundleDefinition(customization)) {
      if (customization.name !== name) {
        throw new InvalidBundleError(name, `customized definition is named '${customization.name}'`);
      }
      bundle = customization;
    } else {
      bundle = await this.loader.load(name);
      if (customization) {
        bundle = withBundleChanges(bundle, customization);
      }
    }

    logger.debug(`Loaded bundle '${name}'`, {
      dependencies: bundle.dependencies,
      sourcePath: bundle.sourcePath,
      cdn: bundle.cdn
    });

    return this.applyDefaults(bundle);
  }

  private getCustomization(name: string): BundleCustomization | undefined {
    const customized = this.options.customizedBundles;
    return customized && Object.hasOwn(customized, name) ? customized[name] : undefined;
  }

  private applyDefaults(bundle: BundleDefinition): BundleDefinition {
    if (bundle.cdn) {
      return bundle;
    }
    const basePath = bundle.basePath ?? this.options.defaultBasePath ?? null;
    const baseUrl = bundle.baseUrl ?? this.options.defaultBaseUrl ?? null;
    if (basePath === bundle.basePath && baseUrl === bundle.baseUrl) {
      return bundle;
    }
    return withBundleChanges(bundle, { basePath, baseUrl });
  }
}
