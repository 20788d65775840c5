/**
 * Asset Publisher
 *
 * Publishes a bundle's source directory into its output root under a
 * content-derived directory name, by copy or by symbolic link, once per
 * resolved source path. Configuration is immutable: each `with*` method
 * returns a new publisher sharing the same PublishCache.
 */

import { dirname, join } from 'path';
import { minimatch } from 'minimatch';
import type { BundleDefinition, HashCallback, PublishOptions, PublishedBundle } from '../../types/index.js';
import { PUBLISH_DEFAULTS } from '../../constants/index.js';
import { logger } from '../../utils/logger.js';
import { FileNotFoundError, MissingConfigurationError, PublishIOError } from '../../utils/errors.js';
import { joinUrl } from '../../utils/url.js';
import { nodeFilesystem, type FilesystemOps } from '../ports/filesystem.js';
import type { PathResolver } from '../ports/path-resolver.js';
import { PublishCache } from './publish-cache.js';
import { computeDirectoryHash } from './directory-hash.js';

export interface PublisherConfig {
  /** Copy even when the destination exists (bundles may override with publishOptions.forceCopy) */
  readonly forceCopy: boolean;
  /** Publish by symbolic link instead of copying */
  readonly linkAssets: boolean;
  readonly dirMode: number;
  readonly fileMode: number;
  readonly hashCallback: HashCallback | null;
}

export interface AssetPublisherOptions extends Partial<PublisherConfig> {
  pathResolver: PathResolver;
  filesystem?: FilesystemOps;
  cache?: PublishCache;
}

export class AssetPublisher {
  private readonly config: PublisherConfig;
  private readonly pathResolver: PathResolver;
  private readonly filesystem: FilesystemOps;
  private readonly cache: PublishCache;

  constructor(options: AssetPublisherOptions) {
    this.pathResolver = options.pathResolver;
    this.filesystem = options.filesystem ?? nodeFilesystem;
    this.cache = options.cache ?? new PublishCache();
    this.config = Object.freeze({
      forceCopy: options.forceCopy ?? false,
      linkAssets: options.linkAssets ?? false,
      dirMode: options.dirMode ?? PUBLISH_DEFAULTS.DIR_MODE,
      fileMode: options.fileMode ?? PUBLISH_DEFAULTS.FILE_MODE,
      hashCallback: options.hashCallback ?? null
    });
  }

  getConfig(): PublisherConfig {
    return this.config;
  }

  withForceCopy(forceCopy: boolean): AssetPublisher {
    return this.derive({ forceCopy });
  }

  withLinkAssets(linkAssets: boolean): AssetPublisher {
    return this.derive({ linkAssets });
  }

  withDirMode(dirMode: number): AssetPublisher {
    return this.derive({ dirMode });
  }

  withFileMode(fileMode: number): AssetPublisher {
    return this.derive({ fileMode });
  }

  withHashCallback(hashCallback: HashCallback): AssetPublisher {
    return this.derive({ hashCallback });
  }

  /**
   * Publish the bundle source and return the published directory and its URL.
   * Repeated calls for the same resolved source path return the recorded result.
   */
  async publish(bundle: BundleDefinition): Promise<PublishedBundle> {
    if (!bundle.sourcePath) {
      throw new MissingConfigurationError(`Bundle '${bundle.name}' has no sourcePath to publish`, {
        bundleName: bundle.name
      });
    }

    const sourcePath = this.pathResolver.resolve(bundle.sourcePath);
    const cached = this.cache.get(sourcePath);
    if (cached) {
      return cached;
    }

    return this.cache.getOrPublish(sourcePath, () => this.publishDirectory(bundle, sourcePath));
  }

  getPublishedPath(sourcePath: string): string | null {
    return this.cache.get(this.pathResolver.resolve(sourcePath))?.path ?? null;
  }

  getPublishedUrl(sourcePath: string): string | null {
    return this.cache.get(this.pathResolver.resolve(sourcePath))?.url ?? null;
  }

  private derive(changes: Partial<PublisherConfig>): AssetPublisher {
    return new AssetPublisher({
      ...this.config,
      ...changes,
      pathResolver: this.pathResolver,
      filesystem: this.filesystem,
      cache: this.cache
    });
  }

  private async publishDirectory(bundle: BundleDefinition, sourcePath: string): Promise<PublishedBundle> {
    if (!bundle.basePath) {
      throw new MissingConfigurationError(`Bundle '${bundle.name}' has no basePath to publish into`, {
        bundleName: bundle.name
      });
    }
    if (bundle.baseUrl === null) {
      throw new MissingConfigurationError(`Bundle '${bundle.name}' has no baseUrl to publish under`, {
        bundleName: bundle.name
      });
    }
    if (!(await this.filesystem.exists(sourcePath))) {
      throw new FileNotFoundError(sourcePath, { bundleName: bundle.name, reason: 'sourcePath to publish does not exist' });
    }

    const hash = this.config.hashCallback
      ? this.config.hashCallback(sourcePath)
      : await computeDirectoryHash(sourcePath, this.config.linkAssets, this.filesystem);
    const destination = join(this.pathResolver.resolve(bundle.basePath), hash);
    const url = joinUrl(this.pathResolver.resolveUrl(bundle.baseUrl), hash);

    if (this.config.linkAssets) {
      await this.link(sourcePath, destination);
    } else {
      await this.copy(bundle, sourcePath, destination);
    }

    logger.debug(`Published bundle '${bundle.name}'`, { sourcePath, destination, url });
    return { path: destination, url };
  }

  private async link(sourcePath: string, destination: string): Promise<void> {
    if (await this.filesystem.exists(destination)) {
      return;
    }

    try {
      await this.filesystem.ensureDirectory(dirname(destination), this.config.dirMode);
      await this.filesystem.createSymlink(sourcePath, destination);
    } catch (error) {
      // another process may have linked the same destination in between
      if (!(await this.filesystem.exists(destination))) {
        throw new PublishIOError(`could not link ${sourcePath} -> ${destination}`, {
          sourcePath,
          destination,
          error
        });
      }
      logger.debug(`Destination appeared while linking, reusing it: ${destination}`);
    }
  }

  private async copy(bundle: BundleDefinition, sourcePath: string, destination: string): Promise<void> {
    const forceCopy = bundle.publishOptions.forceCopy ?? this.config.forceCopy;
    if (!forceCopy && (await this.filesystem.exists(destination))) {
      return;
    }

    try {
      await this.filesystem.copyDirectory(sourcePath, destination, {
        dirMode: this.config.dirMode,
        fileMode: this.config.fileMode,
        filter: createPublishFilter(bundle.publishOptions)
      });
    } catch (error) {
      throw new PublishIOError(`could not copy ${sourcePath} -> ${destination}`, {
        sourcePath,
        destination,
        error
      });
    }
  }
}

/**
 * Build a copy filter from publishOptions.only / except.
 * Patterns without a slash match the file name at any depth.
 */
export function createPublishFilter(options: Readonly<PublishOptions>): ((relativePath: string) => boolean) | undefined {
  const only = options.only ?? [];
  const except = options.except ?? [];
  if (only.length === 0 && except.length === 0) {
    return undefined;
  }

  const matches = (path: string, pattern: string): boolean =>
    minimatch(path, pattern, { dot: true, matchBase: !pattern.includes('/') });

  return (relativePath: string): boolean => {
    if (except.some((pattern) => matches(relativePath, pattern))) {
      return false;
    }
    return only.length === 0 || only.some((pattern) => matches(relativePath, pattern));
  };
}
