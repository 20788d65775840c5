/**
 * File collector.
 *
 * Walks registered bundles (dependencies first) and folds their script and
 * style entries into two insertion-ordered maps keyed by explicit key or
 * resolved URL. A repeated key keeps its place and takes the latest value.
 */

import { join } from 'path';
import type {
  AssetAxis,
  BundleDefinition,
  FileEntry,
  FileOptions,
  RegistryEntry
} from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { BundleNotFoundError, FileNotFoundError, MissingConfigurationError } from '../../utils/errors.js';
import { charLength, endsWithChars, isLocalRelativePath, joinUrl } from '../../utils/url.js';
import { nodeFilesystem, type FilesystemOps } from '../ports/filesystem.js';
import type { PathResolver } from '../ports/path-resolver.js';
import { mergeOptions, normalizeFileEntry, validateDefaultOptions } from './file-entry.js';

export interface RegistryView {
  getEntry(name: string): Readonly<RegistryEntry> | null;
}

export interface FileCollectorOptions {
  pathResolver: PathResolver;
  filesystem?: FilesystemOps;
  /** Asset path suffix -> replacement URL */
  assetMap?: Readonly<Record<string, string>>;
}

export interface CollectedFiles {
  scripts: Map<string, FileEntry>;
  styles: Map<string, FileEntry>;
}

export function createCollectedFiles(): CollectedFiles {
  return { scripts: new Map(), styles: new Map() };
}

export class FileCollector {
  private readonly pathResolver: PathResolver;
  private readonly filesystem: FilesystemOps;
  private readonly assetMap: ReadonlyArray<[string, string]>;

  constructor(
    private readonly registry: RegistryView,
    options: FileCollectorOptions
  ) {
    this.pathResolver = options.pathResolver;
    this.filesystem = options.filesystem ?? nodeFilesystem;
    this.assetMap = Object.entries(options.assetMap ?? {});
  }

  /**
   * Collect the files of `name` and its dependencies
   */
  async collect(name: string): Promise<CollectedFiles> {
    return this.collectMany([name]);
  }

  /**
   * Collect several roots into one result; a bundle shared by several roots is folded once
   */
  async collectMany(names: readonly string[]): Promise<CollectedFiles> {
    const files = createCollectedFiles();
    const visited = new Set<string>();
    for (const name of names) {
      await this.collectInto(name, files, visited);
    }
    return files;
  }

  /**
   * Resolve the public URL of one asset of a registered bundle
   */
  async resolveAssetUrl(bundle: BundleDefinition, url: string): Promise<string> {
    const candidate = bundle.sourcePath && isLocalRelativePath(url) ? joinUrl(bundle.sourcePath, url) : url;
    const mapped = this.lookupAssetMap(candidate);
    if (mapped !== null) {
      return this.pathResolver.resolveUrl(mapped);
    }

    if (bundle.cdn) {
      return bundle.baseUrl !== null && isLocalRelativePath(url)
        ? joinUrl(this.pathResolver.resolveUrl(bundle.baseUrl), url)
        : url;
    }

    if (!bundle.basePath || bundle.baseUrl === null) {
      throw new MissingConfigurationError(
        `Bundle '${bundle.name}' needs basePath and baseUrl to resolve '${url}'`,
        { bundleName: bundle.name, basePath: bundle.basePath, baseUrl: bundle.baseUrl }
      );
    }

    if (!isLocalRelativePath(url)) {
      return url;
    }

    const physicalPath = join(this.pathResolver.resolve(bundle.basePath), url);
    if (!(await this.filesystem.exists(physicalPath))) {
      throw new FileNotFoundError(physicalPath, { bundleName: bundle.name, url });
    }
    return joinUrl(this.pathResolver.resolveUrl(bundle.baseUrl), url);
  }

  private async collectInto(name: string, files: CollectedFiles, visited: Set<string>): Promise<void> {
    if (visited.has(name)) {
      return;
    }
    visited.add(name);

    const entry = this.registry.getEntry(name);
    if (!entry) {
      throw new BundleNotFoundError(name);
    }

    for (const dependency of entry.bundle.dependencies) {
      await this.collectInto(dependency, files, visited);
    }

    await this.collectAxis(entry, 'script', files.scripts);
    await this.collectAxis(entry, 'style', files.styles);
  }

  private async collectAxis(entry: Readonly<RegistryEntry>, axis: AssetAxis, target: Map<string, FileEntry>): Promise<void> {
    const { bundle } = entry;
    const rawEntries = axis === 'script' ? bundle.scripts : bundle.styles;
    if (rawEntries.length === 0) {
      return;
    }

    const defaults: FileOptions = validateDefaultOptions(
      bundle.name,
      axis === 'script' ? bundle.scriptOptions : bundle.styleOptions
    );
    const bundlePosition = axis === 'script' ? entry.scriptPosition : entry.stylePosition;

    for (const raw of rawEntries) {
      const normalized = normalizeFileEntry(bundle.name, raw);
      const url = await this.resolveAssetUrl(bundle, normalized.url);
      const key = normalized.key ?? url;

      if (target.has(key)) {
        logger.debug(`Replacing ${axis} entry '${key}' with the one from bundle '${bundle.name}'`);
      }

      target.set(key, {
        url,
        position: normalized.position ?? bundlePosition,
        options: mergeOptions(defaults, normalized.options)
      });
    }
  }

  /** Longest matching suffix wins */
  private lookupAssetMap(assetPath: string): string | null {
    let match: string | null = null;
    let matchLength = -1;
    for (const [from, to] of this.assetMap) {
      const length = charLength(from);
      if (length > matchLength && endsWithChars(assetPath, from)) {
        match = to;
        matchLength = length;
      }
    }
    return match;
  }
}
