/**
 * Bundle loaders: where definitions come from before the store caches them.
 *
 * - FactoryBundleLoader: definitions registered in code at startup
 * - ManifestBundleLoader: definitions declared in an assets.yml manifest
 */

import * as yaml from 'js-yaml';
import { dirname, isAbsolute, resolve } from 'path';
import type { BundleDefinition, BundleInit } from '../../types/index.js';
import { ALIAS_PREFIX } from '../../constants/index.js';
import { readTextFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { BundleNotFoundError, InvalidBundleError } from '../../utils/errors.js';
import { parseBundleFields } from '../../utils/validation/bundle.js';
import { isPlainObject } from '../collect/file-entry.js';
import { createBundleDefinition } from './bundle-definition.js';

export interface BundleLoader {
  load(name: string): Promise<BundleDefinition>;
}

export type BundleFactory = () => BundleDefinition | Promise<BundleDefinition>;

/**
 * Name-to-factory registry populated at startup
 */
export class FactoryBundleLoader implements BundleLoader {
  private readonly factories = new Map<string, BundleFactory>();

  constructor(factories: Record<string, BundleFactory> = {}) {
    for (const [name, factory] of Object.entries(factories)) {
      this.define(name, factory);
    }
  }

  define(name: string, factory: BundleFactory): this {
    this.factories.set(name, factory);
    return this;
  }

  /** Shorthand for a factory returning a fixed declaration */
  defineBundle(init: BundleInit): this {
    const definition = createBundleDefinition(init);
    return this.define(init.name, () => definition);
  }

  has(name: string): boolean {
    return this.factories.has(name);
  }

  async load(name: string): Promise<BundleDefinition> {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new BundleNotFoundError(name);
    }
    const bundle = await factory();
    if (bundle.name !== name) {
      throw new InvalidBundleError(name, `factory returned bundle '${bundle.name}'`);
    }
    return bundle;
  }
}

/**
 * Loads bundles from a YAML manifest of the form:
 *
 * ```yaml
 * bundles:
 *   app:
 *     sourcePath: ./resources/app
 *     dependencies: [jquery]
 *     scripts: [js/app.js]
 * ```
 *
 * Relative source paths resolve against the manifest directory.
 */
export class ManifestBundleLoader implements BundleLoader {
  private declarations: Promise<Map<string, unknown>> | null = null;

  constructor(private readonly manifestPath: string) {}

  async load(name: string): Promise<BundleDefinition> {
    const declarations = await this.readDeclarations();
    if (!declarations.has(name)) {
      throw new BundleNotFoundError(name);
    }

    const fields = parseBundleFields(name, declarations.get(name));
    if (typeof fields.sourcePath === 'string') {
      fields.sourcePath = this.resolveSourcePath(fields.sourcePath);
    }

    return createBundleDefinition({ name, ...fields });
  }

  async listBundleNames(): Promise<string[]> {
    return [...(await this.readDeclarations()).keys()];
  }

  private resolveSourcePath(sourcePath: string): string {
    if (sourcePath.startsWith(ALIAS_PREFIX) || isAbsolute(sourcePath)) {
      return sourcePath;
    }
    return resolve(dirname(this.manifestPath), sourcePath);
  }

  private readDeclarations(): Promise<Map<string, unknown>> {
    this.declarations ??= this.parseManifest();
    return this.declarations;
  }

  private async parseManifest(): Promise<Map<string, unknown>> {
    const content = await readTextFile(this.manifestPath);
    let parsed: unknown;
    try {
      parsed = yaml.load(content);
    } catch (error) {
      throw new InvalidBundleError(this.manifestPath, `failed to parse manifest: ${error}`);
    }

    if (!isPlainObject(parsed) || !isPlainObject(parsed.bundles)) {
      throw new InvalidBundleError(this.manifestPath, `manifest must contain a 'bundles' map`);
    }

    const declarations = new Map(Object.entries(parsed.bundles));
    logger.debug(`Read ${declarations.size} bundle declaration(s) from ${this.manifestPath}`);
    return declarations;
  }
}
