/**
 * Bundle definition factory.
 * Definitions are frozen values; derived copies go through withBundleChanges.
 */

import type { BundleDefinition, BundleInit, FileOptions } from '../../types/index.js';

const EMPTY_OPTIONS: FileOptions = Object.freeze({});

const DEFINITIONS = new WeakSet<object>();

export function createBundleDefinition(init: BundleInit): BundleDefinition {
  const definition: BundleDefinition = Object.freeze({
    name: init.name,
    dependencies: Object.freeze([...(init.dependencies ?? [])]),
    scripts: Object.freeze([...(init.scripts ?? [])]),
    styles: Object.freeze([...(init.styles ?? [])]),
    scriptOptions: Object.freeze({ ...(init.scriptOptions ?? EMPTY_OPTIONS) }),
    styleOptions: Object.freeze({ ...(init.styleOptions ?? EMPTY_OPTIONS) }),
    sourcePath: init.sourcePath ?? null,
    basePath: init.basePath ?? null,
    baseUrl: init.baseUrl ?? null,
    cdn: init.cdn ?? false,
    scriptPosition: init.scriptPosition ?? null,
    stylePosition: init.stylePosition ?? null,
    publishOptions: Object.freeze({ ...(init.publishOptions ?? {}) })
  });
  DEFINITIONS.add(definition);
  return definition;
}

/**
 * Return a new definition with the given fields replaced
 */
export function withBundleChanges(
  bundle: BundleDefinition,
  changes: Partial<Omit<BundleDefinition, 'name'>>
): BundleDefinition {
  return createBundleDefinition({ ...bundle, ...changes });
}

/**
 * True for values produced by createBundleDefinition
 */
export function isBundleDefinition(value: unknown): value is BundleDefinition {
  return typeof value === 'object' && value !== null && DEFINITIONS.has(value);
}

/**
 * Empty stand-in used when a bundle is disabled through customization
 */
export function createDummyBundle(name: string): BundleDefinition {
  return createBundleDefinition({ name });
}
