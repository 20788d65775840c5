/**
 * Dependency resolver.
 *
 * Registers a bundle and its dependency closure into an insertion-ordered
 * registry where every dependency precedes its dependents, detecting cycles
 * and propagating minimum script/style positions down the graph.
 *
 * A failed `register` call keeps whatever it registered before the failure;
 * the registry is not rolled back.
 */

import type {
  AssetAxis,
  BundleDefinition,
  PublishedBundle,
  RegistryEntry
} from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { CircularDependencyError, PositionConflictError } from '../../utils/errors.js';
import type { BundleStore } from '../bundle/bundle-store.js';
import { withBundleChanges } from '../bundle/bundle-definition.js';

export interface BundlePublisher {
  publish(bundle: BundleDefinition): Promise<PublishedBundle>;
}

const POSITION_FIELD = {
  script: 'scriptPosition',
  style: 'stylePosition'
} as const satisfies Record<AssetAxis, keyof RegistryEntry>;

export class DependencyResolver {
  private readonly registry = new Map<string, RegistryEntry>();
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly store: BundleStore,
    private readonly publisher: BundlePublisher | null = null
  ) {}

  /**
   * Register `name` and everything it depends on.
   * Calls on the same resolver run one after another.
   */
  register(name: string, scriptPosition: number | null = null, stylePosition: number | null = null): Promise<void> {
    return this.exclusive(() => this.registerBundle(name, scriptPosition, stylePosition, new Set()));
  }

  isRegistered(name: string): boolean {
    return this.registry.has(name);
  }

  getEntry(name: string): Readonly<RegistryEntry> | null {
    return this.registry.get(name) ?? null;
  }

  /** Registered bundles, dependencies before dependents */
  getRegistry(): ReadonlyMap<string, Readonly<RegistryEntry>> {
    return this.registry;
  }

  getRegisteredNames(): string[] {
    return [...this.registry.keys()];
  }

  private async registerBundle(
    name: string,
    scriptPosition: number | null,
    stylePosition: number | null,
    visiting: Set<string>
  ): Promise<void> {
    if (visiting.has(name)) {
      throw new CircularDependencyError(name, cyclePath(visiting, name));
    }

    let entry = this.registry.get(name);
    if (!entry) {
      const bundle = await this.publishBundle(await this.store.load(name));
      const created: RegistryEntry = {
        bundle,
        scriptPosition: bundle.scriptPosition,
        stylePosition: bundle.stylePosition
      };

      visiting.add(name);
      try {
        for (const dependency of bundle.dependencies) {
          await this.registerBundle(dependency, created.scriptPosition, created.stylePosition, visiting);
        }
      } finally {
        visiting.delete(name);
      }

      this.registry.set(name, created);
      logger.debug(`Registered bundle '${name}'`, { order: this.registry.size });
      entry = created;
    }

    const scriptChanged = tightenPosition(entry, 'script', scriptPosition);
    const styleChanged = tightenPosition(entry, 'style', stylePosition);

    if (scriptChanged || styleChanged) {
      for (const dependency of entry.bundle.dependencies) {
        await this.registerBundle(dependency, entry.scriptPosition, entry.stylePosition, visiting);
      }
    }
  }

  private async publishBundle(bundle: BundleDefinition): Promise<BundleDefinition> {
    if (bundle.cdn || !this.publisher || !bundle.sourcePath) {
      return bundle;
    }
    const { path, url } = await this.publisher.publish(bundle);
    return withBundleChanges(bundle, { basePath: path, baseUrl: url });
  }

  private async exclusive<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.queue;
    let release: () => void = () => {};
    this.queue = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      return await task();
    } finally {
      release();
    }
  }
}

/**
 * Apply a required minimum position to one axis of an entry.
 * Returns true when the entry position changed.
 */
function tightenPosition(entry: RegistryEntry, axis: AssetAxis, required: number | null): boolean {
  if (required === null) {
    return false;
  }

  const field = POSITION_FIELD[axis];
  const current = entry[field];

  if (current === null || current < required) {
    entry[field] = required;
    return true;
  }
  if (current > required) {
    throw new PositionConflictError(entry.bundle.name, axis, current, required);
  }
  return false;
}

function cyclePath(visiting: Set<string>, name: string): string[] {
  const stack = [...visiting];
  return stack.slice(stack.indexOf(name));
}
