/**
 * Process-wide record of published source directories, keyed by absolute source path.
 * Shared by every publisher derived from the same instance.
 */

import type { PublishedBundle } from '../../types/index.js';

export class PublishCache {
  private readonly published = new Map<string, PublishedBundle>();
  private readonly inflight = new Map<string, Promise<PublishedBundle>>();

  get(sourcePath: string): PublishedBundle | null {
    return this.published.get(sourcePath) ?? null;
  }

  has(sourcePath: string): boolean {
    return this.published.has(sourcePath);
  }

  get size(): number {
    return this.published.size;
  }

  /**
   * Return the recorded result for `sourcePath`, or run `publish` once and record it.
   * Callers arriving while a publish is running wait for that same publish.
   * A failed publish is not recorded; the next call tries again.
   */
  async getOrPublish(sourcePath: string, publish: () => Promise<PublishedBundle>): Promise<PublishedBundle> {
    const cached = this.published.get(sourcePath);
    if (cached) {
      return cached;
    }

    const existing = this.inflight.get(sourcePath);
    if (existing) {
      return existing;
    }

    const promise = publish().then((result) => {
      this.published.set(sourcePath, result);
      return result;
    });
    this.inflight.set(sourcePath, promise);

    try {
      return await promise;
    } finally {
      this.inflight.delete(sourcePath);
    }
  }

  entries(): IterableIterator<[string, PublishedBundle]> {
    return this.published.entries();
  }
}
