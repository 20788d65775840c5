/**
 * Path Resolver Port
 *
 * Resolves alias-prefixed (`@assets/js`) or relative paths used in bundle
 * definitions and configuration.
 */

import { isAbsolute, resolve } from 'path';
import { ALIAS_PREFIX } from '../../constants/index.js';
import { MissingConfigurationError } from '../../utils/errors.js';

export interface PathResolver {
  /** Resolve a filesystem path or alias to an absolute path */
  resolve(aliasOrPath: string): string;
  /** Replace a leading alias in a URL; other URLs are returned unchanged */
  resolveUrl(aliasOrUrl: string): string;
}

/**
 * Resolver backed by a static alias table. Alias values may themselves
 * start with another alias.
 */
export class AliasPathResolver implements PathResolver {
  private readonly aliases: ReadonlyMap<string, string>;

  constructor(
    private readonly rootDir: string,
    aliases: Readonly<Record<string, string>> = {}
  ) {
    this.aliases = new Map(
      Object.entries(aliases).map(([name, value]) => [
        name.startsWith(ALIAS_PREFIX) ? name : `${ALIAS_PREFIX}${name}`,
        value.replace(/\/+$/, '')
      ])
    );
  }

  resolve(aliasOrPath: string): string {
    const expanded = this.expand(aliasOrPath);
    return isAbsolute(expanded) ? resolve(expanded) : resolve(this.rootDir, expanded);
  }

  resolveUrl(aliasOrUrl: string): string {
    return this.expand(aliasOrUrl);
  }

  /** Alias table with normalized names, for diagnostics */
  getAliases(): Record<string, string> {
    return Object.fromEntries(this.aliases);
  }

  private expand(value: string, seen: Set<string> = new Set()): string {
    if (!value.startsWith(ALIAS_PREFIX)) {
      return value;
    }

    const slash = value.indexOf('/');
    const alias = slash === -1 ? value : value.slice(0, slash);
    const rest = slash === -1 ? '' : value.slice(slash);
    const target = this.aliases.get(alias);

    if (target === undefined) {
      throw new MissingConfigurationError(`Unknown path alias '${alias}'`, {
        alias,
        known: [...this.aliases.keys()]
      });
    }
    if (seen.has(alias)) {
      throw new MissingConfigurationError(`Path alias '${alias}' refers to itself`, { alias });
    }
    seen.add(alias);

    return this.expand(`${target}${rest}`, seen);
  }
}
