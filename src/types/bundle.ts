/**
 * Bundle, registry and file entry types shared by the loader, the resolver,
 * the publisher and the collector.
 */

/** Option map attached to a script or style entry (e.g. `{ defer: true }`). */
export type FileOptions = Readonly<Record<string, unknown>>;

/**
 * A script or style entry as declared on a bundle:
 * - `'js/app.js'`
 * - `['js/app.js', { defer: true }]`
 * - `{ url: 'js/app.js', key: 'app', position: 3, options: { defer: true } }`
 */
export type RawFileEntry =
  | string
  | readonly [string]
  | readonly [string, FileOptions]
  | FileEntryObject;

export interface FileEntryObject {
  url: string;
  /** Key used in the output map instead of the resolved URL */
  key?: string;
  /** Overrides the bundle position for this entry only */
  position?: number;
  options?: FileOptions;
}

export type AssetAxis = 'script' | 'style';

export interface PublishOptions {
  /**
   * Copy the source directory even when the destination already exists.
   * Left unset, the publisher-wide setting applies.
   */
  forceCopy?: boolean;
  /** Glob patterns (relative to the source) a copied file must match */
  only?: readonly string[];
  /** Glob patterns (relative to the source) excluded from copying */
  except?: readonly string[];
}

export interface BundleDefinition {
  readonly name: string;
  readonly dependencies: readonly string[];
  readonly scripts: readonly RawFileEntry[];
  readonly styles: readonly RawFileEntry[];
  readonly scriptOptions: FileOptions;
  readonly styleOptions: FileOptions;
  /** Directory (or alias) holding the bundle sources; null when nothing is published */
  readonly sourcePath: string | null;
  /** Output root before publishing, published directory afterwards */
  readonly basePath: string | null;
  /** URL matching {@link basePath} */
  readonly baseUrl: string | null;
  /** Assets are served from an external host: no publishing, no disk checks */
  readonly cdn: boolean;
  readonly scriptPosition: number | null;
  readonly stylePosition: number | null;
  readonly publishOptions: Readonly<PublishOptions>;
}

/** Fields accepted when declaring a bundle; everything but the name has a default. */
export type BundleInit = { name: string } & Partial<Omit<BundleDefinition, 'name'>>;

/** Per-name override applied by the bundle store; `false` replaces the bundle with an empty one. */
export type BundleCustomization = Partial<Omit<BundleDefinition, 'name'>> | BundleDefinition | false;

export interface RegistryEntry {
  bundle: BundleDefinition;
  scriptPosition: number | null;
  stylePosition: number | null;
}

export interface FileEntry {
  url: string;
  position: number | null;
  options: FileOptions;
}

export interface PublishedBundle {
  path: string;
  url: string;
}

/** Produces the published directory name for a source path. */
export type HashCallback = (path: string) => string;
