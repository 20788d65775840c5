/**
 * URL helpers for asset entries
 */

/**
 * A URL is relative unless it is protocol-relative (`//cdn...`) or carries a scheme (`https://`)
 */
export function isRelativeUrl(url: string): boolean {
  return !url.startsWith('//') && !url.includes('://');
}

/**
 * Relative URL that also isn't rooted at the host (`/js/app.js`), i.e. a path inside a bundle
 */
export function isLocalRelativePath(url: string): boolean {
  return isRelativeUrl(url) && !url.startsWith('/');
}

/**
 * Join a base URL (or path) and a relative part with exactly one slash
 */
export function joinUrl(base: string, relative: string): string {
  const trimmedBase = base.replace(/\/+$/, '');
  const trimmedRelative = relative.replace(/^\/+/, '');
  if (trimmedBase === '') {
    return base.startsWith('/') ? `/${trimmedRelative}` : trimmedRelative;
  }
  return `${trimmedBase}/${trimmedRelative}`;
}

/**
 * True when `value` ends with `suffix`, comparing by code points so multi-byte
 * characters are never split
 */
export function endsWithChars(value: string, suffix: string): boolean {
  const valueChars = Array.from(value);
  const suffixChars = Array.from(suffix);
  if (suffixChars.length > valueChars.length) {
    return false;
  }
  return valueChars.slice(valueChars.length - suffixChars.length).join('') === suffix;
}

/**
 * Length in code points
 */
export function charLength(value: string): number {
  return Array.from(value).length;
}
