import { createHash } from 'crypto';
import { dirname } from 'path';
import { PUBLISH_DEFAULTS } from '../../constants/index.js';
import type { FilesystemOps } from '../ports/filesystem.js';

/**
 * Compute the published directory name for a source path.
 *
 * The name covers the source directory (the parent directory for a single
 * file), its modification time and the link mode, so an edited source gets a
 * new directory after a restart.
 */
export async function computeDirectoryHash(
  sourcePath: string,
  linkAssets: boolean,
  filesystem: FilesystemOps
): Promise<string> {
  const directory = (await filesystem.isFile(sourcePath)) ? dirname(sourcePath) : sourcePath;
  const mtime = await filesystem.lastModifiedTime(sourcePath);
  const input = `${directory}${mtime}|${linkAssets ? '1' : ''}`;
  return createHash('sha256').update(input).digest('hex').slice(0, PUBLISH_DEFAULTS.HASH_LENGTH);
}
