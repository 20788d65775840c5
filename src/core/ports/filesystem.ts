/**
 * Filesystem Port
 *
 * The publisher and the file collector reach the disk only through this
 * interface, so tests can count or fake individual operations.
 */

import {
  exists,
  isFile,
  getStats,
  ensureDir,
  copyDirectory,
  createSymlink,
  type CopyDirectoryOptions
} from '../../utils/fs.js';

export interface FilesystemOps {
  exists(path: string): Promise<boolean>;
  isFile(path: string): Promise<boolean>;
  /** Last modification time in milliseconds since the epoch, truncated to an integer */
  lastModifiedTime(path: string): Promise<number>;
  ensureDirectory(path: string, mode: number): Promise<void>;
  copyDirectory(src: string, dest: string, options?: CopyDirectoryOptions): Promise<void>;
  createSymlink(src: string, dest: string): Promise<void>;
}

export const nodeFilesystem: FilesystemOps = {
  exists,
  isFile,
  async lastModifiedTime(path: string): Promise<number> {
    const stats = await getStats(path);
    return Math.trunc(stats.mtimeMs);
  },
  ensureDirectory(path: string, mode: number): Promise<void> {
    return ensureDir(path, mode);
  },
  async copyDirectory(src: string, dest: string, options?: CopyDirectoryOptions): Promise<void> {
    await copyDirectory(src, dest, options);
  },
  createSymlink
};
