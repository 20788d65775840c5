import { promises as fs, constants as fsConstants, Stats } from 'fs';
import { join, dirname, relative, sep } from 'path';
import { parse as parseJsonc, ParseError, printParseErrorCode } from 'jsonc-parser';
import { isJunk } from 'junk';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';

/**
 * File system utilities with proper error handling
 */

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Check if a path is a file
 */
export async function isFile(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Recursively create directories
 */
export async function ensureDir(path: string, mode?: number): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true, mode });
    logger.debug(`Directory located or created: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path, error });
  }
}

/**
 * Read a file as text
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Get file stats
 */
export async function getStats(path: string): Promise<Stats> {
  try {
    return await fs.stat(path);
  } catch (error) {
    throw new FileSystemError(`Failed to get stats for: ${path}`, { path, error });
  }
}

/**
 * Read a JSON or JSONC file (auto-detect format) and parse it
 */
export async function readJsonOrJsoncFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  const errors: ParseError[] = [];
  const result: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const first = errors[0];
    throw new FileSystemError(
      `Failed to parse JSON/JSONC file: ${path} (${printParseErrorCode(first.error)} at offset ${first.offset})`,
      { path, errors }
    );
  }
  return result;
}

/**
 * Recursively walk a directory and yield file paths relative to it, using '/' separators.
 * Junk files (.DS_Store, Thumbs.db, ...) are skipped.
 */
export async function* walkRelativeFiles(root: string, dirPath: string = root): AsyncGenerator<string> {
  let entries;
  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    throw new FileSystemError(`Failed to walk directory: ${dirPath}`, { dirPath, error });
  }

  for (const entry of entries) {
    if (isJunk(entry.name)) {
      continue;
    }

    const fullPath = join(dirPath, entry.name);
    if (entry.isFile()) {
      yield relative(root, fullPath).split(sep).join('/');
    } else if (entry.isDirectory()) {
      yield* walkRelativeFiles(root, fullPath);
    }
  }
}

export interface CopyDirectoryOptions {
  /** Mode for created directories */
  dirMode?: number;
  /** Mode applied to every copied file */
  fileMode?: number;
  /** Return false to skip a file (path relative to the source, '/' separated) */
  filter?: (relativePath: string) => boolean;
}

/**
 * Copy a directory tree (or a single file) to a destination.
 * Returns the number of files copied.
 */
export async function copyDirectory(src: string, dest: string, options: CopyDirectoryOptions = {}): Promise<number> {
  const { dirMode, fileMode, filter } = options;

  if (await isFile(src)) {
    await ensureDir(dirname(dest), dirMode);
    await copyOne(src, dest, fileMode);
    return 1;
  }

  await ensureDir(dest, dirMode);
  let copied = 0;
  for await (const relPath of walkRelativeFiles(src)) {
    if (filter && !filter(relPath)) {
      logger.debug(`Skipping filtered file: ${relPath}`);
      continue;
    }
    const target = join(dest, relPath);
    await ensureDir(dirname(target), dirMode);
    await copyOne(join(src, relPath), target, fileMode);
    copied++;
  }

  logger.debug(`Copied ${copied} file(s): ${src} -> ${dest}`);
  return copied;
}

async function copyOne(src: string, dest: string, mode?: number): Promise<void> {
  try {
    await fs.copyFile(src, dest);
    if (mode !== undefined) {
      await fs.chmod(dest, mode);
    }
  } catch (error) {
    throw new FileSystemError(`Failed to copy file: ${src} -> ${dest}`, { src, dest, error });
  }
}

/**
 * Create a symbolic link at `dest` pointing to `src`.
 * Errors from the link call are rethrown unchanged so callers can inspect them.
 */
export async function createSymlink(src: string, dest: string): Promise<void> {
  const type = (await isDirectory(src)) ? 'dir' : 'file';
  await fs.symlink(src, dest, type);
  logger.debug(`Linked: ${dest} -> ${src}`);
}
