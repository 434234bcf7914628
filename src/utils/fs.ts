import { promises as fs, constants as fsConstants, type Dirent } from 'fs';
import type { FileHandle } from 'fs/promises';
import { join, dirname } from 'path';
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
 * Recursively create directories
 */
export async function ensureDir(path: string): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true });
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
 * Write text to a file, truncating it first.
 * The handle is closed before this returns, whether or not the write succeeded.
 */
export async function writeTextFile(path: string, content: string, encoding: BufferEncoding = 'utf8'): Promise<void> {
  await ensureDir(dirname(path));
  let handle: FileHandle;
  try {
    handle = await fs.open(path, 'w');
  } catch (error) {
    throw new FileSystemError(`Failed to open file for writing: ${path}`, { path, error });
  }
  try {
    await handle.writeFile(content, encoding);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  } finally {
    await handle.close();
  }
}

/**
 * Write a file through a temporary sibling and rename it into place
 */
export async function writeTextFileAtomic(path: string, content: string): Promise<void> {
  const tempPath = `${path}.${process.pid}.tmp`;
  await writeTextFile(tempPath, content);
  try {
    await fs.rename(tempPath, path);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw new FileSystemError(`Failed to replace file: ${path}`, { path, error });
  }
}

/**
 * List every file below a directory, depth first, as absolute paths.
 * Entries whose name starts with a dot and junk files (.DS_Store, Thumbs.db)
 * are skipped; dot-directories are not descended into.
 */
export async function walkFiles(root: string): Promise<string[]> {
  const results: string[] = [];
  const pending: string[] = [root];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;

    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      throw new FileSystemError(`Failed to list directory: ${dir}`, { dir, error });
    }

    const subdirs: string[] = [];
    for (const entry of entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))) {
      if (entry.name.startsWith('.') || isJunk(entry.name)) continue;
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        subdirs.push(fullPath);
      } else if (entry.isFile()) {
        results.push(fullPath);
      }
    }
    // reversed so that pop() visits subdirectories alphabetically
    pending.push(...subdirs.reverse());
  }

  return results;
}
