/**
 * Node File System Adapter (Default)
 *
 * FileSystemPort backed by fs/promises through the shared fs utilities.
 */

import type { FileSystemPort } from './filesystem.js';
import {
  exists,
  isDirectory,
  readTextFile,
  walkFiles,
  writeTextFile,
  writeTextFileAtomic
} from '../../utils/fs.js';

export const nodeFileSystem: FileSystemPort = {
  exists,
  isDirectory,
  listFilesRecursive: walkFiles,
  readText: (path: string) => readTextFile(path),
  writeText: (path: string, content: string) => writeTextFile(path, content),
  writeTextAtomic: writeTextFileAtomic
};
