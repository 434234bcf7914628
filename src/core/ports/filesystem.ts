/**
 * File System Port Interface
 *
 * The package model only needs a handful of file-system operations:
 * existence checks, directory scans and small text reads and writes.
 * Tests and embedders may substitute their own implementation.
 */

export interface FileSystemPort {
  exists(path: string): Promise<boolean>;

  isDirectory(path: string): Promise<boolean>;

  /** Every regular file below `dir`, as absolute paths, in a stable order */
  listFilesRecursive(dir: string): Promise<string[]>;

  readText(path: string): Promise<string>;

  /** Create or truncate `path` and write `content`; parent directories are created */
  writeText(path: string, content: string): Promise<void>;

  /** Replace `path` so that readers never observe a partially written file */
  writeTextAtomic(path: string, content: string): Promise<void>;
}
