/**
 * Shared constants for the drecipe package model.
 * Single source of truth for file names, conventional directories and
 * other fixed vocabularies.
 */

export type RecipeFormat = 'json' | 'yaml';

export interface RecipeFileName {
  filename: string;
  format: RecipeFormat;
}

/**
 * Supported recipe files in decreasing order of preference.
 * The first entry is the file written by `storeInfo`.
 */
export const RECIPE_FILES: readonly RecipeFileName[] = [
  { filename: 'drecipe.json', format: 'json' },
  { filename: 'drecipe.yml', format: 'yaml' },
  { filename: 'drecipe.yaml', format: 'yaml' }
];

export const DEFAULT_RECIPE_FILENAME = RECIPE_FILES[0].filename;

export const DIR_PATTERNS = {
  METADATA: '.drecipe',
  GIT: '.git'
} as const;

export const FILE_PATTERNS = {
  VERSION_CACHE: 'version.json',
  SOURCE_EXTENSIONS: ['.d'],
  IMPORT_EXTENSIONS: ['.d', '.di']
} as const;

/**
 * Conventional directories probed when a recipe declares no paths.
 * Source directories are tried in order; the first existing one is used.
 */
export const DEFAULT_DIRS = {
  STRING_IMPORT: ['views'],
  SOURCE: ['source/', 'src/']
} as const;

/**
 * Entry-point file names probed inside each source path.
 * `{name}` is replaced by the package name.
 */
export const MAIN_FILE_CANDIDATES = ['app.d', 'main.d', '{name}/main.d', '{name}/app.d'] as const;

export const CONFIGURATION_NAMES = {
  APPLICATION: 'application',
  LIBRARY: 'library'
} as const;

/**
 * Pseudo build type that appends the `DFLAGS` environment value
 */
export const DFLAGS_BUILD_TYPE = '$DFLAGS';
