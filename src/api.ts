/**
 * Public API of the drecipe package model
 */

export * from './types/index.js';
export { Version } from './core/version.js';
export {
  ANY_PLATFORM,
  createBuildPlatform,
  detectHostPlatform,
  isAnyPlatform,
  matchesSpecification,
  type BuildPlatform
} from './core/platform.js';
export {
  BUILD_OPTIONS,
  BUILD_REQUIREMENTS,
  FlagSet,
  type BuildOption,
  type BuildRequirement
} from './core/flags.js';
export { BuildSettings } from './core/build-settings.js';
export {
  createBuildSettingsTemplate,
  createConfiguration,
  createRecipe,
  type RecipeInit
} from './core/recipe.js';
export { loadConfig, DEFAULT_CONFIG, type PackageModelConfig } from './core/config.js';
export { dmdCompiler, getCompiler, registerCompiler } from './core/compilers/index.js';
export { findSpecialCompilerFlags } from './core/compilers/special-flags.js';
export * from './core/ports/index.js';
export { GitSourceControl } from './core/scm/git-source-control.js';
export { VersionResolver, versionFromTag } from './core/scm/version-resolver.js';
export { createPackageContext, type PackageContext, type PackageContextOptions } from './core/package/context.js';
export { synthesizeDefaults } from './core/package/configuration-synthesizer.js';
export { BUILTIN_BUILD_TYPES } from './core/package/build-settings-resolver.js';
export { lintPackage } from './core/package/validator.js';
export {
  PackageEntity,
  type PackageCreateOptions,
  type PackageLoadOptions
} from './core/package/package.js';
export { parseRecipeObject, parseRecipeText, recipeToObject, serializeRecipe } from './utils/recipe-file.js';
export * from './utils/errors.js';
