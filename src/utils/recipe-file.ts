import * as yaml from 'js-yaml';
import { parse as parseJsonc, printParseErrorCode, type ParseError } from 'jsonc-parser';

import type {
  BuildSettingsTemplate,
  ConfigurationInfo,
  Dependency,
  PackageRecipe,
  PlatformKeyed,
  SubPackage
} from '../types/index.js';
import {
  isTargetType,
  TEMPLATE_LIST_FIELDS,
  TEMPLATE_SCALAR_FIELDS,
  type TemplateListField,
  type TemplateScalarField
} from '../types/index.js';
import type { RecipeFormat } from '../constants/index.js';
import { isBuildOption, isBuildRequirement } from '../core/flags.js';
import { createBuildSettingsTemplate, createRecipe } from '../core/recipe.js';
import { InvalidRecipeError } from './errors.js';
import { logger } from './logger.js';

/**
 * Conversion between recipe files and the recipe model.
 *
 * Platform-specific entries are written as `<field><suffix>`, for example
 * `dflags-linux-dmd` or `sourcePaths-windows`.
 */

type JsonObject = Record<string, unknown>;

const RECIPE_KEYS = new Set([
  'name', 'version', 'description', 'homepage', 'authors', 'copyright', 'license',
  'configurations', 'buildTypes', 'subPackages'
]);

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function expectString(value: unknown, field: string): string {
  if (typeof value !== 'string') {
    throw new InvalidRecipeError(`field "${field}" must be a string`, { field });
  }
  return value;
}

function expectStringArray(value: unknown, field: string): string[] {
  if (!Array.isArray(value)) {
    throw new InvalidRecipeError(`field "${field}" must be an array of strings`, { field });
  }
  return value.map((entry, index) => expectString(entry, `${field}[${index}]`));
}

function expectObject(value: unknown, field: string): JsonObject {
  if (!isJsonObject(value)) {
    throw new InvalidRecipeError(`field "${field}" must be an object`, { field });
  }
  return value;
}

function isListField(name: string): name is TemplateListField {
  return (TEMPLATE_LIST_FIELDS as readonly string[]).includes(name);
}

function isScalarField(name: string): name is TemplateScalarField {
  return (TEMPLATE_SCALAR_FIELDS as readonly string[]).includes(name);
}

/**
 * Fields that hold a single value for every platform
 */
function isUniversalField(field: string): boolean {
  return field === 'dependencies' || field === 'targetType' || field === 'subConfigurations' || isScalarField(field);
}

/**
 * Split `dflags-linux-dmd` into `['dflags', '-linux-dmd']`
 */
function splitPlatformKey(key: string): [string, string] {
  const dash = key.indexOf('-');
  return dash < 0 ? [key, ''] : [key.slice(0, dash), key.slice(dash)];
}

function parseDependency(value: unknown, field: string): Dependency {
  if (typeof value === 'string') return { version: value };
  const spec = expectObject(value, field);
  const dependency: Dependency = {};
  if (spec.version !== undefined) dependency.version = expectString(spec.version, `${field}.version`);
  if (spec.path !== undefined) dependency.path = expectString(spec.path, `${field}.path`);
  if (spec.optional !== undefined) dependency.optional = spec.optional === true;
  if (spec.default !== undefined) dependency.default = spec.default === true;
  if (dependency.version === undefined && dependency.path === undefined) {
    throw new InvalidRecipeError(`dependency "${field}" must specify a version or a path`, { field });
  }
  return dependency;
}

function parseTemplate(source: JsonObject, basePackageName: string, context: string): BuildSettingsTemplate {
  const template = createBuildSettingsTemplate();

  for (const [key, value] of Object.entries(source)) {
    if (RECIPE_KEYS.has(key) || key === 'platforms') continue;
    const [field, suffix] = splitPlatformKey(key);
    if (suffix && isUniversalField(field)) {
      throw new InvalidRecipeError(`${field} does not support platform customization (found "${key}" in ${context})`, { key });
    }

    if (field === 'dependencies') {
      for (const [name, spec] of Object.entries(expectObject(value, key))) {
        const fullName = name.startsWith(':') ? `${basePackageName}${name}` : name;
        template.dependencies[fullName] = parseDependency(spec, `${key}.${name}`);
      }
    } else if (field === 'targetType') {
      const targetType = expectString(value, key);
      if (!isTargetType(targetType)) {
        throw new InvalidRecipeError(`unknown target type "${targetType}" in ${context}`, { targetType });
      }
      template.targetType = targetType;
    } else if (isScalarField(field)) {
      template[field] = expectString(value, key);
    } else if (field === 'subConfigurations') {
      for (const [name, configuration] of Object.entries(expectObject(value, key))) {
        const fullName = name.startsWith(':') ? `${basePackageName}${name}` : name;
        template.subConfigurations[fullName] = expectString(configuration, `${key}.${name}`);
      }
    } else if (isListField(field)) {
      template[field][suffix] = expectStringArray(value, key);
    } else if (field === 'buildRequirements') {
      template.buildRequirements[suffix] = expectStringArray(value, key).map(entry => {
        if (!isBuildRequirement(entry)) throw new InvalidRecipeError(`unknown build requirement "${entry}"`, { entry });
        return entry;
      });
    } else if (field === 'buildOptions') {
      template.buildOptions[suffix] = expectStringArray(value, key).map(entry => {
        if (!isBuildOption(entry)) throw new InvalidRecipeError(`unknown build option "${entry}"`, { entry });
        return entry;
      });
    } else {
      logger.debug(`Ignoring unknown recipe field "${key}" in ${context}`);
    }
  }

  return template;
}

/**
 * Convert a parsed recipe document into the recipe model.
 *
 * @param parentName - qualified name of the enclosing package, for sub-packages
 */
export function parseRecipeObject(source: unknown, parentName = ''): PackageRecipe {
  const document = expectObject(source, 'recipe');
  const recipe = createRecipe();

  if (document.name !== undefined) recipe.name = expectString(document.name, 'name');
  if (document.version !== undefined) recipe.version = expectString(document.version, 'version');
  if (document.description !== undefined) recipe.description = expectString(document.description, 'description');
  if (document.homepage !== undefined) recipe.homepage = expectString(document.homepage, 'homepage');
  if (document.authors !== undefined) recipe.authors = expectStringArray(document.authors, 'authors');
  if (document.copyright !== undefined) recipe.copyright = expectString(document.copyright, 'copyright');
  if (document.license !== undefined) recipe.license = expectString(document.license, 'license');

  const fullName = parentName ? `${parentName}:${recipe.name}` : recipe.name;
  const basePackageName = fullName.split(':')[0];

  recipe.buildSettings = parseTemplate(document, basePackageName, fullName || 'recipe');

  if (document.configurations !== undefined) {
    if (!Array.isArray(document.configurations)) {
      throw new InvalidRecipeError('field "configurations" must be an array');
    }
    recipe.configurations = document.configurations.map((entry, index): ConfigurationInfo => {
      const configuration = expectObject(entry, `configurations[${index}]`);
      const name = expectString(configuration.name, `configurations[${index}].name`);
      return {
        name,
        platforms: configuration.platforms === undefined
          ? []
          : expectStringArray(configuration.platforms, `configurations[${index}].platforms`),
        buildSettings: parseTemplate(configuration, basePackageName, `configuration "${name}"`)
      };
    });
  }

  if (document.buildTypes !== undefined) {
    for (const [name, entry] of Object.entries(expectObject(document.buildTypes, 'buildTypes'))) {
      recipe.buildTypes[name] = parseTemplate(expectObject(entry, `buildTypes.${name}`), basePackageName, `build type "${name}"`);
    }
  }

  if (document.subPackages !== undefined) {
    if (!Array.isArray(document.subPackages)) {
      throw new InvalidRecipeError('field "subPackages" must be an array');
    }
    recipe.subPackages = document.subPackages.map((entry, index): SubPackage => {
      if (typeof entry === 'string') return { kind: 'path', path: entry };
      return { kind: 'inline', recipe: parseRecipeObject(expectObject(entry, `subPackages[${index}]`), fullName) };
    });
  }

  return recipe;
}

function writePlatformKeyed<T>(target: JsonObject, field: string, map: PlatformKeyed<T>): void {
  for (const [suffix, values] of Object.entries(map)) {
    target[`${field}${suffix}`] = [...values];
  }
}

function templateToObject(template: BuildSettingsTemplate, target: JsonObject): JsonObject {
  if (Object.keys(template.dependencies).length > 0) {
    const dependencies: JsonObject = {};
    for (const [name, spec] of Object.entries(template.dependencies)) {
      const simple = spec.version !== undefined && spec.path === undefined && !spec.optional && !spec.default;
      dependencies[name] = simple ? spec.version : { ...spec };
    }
    target.dependencies = dependencies;
  }
  if (template.targetType !== 'autodetect') target.targetType = template.targetType;
  for (const field of TEMPLATE_SCALAR_FIELDS) {
    if (template[field]) target[field] = template[field];
  }
  if (Object.keys(template.subConfigurations).length > 0) {
    target.subConfigurations = { ...template.subConfigurations };
  }
  for (const field of TEMPLATE_LIST_FIELDS) {
    writePlatformKeyed(target, field, template[field]);
  }
  writePlatformKeyed(target, 'buildRequirements', template.buildRequirements);
  writePlatformKeyed(target, 'buildOptions', template.buildOptions);
  return target;
}

/**
 * Convert a recipe into a plain document, omitting unset fields
 */
export function recipeToObject(recipe: PackageRecipe): JsonObject {
  const document: JsonObject = { name: recipe.name };
  if (recipe.version) document.version = recipe.version;
  if (recipe.description) document.description = recipe.description;
  if (recipe.homepage) document.homepage = recipe.homepage;
  if (recipe.authors.length > 0) document.authors = [...recipe.authors];
  if (recipe.copyright) document.copyright = recipe.copyright;
  if (recipe.license) document.license = recipe.license;

  templateToObject(recipe.buildSettings, document);

  if (recipe.configurations.length > 0) {
    document.configurations = recipe.configurations.map(configuration => {
      const entry: JsonObject = { name: configuration.name };
      if (configuration.platforms.length > 0) entry.platforms = [...configuration.platforms];
      return templateToObject(configuration.buildSettings, entry);
    });
  }

  if (Object.keys(recipe.buildTypes).length > 0) {
    const buildTypes: JsonObject = {};
    for (const [name, template] of Object.entries(recipe.buildTypes)) {
      buildTypes[name] = templateToObject(template, {});
    }
    document.buildTypes = buildTypes;
  }

  if (recipe.subPackages.length > 0) {
    document.subPackages = recipe.subPackages.map(sub =>
      sub.kind === 'path' ? sub.path : recipeToObject(sub.recipe)
    );
  }

  return document;
}

/**
 * Pretty-printed JSON text of a recipe
 */
export function serializeRecipe(recipe: PackageRecipe): string {
  return `${JSON.stringify(recipeToObject(recipe), null, 2)}\n`;
}

/**
 * Parse recipe file content in the given format
 */
export function parseRecipeText(content: string, format: RecipeFormat, parentName = '', source = 'recipe'): PackageRecipe {
  let document: unknown;
  if (format === 'json') {
    const errors: ParseError[] = [];
    document = parseJsonc(content, errors, { allowTrailingComma: true });
    if (errors.length > 0) {
      const first = errors[0];
      throw new InvalidRecipeError(
        `${source}: ${printParseErrorCode(first.error)} at offset ${first.offset}`,
        { source }
      );
    }
  } else {
    try {
      document = yaml.load(content);
    } catch (error) {
      throw new InvalidRecipeError(`${source}: ${error instanceof Error ? error.message : String(error)}`, { source });
    }
  }
  return parseRecipeObject(document, parentName);
}
