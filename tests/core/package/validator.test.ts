import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { lintPackage, type LintTarget } from '../../../src/core/package/validator.js';
import { createRecipe, type RecipeInit } from '../../../src/core/recipe.js';

function target(name: string, path: string, init: RecipeInit = {}, parentPackage: LintTarget | null = null): LintTarget {
  return { name, path, recipe: createRecipe({ name, ...init }), parentPackage };
}

describe('lintPackage', () => {
  it('accepts a well-formed package', () => {
    assert.deepEqual(lintPackage(target('clean', '/work/clean/', { configurations: [{ name: 'a' }, { name: 'b' }] })), []);
  });

  it('warns about a missing name', () => {
    assert.deepEqual(lintPackage(target('', '/work/anonymous/')), ['The package in /work/anonymous/ has no name.']);
  });

  it('warns once per duplicate configuration name', () => {
    const warnings = lintPackage(target('dup', '/work/dup/', {
      configurations: [{ name: 'default' }, { name: 'default' }, { name: 'other' }]
    }));
    assert.deepEqual(warnings, [
      'Multiple configurations with the name "default" are defined in package "dup". ' +
      'This will most likely cause configuration resolution issues.'
    ]);
  });

  it('warns about a sub-package license differing from its parent', () => {
    const parent = target('base', '/work/base/', { license: 'MIT' });
    const sub = target('base:sub', '/work/base/sub/', { license: 'GPL-3.0' }, parent);
    assert.deepEqual(lintPackage(sub), [
      'License in sub package base:sub is different than its parent package, this is discouraged.'
    ]);
  });

  it('ignores licenses of sub-packages sharing the parent location or declaring none', () => {
    const parent = target('base', '/work/base/', { license: 'MIT' });
    assert.deepEqual(lintPackage(target('base:inline', '/work/base/', { license: 'GPL-3.0' }, parent)), []);
    assert.deepEqual(lintPackage(target('base:plain', '/work/base/plain/', {}, parent)), []);
  });
});
