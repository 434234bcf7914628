import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'path';

import { PackageEntity } from '../../../src/core/package/package.js';
import { BUILTIN_BUILD_TYPES } from '../../../src/core/package/build-settings-resolver.js';
import { createRecipe, type RecipeInit } from '../../../src/core/recipe.js';
import { UnknownBuildTypeError, UnknownConfigurationError } from '../../../src/utils/errors.js';
import { linuxDmd, makeTempDir, removeDir, testContext, writeFile } from '../../test-helpers.js';

let root: string;

before(async () => {
  root = await makeTempDir('resolver-pkg');
  await writeFile(root, 'source/app.d');
  await writeFile(root, 'source/lib.d');
  await writeFile(root, 'views/page.txt');
});

after(async () => {
  await removeDir(root);
});

function load(init: RecipeInit, dflags = ''): Promise<PackageEntity> {
  return PackageEntity.create(createRecipe({ name: 'sample', version: '1.0.0', ...init }), {
    root,
    context: testContext(undefined, { dflags })
  });
}

describe('resolveBuildSettings', () => {
  it('resolves root settings without a configuration', async () => {
    const pkg = await load({ buildSettings: { dflags: { '': ['-g', '-vcolumns'] } } });
    const settings = await pkg.getBuildSettings(linuxDmd, '');

    assert.equal(settings.targetName, 'sample');
    assert.deepEqual(settings.sourceFiles, [join('source', 'app.d'), join('source', 'lib.d')]);
    assert.deepEqual(settings.dflags, ['-vcolumns']);
    assert.deepEqual(settings.options.values(), ['debugInfo']);
  });

  it('fails for an unknown configuration', async () => {
    const pkg = await load({});
    await assert.rejects(pkg.getBuildSettings(linuxDmd, 'nope'), UnknownConfigurationError);
  });

  it('uses the first of several configurations with the same name', async () => {
    const pkg = await load({
      buildSettings: { versions: { '': ['Base'] } },
      configurations: [
        { name: 'default', buildSettings: { versions: { '': ['First'] }, targetName: 'first' } },
        { name: 'default', buildSettings: { versions: { '': ['Second'] } } }
      ]
    });
    const settings = await pkg.getBuildSettings(linuxDmd, 'default');
    assert.deepEqual(settings.versions, ['Base', 'First']);
    assert.equal(settings.targetName, 'first');
  });

  it('derives the target name of sub-packages from the qualified name', async () => {
    const parent = await load({});
    const sub = await PackageEntity.create(createRecipe({ name: 'sub' }), {
      parent,
      context: parent.context
    });
    const settings = await sub.getBuildSettings(linuxDmd, '');
    assert.equal(settings.targetName, 'sample_sub');
  });

  it('lets configuration scalars override the root', async () => {
    const pkg = await load({
      buildSettings: { targetType: 'library', targetPath: 'out' },
      configurations: [{ name: 'tool', buildSettings: { targetType: 'executable' } }]
    });
    const settings = await pkg.getBuildSettings(linuxDmd, 'tool');
    assert.equal(settings.targetType, 'executable');
    assert.equal(settings.targetPath, 'out');
  });
});

describe('resolveCombinedBuildSettings', () => {
  it('covers the files of every configuration', async () => {
    const pkg = await load({});
    assert.deepEqual(pkg.configurations, ['application', 'library']);

    const combined = await pkg.getCombinedBuildSettings();
    for (const configuration of pkg.configurations) {
      const settings = await pkg.getBuildSettings(linuxDmd, configuration);
      for (const file of settings.sourceFiles) assert.ok(combined.sourceFiles.includes(file), file);
      for (const file of settings.importFiles) assert.ok(combined.importFiles.includes(file), file);
      for (const file of settings.stringImportFiles) assert.ok(combined.stringImportFiles.includes(file), file);
    }
    assert.deepEqual(combined.sourceFiles, [join('source', 'app.d'), join('source', 'lib.d')]);
  });

  it('includes entries of every platform', async () => {
    const pkg = await load({ buildSettings: { versions: { '-windows': ['Win'], '-linux': ['Lin'] } } });
    const combined = await pkg.getCombinedBuildSettings();
    assert.deepEqual(combined.versions, ['Win', 'Lin']);
  });
});

describe('addBuildTypeSettings', () => {
  it('applies built-in build types idempotently', async () => {
    const pkg = await load({});
    const settings = await pkg.getBuildSettings(linuxDmd, '');
    await pkg.addBuildTypeSettings(settings, linuxDmd, 'release');
    const once = settings.options.values();
    await pkg.addBuildTypeSettings(settings, linuxDmd, 'release');

    assert.deepEqual(once, ['releaseMode', 'inline', 'optimize']);
    assert.deepEqual(settings.options.values(), once);
  });

  it('knows the unittest-cov build type', async () => {
    const pkg = await load({});
    const settings = await pkg.getBuildSettings(linuxDmd, '');
    await pkg.addBuildTypeSettings(settings, linuxDmd, 'unittest-cov');
    assert.deepEqual(settings.options.values(), ['debugMode', 'coverage', 'debugInfo', 'unittests']);
  });

  it('prefers custom build types over built-in ones', async () => {
    const pkg = await load({ buildTypes: { release: { dflags: { '': ['-custom'] } } } });
    const settings = await pkg.getBuildSettings(linuxDmd, '');
    await pkg.addBuildTypeSettings(settings, linuxDmd, 'release');
    assert.deepEqual(settings.dflags, ['-custom']);
    assert.deepEqual(settings.options.values(), []);
  });

  it('appends the configured DFLAGS verbatim', async () => {
    const pkg = await load({ buildSettings: { dflags: { '': ['-vcolumns'] } } }, ' -m64  -mcpu=native ');
    const settings = await pkg.getBuildSettings(linuxDmd, '');
    await pkg.addBuildTypeSettings(settings, linuxDmd, '$DFLAGS');
    assert.deepEqual(settings.dflags, ['-vcolumns', '-m64', '-mcpu=native']);
    assert.deepEqual(settings.options.values(), []);
  });

  it('rejects unknown build types', async () => {
    const pkg = await load({});
    const settings = await pkg.getBuildSettings(linuxDmd, '');
    await assert.rejects(pkg.addBuildTypeSettings(settings, linuxDmd, 'fast'), UnknownBuildTypeError);
  });

  it('defines the documented built-in build types', () => {
    assert.deepEqual([...BUILTIN_BUILD_TYPES.keys()], [
      'plain', 'debug', 'release', 'release-debug', 'release-nobounds', 'unittest',
      'docs', 'ddox', 'profile', 'profile-gc', 'cov', 'unittest-cov'
    ]);
  });
});

describe('getSubConfiguration', () => {
  it('prefers the configuration selection over the root selection', async () => {
    const pkg = await load({
      buildSettings: { subConfigurations: { dep: 'a', other: 'x' } },
      configurations: [{ name: 'lib', buildSettings: { subConfigurations: { dep: 'b' } } }]
    });
    assert.equal(pkg.getSubConfiguration('lib', 'dep', linuxDmd), 'b');
    assert.equal(pkg.getSubConfiguration('lib', { name: 'other' }, linuxDmd), 'x');
    assert.equal(pkg.getSubConfiguration('', 'dep', linuxDmd), 'a');
    assert.equal(pkg.getSubConfiguration('lib', 'missing', linuxDmd), undefined);
    assert.throws(() => pkg.getSubConfiguration('bogus', 'dep', linuxDmd), UnknownConfigurationError);
  });
});
