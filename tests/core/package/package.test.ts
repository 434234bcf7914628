import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join, sep } from 'path';

import { PackageEntity } from '../../../src/core/package/package.js';
import { createRecipe, type RecipeInit } from '../../../src/core/recipe.js';
import { Version } from '../../../src/core/version.js';
import {
  RecipeNotFoundError,
  UnknownConfigurationError,
  UnknownVersionError,
  UsageError
} from '../../../src/utils/errors.js';
import {
  FakeSourceControl,
  linuxDmd,
  makeTempDir,
  removeDir,
  testContext,
  windowsDmd,
  writeFile
} from '../../test-helpers.js';

let root: string;

beforeEach(async () => {
  root = await makeTempDir('package');
});

afterEach(async () => {
  await removeDir(root);
});

function create(init: RecipeInit, scm = new FakeSourceControl({ workingCopy: false })): Promise<PackageEntity> {
  return PackageEntity.create(createRecipe(init), { root, context: testContext(scm) });
}

describe('PackageEntity version', () => {
  it('keeps the version stated by the recipe', async () => {
    const scm = new FakeSourceControl({ description: { tag: 'v9.0.0', distance: 0, hash: 'gabc' } });
    const pkg = await create({ name: 'fixed', version: '1.0.0' }, scm);
    assert.equal(pkg.version.toString(), '1.0.0');
    assert.equal(scm.calls.describe, 0);
  });

  it('lets a version override win', async () => {
    const pkg = await PackageEntity.create(createRecipe({ name: 'fixed', version: '1.0.0' }), {
      root,
      versionOverride: '2.5.0',
      context: testContext()
    });
    assert.equal(pkg.version.toString(), '2.5.0');
    assert.equal(pkg.rawRecipe.version, '1.0.0');
  });

  it('determines the version from source control', async () => {
    const exact = await create({ name: 'tagged' }, new FakeSourceControl({
      description: { tag: 'v1.2.0', distance: 0, hash: 'gabcdef1' }
    }));
    assert.equal(exact.version.toString(), '1.2.0');

    const ahead = await create({ name: 'tagged' }, new FakeSourceControl({
      description: { tag: 'v1.2.0+local', distance: 3, hash: 'abcdef1' }
    }));
    assert.equal(ahead.version.toString(), '1.2.0+local.commit.3.abcdef1');

    const branch = await create({ name: 'branch' }, new FakeSourceControl({ branch: 'feature-x' }));
    assert.equal(branch.version.toString(), '~feature-x');
  });

  it('assumes the master branch when source control has nothing', async () => {
    const detached = await create({ name: 'detached' }, new FakeSourceControl({ branch: 'HEAD' }));
    assert.equal(detached.version.isMaster, true);

    const plain = await create({ name: 'plain' });
    assert.equal(plain.version.toString(), '~master');
  });

  it('assumes the master branch when source control fails', async () => {
    const scm = new FakeSourceControl();
    scm.describe = async () => {
      throw new Error('test failure');
    };
    const pkg = await create({ name: 'broken' }, scm);
    assert.equal(pkg.version.toString(), '~master');
  });

  it('shares the version of the base package with sub-packages', async () => {
    const scm = new FakeSourceControl({ description: { tag: 'v5.0.0', distance: 0, hash: 'gabc' } });
    const parent = await create({ name: 'base', version: '2.0.0' }, scm);
    const sub = await PackageEntity.create(createRecipe({ name: 'sub', version: '9.9.9' }), {
      parent,
      context: parent.context
    });
    assert.equal(sub.version.toString(), '2.0.0');

    parent.setVersion('2.1.0');
    assert.equal(sub.version.toString(), '2.1.0');
    assert.equal(scm.calls.describe, 0);
  });

  it('refuses to set the version of a sub-package', async () => {
    const parent = await create({ name: 'base', version: '1.0.0' });
    const sub = await PackageEntity.create(createRecipe({ name: 'sub' }), { parent, context: parent.context });
    assert.throws(() => sub.setVersion('3.0.0'), UsageError);
  });
});

describe('PackageEntity identity', () => {
  it('qualifies names through the parent chain', async () => {
    const base = await create({ name: 'base', version: '1.0.0' });
    const sub = await PackageEntity.create(createRecipe({ name: 'sub' }), { parent: base, context: base.context });
    const leaf = await PackageEntity.create(createRecipe({ name: 'leaf' }), { parent: sub, context: base.context });

    assert.equal(leaf.name, 'base:sub:leaf');
    assert.equal(leaf.basePackage, base);
    assert.equal(leaf.parentPackage, sub);
    assert.equal(base.parentPackage, null);
  });

  it('normalizes the path to a directory path', async () => {
    const pkg = await create({ name: 'pathy', version: '1.0.0' });
    assert.equal(pkg.path, `${root}${sep}`);

    const remote = await PackageEntity.create(createRecipe({ name: 'remote', version: '1.0.0' }), { context: testContext() });
    assert.equal(remote.path, '');
  });

  it('finds inline sub-packages only', async () => {
    const pkg = await create({
      name: 'base',
      version: '1.0.0',
      subPackages: [
        { kind: 'inline', recipe: { name: 'cli' } },
        { kind: 'path', path: 'tools' }
      ]
    });
    assert.equal(pkg.getInternalSubPackage('cli')?.name, 'cli');
    assert.equal(pkg.getInternalSubPackage('tools'), undefined);
    assert.equal(pkg.subPackages.length, 2);
  });
});

describe('PackageEntity dependencies', () => {
  const init: RecipeInit = {
    name: 'deps',
    version: '1.0.0',
    buildSettings: { dependencies: { a: { version: '1.0' }, b: { version: '1.0' } } },
    configurations: [
      { name: 'extra', buildSettings: { dependencies: { b: { version: '2.0' }, c: { version: '3.0' } } } },
      { name: 'same', buildSettings: { dependencies: { a: { version: '1.0' } } } }
    ]
  };

  it('lets configuration entries win', async () => {
    const pkg = await create(init);
    assert.deepEqual(pkg.getDependencies('extra'), {
      a: { version: '1.0' },
      b: { version: '2.0' },
      c: { version: '3.0' }
    });
    assert.deepEqual(pkg.getDependencies(''), { a: { version: '1.0' }, b: { version: '1.0' } });
  });

  it('answers dependency queries per configuration', async () => {
    const pkg = await create(init);
    assert.equal(pkg.hasDependency('a'), true);
    assert.equal(pkg.hasDependency('c'), true);
    assert.equal(pkg.hasDependency('c', 'extra'), true);
    assert.equal(pkg.hasDependency('c', 'same'), false);
    assert.equal(pkg.hasDependency('c', 'missing'), false);
    assert.equal(pkg.hasDependency('d'), false);
  });

  it('falls back to the root dependencies for an unknown configuration', async () => {
    const pkg = await create(init);
    assert.deepEqual(pkg.getDependencies('nope'), { a: { version: '1.0' }, b: { version: '1.0' } });
  });

  it('lists every distinct declaration once', async () => {
    const pkg = await create(init);
    assert.deepEqual(pkg.getAllDependencies(), [
      { name: 'a', spec: { version: '1.0' } },
      { name: 'b', spec: { version: '1.0' } },
      { name: 'b', spec: { version: '2.0' } },
      { name: 'c', spec: { version: '3.0' } }
    ]);
  });
});

describe('PackageEntity configurations', () => {
  const init: RecipeInit = {
    name: 'confs',
    version: '1.0.0',
    configurations: [
      { name: 'app', buildSettings: { targetType: 'executable' } },
      { name: 'lib', buildSettings: { targetType: 'library' } },
      { name: 'win', platforms: ['windows'], buildSettings: { targetType: 'library' } }
    ]
  };

  it('picks the first library configuration for the platform', async () => {
    const pkg = await create(init);
    assert.equal(pkg.getDefaultConfiguration(linuxDmd), 'lib');
    assert.equal(pkg.getDefaultConfiguration(linuxDmd, true), 'app');
    assert.deepEqual(pkg.getPlatformConfigurations(windowsDmd), ['lib', 'win']);
    assert.deepEqual(pkg.getPlatformConfigurations(linuxDmd, true), ['app', 'lib']);
  });

  it('returns undefined when no configuration applies', async () => {
    const pkg = await create({
      name: 'only-app',
      version: '1.0.0',
      configurations: [{ name: 'app', buildSettings: { targetType: 'executable' } }]
    });
    assert.equal(pkg.getDefaultConfiguration(linuxDmd), undefined);
  });

  it('exposes the raw templates', async () => {
    const pkg = await create(init);
    assert.equal(pkg.getBuildSettingsTemplate('app').targetType, 'executable');
    assert.equal(pkg.getBuildSettingsTemplate(), pkg.recipe.buildSettings);
    assert.throws(() => pkg.getBuildSettingsTemplate('nope'), UnknownConfigurationError);
  });

  it('counts raw compiler flags that have portable alternatives', async () => {
    const pkg = await create({
      name: 'flags',
      version: '1.0.0',
      buildSettings: { dflags: { '': ['-O', '-vcolumns'], '-linux': ['-m64'] } },
      configurations: [{ name: 'test', buildSettings: { dflags: { '': ['-unittest'] } } }]
    });
    assert.equal(pkg.warnOnSpecialCompilerFlags(), 3);
  });
});

describe('PackageEntity persistence', () => {
  it('refuses to store a package with an unknown version', async () => {
    const pkg = await create({ name: 'lost', version: '1.0.0' });
    pkg.setVersion(Version.unknown);
    await assert.rejects(pkg.storeInfo(), UnknownVersionError);
    assert.equal(await pkg.context.fileSystem.exists(join(root, 'drecipe.json')), false);
  });

  it('stores the effective recipe as JSON without changing state', async () => {
    const pkg = await create({ name: 'stored', version: '1.3.0', license: 'MIT' });
    const file = await pkg.storeInfo();

    assert.equal(file, join(root, 'drecipe.json'));
    const content = await fs.readFile(file, 'utf8');
    assert.equal(content.startsWith('{\n  "name": "stored",\n  "version": "1.3.0",\n  "license": "MIT"'), true);
    assert.equal(pkg.recipePath, '');

    const reloaded = await PackageEntity.load(root, { context: pkg.context });
    assert.equal(reloaded.version.toString(), '1.3.0');
    assert.deepEqual(reloaded.recipe, pkg.recipe);
  });

  it('refuses to store a package that has no location', async () => {
    const pkg = await PackageEntity.create(createRecipe({ name: 'floating', version: '1.0.0' }), { context: testContext() });
    await assert.rejects(pkg.storeInfo(), UsageError);
    assert.equal(await pkg.context.fileSystem.exists(join(process.cwd(), 'drecipe.json')), false);
  });

  it('stores into another directory', async () => {
    const pkg = await create({ name: 'elsewhere', version: '1.0.0' });
    const target = join(root, 'out');
    assert.equal(await pkg.storeInfo(target), join(target, 'drecipe.json'));
  });
});

describe('PackageEntity.load', () => {
  it('reads the recipe file and records its path', async () => {
    await writeFile(root, 'drecipe.json', '{ "name": "loaded", "version": "0.1.0", /* note */ }');
    const pkg = await PackageEntity.load(root, { context: testContext() });
    assert.equal(pkg.name, 'loaded');
    assert.equal(pkg.recipePath, join(root, 'drecipe.json'));
  });

  it('reads YAML recipes', async () => {
    await writeFile(root, 'drecipe.yml', 'name: yaml-pkg\nversion: 0.2.0\ndflags-linux:\n  - -vcolumns\n');
    const pkg = await PackageEntity.load(root, { context: testContext() });
    assert.equal(pkg.name, 'yaml-pkg');
    assert.deepEqual(pkg.rawRecipe.buildSettings.dflags, { '-linux': ['-vcolumns'] });
  });

  it('prefers JSON over YAML', async () => {
    await writeFile(root, 'drecipe.yaml', 'name: from-yaml\n');
    await writeFile(root, 'drecipe.json', '{ "name": "from-json" }');
    assert.equal(await PackageEntity.findPackageFile(root, testContext().fileSystem), join(root, 'drecipe.json'));
  });

  it('fails when there is no recipe file', async () => {
    await assert.rejects(PackageEntity.load(root, { context: testContext() }), (error: unknown) => {
      assert.ok(error instanceof RecipeNotFoundError);
      assert.equal(
        error.message,
        `No package file found in ${root}, expected one of drecipe.json/drecipe.yml/drecipe.yaml`
      );
      return true;
    });
  });

  it('expands sub-package dependency shorthands with the parent name', async () => {
    await writeFile(root, 'drecipe.json', JSON.stringify({
      name: 'base',
      version: '1.0.0',
      dependencies: { ':util': '*' }
    }));
    const pkg = await PackageEntity.load(root, { context: testContext() });
    assert.deepEqual(Object.keys(pkg.getDependencies()), ['base:util']);
  });
});
