/**
 * Template application against a package directory on disk
 */

import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { join, sep } from 'path';

import { BuildSettings } from '../../src/core/build-settings.js';
import { createBuildSettingsTemplate } from '../../src/core/recipe.js';
import { applyTemplate, matchesPlatformList, matchingValues } from '../../src/core/template.js';
import { nodeFileSystem } from '../../src/core/ports/node-filesystem.js';
import { InvalidRecipeError } from '../../src/utils/errors.js';
import { linuxDmd, makeTempDir, removeDir, windowsDmd, writeFile } from '../test-helpers.js';

let root: string;
let basePath: string;

before(async () => {
  root = await makeTempDir('template');
  basePath = `${root}${sep}`;
  await writeFile(root, 'source/app.d', 'void main() {}');
  await writeFile(root, 'source/pkg/mod.d');
  await writeFile(root, 'source/pkg/iface.di');
  await writeFile(root, 'source/readme.txt');
  await writeFile(root, 'source/.skip.d');
  await writeFile(root, 'views/page.html');
});

after(async () => {
  await removeDir(root);
});

describe('applyTemplate', () => {
  it('collects source, import and string-import files', async () => {
    const template = createBuildSettingsTemplate({
      sourcePaths: { '': ['source'] },
      importPaths: { '': ['source'] },
      stringImportPaths: { '': ['views'] }
    });
    const settings = new BuildSettings();
    await applyTemplate(template, settings, linuxDmd, basePath, nodeFileSystem);

    assert.deepEqual(settings.sourceFiles, [join('source', 'app.d'), join('source', 'pkg', 'mod.d')]);
    assert.deepEqual(settings.importFiles, [join('source', 'pkg', 'iface.di')]);
    assert.deepEqual(settings.stringImportFiles, [join('views', 'page.html')]);
    assert.deepEqual(settings.importPaths, ['source']);
    assert.deepEqual(settings.stringImportPaths, ['views']);
  });

  it('applies only entries matching the platform', async () => {
    const template = createBuildSettingsTemplate({
      dflags: { '': ['-a'], '-windows': ['-w32'], '-linux': ['-l'] },
      versions: { '-x86_64': ['Wide'], '-x86': ['Narrow'] }
    });

    const linux = new BuildSettings();
    await applyTemplate(template, linux, linuxDmd, basePath, nodeFileSystem);
    assert.deepEqual(linux.dflags, ['-a', '-l']);
    assert.deepEqual(linux.versions, ['Wide']);

    const windows = new BuildSettings();
    await applyTemplate(template, windows, windowsDmd, basePath, nodeFileSystem);
    assert.deepEqual(windows.dflags, ['-a', '-w32']);
  });

  it('removes excluded source files after adding explicit ones', async () => {
    const template = createBuildSettingsTemplate({
      sourcePaths: { '': ['source'] },
      sourceFiles: { '': ['extra/gen.d'] },
      excludedSourceFiles: { '': ['source/pkg/*'] }
    });
    const settings = new BuildSettings();
    await applyTemplate(template, settings, linuxDmd, basePath, nodeFileSystem);
    assert.deepEqual(settings.sourceFiles, [join('source', 'app.d'), 'extra/gen.d']);
  });

  it('overrides scalars and records the main source file', async () => {
    const template = createBuildSettingsTemplate({
      targetType: 'executable',
      targetName: 'tool',
      mainSourceFile: 'source/app.d'
    });
    const settings = new BuildSettings();
    settings.targetName = 'previous';
    await applyTemplate(template, settings, linuxDmd, basePath, nodeFileSystem);
    assert.equal(settings.targetType, 'executable');
    assert.equal(settings.targetName, 'tool');
    assert.equal(settings.mainSourceFile, 'source/app.d');
    assert.deepEqual(settings.sourceFiles, ['source/app.d']);
  });

  it('skips missing directories', async () => {
    const template = createBuildSettingsTemplate({ sourcePaths: { '': ['missing'] } });
    const settings = new BuildSettings();
    await applyTemplate(template, settings, linuxDmd, basePath, nodeFileSystem);
    assert.deepEqual(settings.sourceFiles, []);
  });

  it('rejects empty paths', async () => {
    const template = createBuildSettingsTemplate({ importPaths: { '': [''] } });
    await assert.rejects(
      applyTemplate(template, new BuildSettings(), linuxDmd, basePath, nodeFileSystem),
      InvalidRecipeError
    );
  });
});

describe('matchingValues', () => {
  it('keeps declaration order across matching suffixes', () => {
    assert.deepEqual(matchingValues({ '-linux': ['b'], '': ['a'] }, linuxDmd), ['b', 'a']);
  });
});

describe('matchesPlatformList', () => {
  it('treats an empty list as unrestricted', () => {
    assert.equal(matchesPlatformList([], windowsDmd), true);
  });

  it('matches any listed specification', () => {
    assert.equal(matchesPlatformList(['windows'], linuxDmd), false);
    assert.equal(matchesPlatformList(['windows', 'linux'], linuxDmd), true);
    assert.equal(matchesPlatformList(['posix-x86_64'], linuxDmd), true);
  });
});
