import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { BuildSettings } from '../../src/core/build-settings.js';

describe('BuildSettings', () => {
  it('keeps duplicate compiler flags and commands', () => {
    const settings = new BuildSettings();
    settings.addDFlags('-a', '-a');
    settings.addPreBuildCommands('echo', 'echo');
    assert.deepEqual(settings.dflags, ['-a', '-a']);
    assert.deepEqual(settings.preBuildCommands, ['echo', 'echo']);
  });

  it('de-duplicates other lists', () => {
    const settings = new BuildSettings();
    settings.addVersions('A', 'B', 'A');
    settings.addLibs('curl', 'curl');
    assert.deepEqual(settings.versions, ['A', 'B']);
    assert.deepEqual(settings.libs, ['curl']);
  });

  it('removes source files by path or glob', () => {
    const settings = new BuildSettings();
    settings.addSourceFiles('source/app.d', 'source/lib/a.d', 'source/lib/b.d', 'source/other.d');
    settings.removeSourceFiles('source/lib/*.d', './source/other.d');
    assert.deepEqual(settings.sourceFiles, ['source/app.d']);
  });

  it('merges another settings value', () => {
    const base = new BuildSettings();
    base.targetType = 'library';
    base.targetName = 'base';
    base.addVersions('A');
    base.addOptions('debugMode');

    const other = new BuildSettings();
    other.targetName = 'other';
    other.addVersions('A', 'B');
    other.addOptions('optimize');

    base.add(other);
    assert.equal(base.targetType, 'library');
    assert.equal(base.targetName, 'other');
    assert.deepEqual(base.versions, ['A', 'B']);
    assert.deepEqual(base.options.values(), ['debugMode', 'optimize']);
  });

  it('clones without sharing lists or flag sets', () => {
    const settings = new BuildSettings();
    settings.addSourceFiles('a.d');
    settings.addRequirements('allowWarnings');

    const copy = settings.clone();
    copy.addSourceFiles('b.d');
    copy.addRequirements('noDefaultFlags');

    assert.deepEqual(settings.sourceFiles, ['a.d']);
    assert.deepEqual(settings.requirements.values(), ['allowWarnings']);
    assert.deepEqual(copy.sourceFiles, ['a.d', 'b.d']);
  });
});
