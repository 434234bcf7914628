/**
 * DMD-style compiler conventions
 */

import type { BuildOption } from '../flags.js';
import type { BuildSettings } from '../build-settings.js';
import type { BuildPlatform } from '../platform.js';
import type { CompilerCapability } from '../ports/compiler.js';

const OPTION_FLAGS: ReadonlyArray<readonly [BuildOption, readonly string[]]> = [
  ['debugMode', ['-debug']],
  ['releaseMode', ['-release']],
  ['coverage', ['-cov']],
  ['debugInfo', ['-g']],
  ['debugInfoC', ['-gc']],
  ['alwaysStackFrame', ['-gs']],
  ['stackStomping', ['-gx']],
  ['inline', ['-inline']],
  ['noBoundsCheck', ['-noboundscheck']],
  ['optimize', ['-O']],
  ['profile', ['-profile']],
  ['profileGC', ['-profile=gc']],
  ['unittests', ['-unittest']],
  ['verbose', ['-v']],
  ['ignoreUnknownPragmas', ['-ignore']],
  ['syntaxOnly', ['-o-']],
  ['warnings', ['-wi']],
  ['warningsAsErrors', ['-w']],
  ['ignoreDeprecations', ['-d']],
  ['deprecationWarnings', ['-dw']],
  ['deprecationErrors', ['-de']],
  ['property', ['-property']],
  ['pic', ['-fPIC']],
  ['betterC', ['-betterC']],
  ['_docs', ['-Dddocs']],
  ['_ddox', ['-Xfdocs.json', '-Df__dummy.html']]
];

function optionForFlag(flag: string): BuildOption | undefined {
  return OPTION_FLAGS.find(([, flags]) => flags.includes(flag))?.[0];
}

export const dmdCompiler: CompilerCapability = {
  name: 'dmd',

  extractBuildOptions(settings: BuildSettings): void {
    const remaining: string[] = [];
    for (const flag of settings.dflags) {
      const option = optionForFlag(flag);
      if (option) {
        settings.addOptions(option);
      } else if (flag.startsWith('-version=')) {
        settings.addVersions(flag.slice('-version='.length));
      } else if (flag.startsWith('-debug=')) {
        settings.addDebugVersions(flag.slice('-debug='.length));
      } else {
        remaining.push(flag);
      }
    }
    settings.dflags = remaining;
  },

  getTargetFileName(settings: BuildSettings, platform: BuildPlatform): string {
    const windows = platform.platform.includes('windows');
    const name = settings.targetName;
    switch (settings.targetType) {
      case 'autodetect':
      case 'none':
      case 'sourceLibrary':
        return '';
      case 'executable':
        return windows ? `${name}.exe` : name;
      case 'library':
      case 'staticLibrary':
        return windows ? `${name}.lib` : `lib${name}.a`;
      case 'dynamicLibrary':
        return windows ? `${name}.dll` : `lib${name}.so`;
      case 'object':
        return windows ? `${name}.obj` : `${name}.o`;
    }
  }
};
