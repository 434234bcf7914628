/**
 * Lint for raw compiler flags that have a compiler-independent alternative
 */

import { logger } from '../../utils/logger.js';

interface SpecialFlag {
  flags: string[];
  alternative: string;
}

const SPECIAL_FLAGS: readonly SpecialFlag[] = [
  { flags: ['-c', '-o-'], alternative: 'Automatically issued by the build tool, do not specify in the recipe' },
  { flags: ['-w', '-Wall', '-Werr'], alternative: 'Use "buildRequirements" to control warning behavior' },
  { flags: ['-property', '-fproperty'], alternative: 'Using this flag may break building of dependencies and it will probably be removed from DMD in the future' },
  { flags: ['-wi'], alternative: 'Use the "buildRequirements" field to control warning behavior' },
  { flags: ['-d', '-de', '-dw'], alternative: 'Use the "buildRequirements" field to control deprecation behavior' },
  { flags: ['-of'], alternative: 'Use "targetPath" and "targetName" to customize the output file' },
  { flags: ['-debug', '-fdebug', '-g'], alternative: 'Use the "debug" build type' },
  { flags: ['-release', '-frelease', '-O', '-inline'], alternative: 'Use the "release" build type' },
  { flags: ['-unittest', '-funittest'], alternative: 'Use the "unittest" build type' },
  { flags: ['-lib'], alternative: 'Use {"targetType": "staticLibrary"} or let the build tool manage this' },
  { flags: ['-D'], alternative: 'Use the "docs" or "ddox" build type' },
  { flags: ['-X'], alternative: 'Use the "ddox" build type' },
  { flags: ['-cov'], alternative: 'Use the "cov" or "unittest-cov" build type' },
  { flags: ['-profile'], alternative: 'Use the "profile" build type' },
  { flags: ['-version='], alternative: 'Use "versions" to specify version constants in a compiler independent way' },
  { flags: ['-debug='], alternative: 'Use "debugVersions" to specify version constants in a compiler independent way' },
  { flags: ['-I'], alternative: 'Use "importPaths" to specify import paths in a compiler independent way' },
  { flags: ['-J'], alternative: 'Use "stringImportPaths" to specify import paths in a compiler independent way' },
  { flags: ['-m32', '-m64'], alternative: 'Select the target architecture through the build platform instead' }
];

function matchesSpecialFlag(flag: string, special: string): boolean {
  return flag === special || (special.endsWith('=') && flag.startsWith(special));
}

/**
 * Find the special-flag advice for each offending flag, in flag order
 */
export function findSpecialCompilerFlags(flags: readonly string[]): Array<{ flag: string; alternative: string }> {
  const found: Array<{ flag: string; alternative: string }> = [];
  for (const flag of flags) {
    const special = SPECIAL_FLAGS.find(entry => entry.flags.some(s => matchesSpecialFlag(flag, s)));
    if (special) {
      found.push({ flag, alternative: special.alternative });
    }
  }
  return found;
}

/**
 * Log a warning for every flag in `flags` that should be expressed
 * differently. Returns the number of warnings issued.
 */
export function warnOnSpecialCompilerFlags(
  flags: readonly string[],
  packageName: string,
  configurationName?: string
): number {
  const found = findSpecialCompilerFlags(flags);
  if (found.length === 0) return 0;

  const where = configurationName
    ? `configuration "${configurationName}" of package ${packageName}`
    : `package ${packageName}`;
  logger.warn(`Compiler flags in ${where} should be replaced by their portable alternatives:`);
  for (const { flag, alternative } of found) {
    logger.warn(`${flag}: ${alternative}`);
  }
  return found.length;
}
