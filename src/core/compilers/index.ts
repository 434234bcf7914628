/**
 * Compiler capability lookup
 */

import type { CompilerCapability } from '../ports/compiler.js';
import { dmdCompiler } from './dmd.js';
import { logger } from '../../utils/logger.js';

const compilers = new Map<string, CompilerCapability>([[dmdCompiler.name, dmdCompiler]]);

/**
 * Make a compiler capability available under its name
 */
export function registerCompiler(compiler: CompilerCapability): void {
  compilers.set(compiler.name, compiler);
}

/**
 * Look up a compiler by name or binary path (`/usr/bin/dmd`, `dmd.exe`).
 * Unknown compilers fall back to DMD conventions.
 */
export function getCompiler(nameOrBinary: string): CompilerCapability {
  const base = nameOrBinary.split(/[\\/]/).pop() ?? nameOrBinary;
  const name = base.replace(/\.exe$/i, '').replace(/-\d+(\.\d+)*$/, '');
  const compiler = compilers.get(name);
  if (compiler) return compiler;
  logger.debug(`No compiler capability registered for '${nameOrBinary}', using dmd conventions`);
  return dmdCompiler;
}

export { dmdCompiler };
