/**
 * Core Ports
 *
 * Re-exports all port interfaces and default implementations.
 * These ports define the boundary between the package model
 * and external concerns (file system, processes, source control, compilers).
 */

export type { FileSystemPort } from './filesystem.js';
export type { ProcessRunner, ProcessResult } from './process.js';
export type { SourceControl, TagDescription } from './source-control.js';
export type { CompilerCapability } from './compiler.js';
export { nodeFileSystem } from './node-filesystem.js';
export { execProcessRunner } from './exec-process.js';
