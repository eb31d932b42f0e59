/**
 * Command-line interface.
 *
 * @module cli
 */

export { createProgram } from './program.js';
export { CliContext } from './context.js';
export type { CliDependencies, GlobalOptions } from './context.js';
export { processOutput, progressObserver } from './output.js';
export type { CliOutput } from './output.js';
