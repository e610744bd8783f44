/**
 * Portcullis CLI Library
 *
 * Command creators and the proxy runtime, for embedding or extending the CLI.
 *
 * @packageDocumentation
 */

export { createProgram, VERSION } from './program.js';
export * from './commands/index.js';
export * from './runtime.js';
export * from './utils/index.js';
