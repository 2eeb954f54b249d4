export { createProgram, formatError, CLI_VERSION } from './program.js';
export type { CliDependencies } from './program.js';
