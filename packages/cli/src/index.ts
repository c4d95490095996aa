/**
 * perfscope-cli - Command-line interface for perfscope
 */

export const VERSION = '0.1.0';

export * from './commands/index.js';
export { createCliLogger, colorSink } from './services/cli-logger.js';
export { prepareInput, requireTestSuite, defaultContext, type CommandContext, type PreparedInput } from './services/pipeline.js';
