/**
 * Kneeboard CLI Library
 *
 * Command creators and the functions behind them, for embedding or
 * extending the `kneeboard` program.
 *
 * @packageDocumentation
 */

export { createProgram } from './cli.js';
export { createContext, type CliContext, type GlobalOptions } from './context.js';
export { loadConfig, resolveConfigPath, type ConfigSource } from './config/loader.js';

// Re-export utility functions
export * from './utils/index.js';

// Re-export command creators (for extending the CLI)
export * from './commands/index.js';
