/**
 * Kneeboard IPC Library
 *
 * Shared types, schemas, constants and errors used by the deployment
 * library and the CLI.
 *
 * @packageDocumentation
 */

// Types (primary type definitions)
export * from './types/index.js';

// Schemas (Zod schemas - config type is re-exported from types/)
export {
  SemverSchema,
  PackageNameSchema,
  AppConfigSchema,
  BoardConfigSchema,
  ServiceConfigSchema,
  AutostartConfigSchema,
  PackageConfigSchema,
  CleanupConfigSchema,
  DeployConfigSchema,
  type DeployConfigInput,
} from './schemas/config.schema.js';

// Constants
export * from './constants.js';

// Errors
export * from './errors.js';
