export * from './profile.js';
export * from './dependency.js';
export * from './display.js';
export * from './service.js';
export * from './package.js';
export * from './launch.js';
export type { DeployConfig } from '../schemas/config.schema.js';
