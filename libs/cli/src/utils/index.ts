export * from './privileges.js';
export * from './prompt.js';
export * from './output.js';
