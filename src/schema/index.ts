/**
 * Schema module: single source of truth for all data shapes.
 * Zod schemas + inferred TypeScript types.
 * Every boundary validates through these schemas.
 */

export * from './task.js';
export * from './recording.js';
export * from './config.js';
export * from './script.js';
