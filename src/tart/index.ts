/**
 * tart Module
 *
 * Exports all tart related types, executor, commands, and queries.
 */

export * from './types.js';
export * from './executor.js';
export * from './commands.js';
export * from './queries.js';
export * from './vm-process.js';
export * from './image-store.js';
