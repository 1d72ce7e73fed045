// Re-export all protocol types

export * from './common.js';
export * from './permissions.js';
export * from './contexts.js';
export * from './overwrites.js';
