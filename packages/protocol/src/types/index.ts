// Re-export all protocol types

export * from './common.js';
export * from './texture.js';
export * from './soil.js';
