// @pedon/protocol
// Soil texture and retention-curve data model

export * from './types/index.js';
export * from './validation/index.js';
