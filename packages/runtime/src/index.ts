// @pedon/runtime
// Soil water characteristic estimation and retention-curve conversion

// Error types
export {
  SoilError,
  InvalidTextureError,
  DomainError,
  InvalidArgumentError,
  ArithmeticError,
  toError,
} from './errors.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  type SoilLogger,
  type LogLevel,
  type LogData,
  type LogEntry,
  type CapturingLogger,
} from './logger.js';

// Soil chain, retention curve, batch evaluation
export * from './soil/index.js';

// Atmospheric demand
export * from './atmosphere/index.js';
