// Structured logging
//
// The estimator logs per sample: calibration warnings, organic matter
// filled in from clay, cache hits and the derived parameters. The batch
// helper adds one warning per failed sample and an info summary.
// Messages are fixed strings; everything sample-specific goes in `data`.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

/**
 * Sink for estimator diagnostics. Passed through the `logger` option.
 */
export type SoilLogger = Record<LogLevel, (message: string, data?: LogData) => void>;

function toConsole(level: LogLevel) {
  const prefix = `[${level.toUpperCase()}]`;
  return (message: string, data?: LogData) => {
    console[level](`${prefix} ${message}`, data ?? '');
  };
}

/**
 * Writes `[LEVEL] message` and the data object to the matching console method.
 */
export const consoleLogger: SoilLogger = {
  debug: toConsole('debug'),
  info: toConsole('info'),
  warn: toConsole('warn'),
  error: toConsole('error'),
};

/**
 * Logger that drops everything. The default for single-sample estimation.
 */
export const silentLogger: SoilLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: LogData;
};

export type CapturingLogger = SoilLogger & {
  readonly entries: LogEntry[];
  /** Entries at one level, in order */
  at(level: LogLevel): LogEntry[];
  clear(): void;
};

/**
 * Keep every entry in memory, e.g. to assert on the "Soil sample failed"
 * warnings of a batch.
 */
export function createCapturingLogger(): CapturingLogger {
  const entries: LogEntry[] = [];

  const record = (level: LogLevel) => (message: string, data?: LogData) => {
    entries.push({ level, message, data });
  };

  return {
    entries,
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    at(level) {
      return entries.filter((entry) => entry.level === level);
    },
    clear() {
      entries.length = 0;
    },
  };
}
