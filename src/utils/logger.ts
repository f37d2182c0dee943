/**
 * Logger Abstraction
 *
 * Console-backed logger shared by every pipeline module.
 *
 * Supports both string messages (simple logging) and structured data objects
 * (production-friendly JSON logging for log aggregators).
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Log level for structured logging.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry for production logging.
 */
export interface StructuredLogEntry {
  /** Event type identifier (e.g., 'stage_attempt', 'provider_fallback') */
  readonly event: string;
  /** Optional message for human readability */
  readonly message?: string;
  /** Additional structured data */
  readonly [key: string]: unknown;
}

/**
 * Basic logger interface (string-based).
 */
export interface Logger {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug: (message: string) => void;
}

/**
 * Extended logger interface supporting structured logging.
 */
export interface StructuredLogger extends Logger {
  /**
   * Log structured data at the specified level.
   * In JSON mode, outputs one JSON object per line.
   * Otherwise formats as a readable string.
   */
  structured: (level: LogLevel, entry: StructuredLogEntry) => void;
}

// ============================================================================
// Configuration
// ============================================================================

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Whether to output structured logs as JSON.
 * Controlled by LOG_FORMAT environment variable.
 */
const isJsonLogging = (): boolean => process.env.LOG_FORMAT === 'json';

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

/**
 * Minimum level written, from LOG_LEVEL (default: info).
 * Read on every call so tests can stub the environment.
 */
function minimumLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel()];
}

// ============================================================================
// String-Based Logger
// ============================================================================

/**
 * Default logger writing to the console.
 */
export const logger: Logger = {
  info: (message: string) => {
    if (enabled('info')) console.log(message);
  },
  warn: (message: string) => {
    if (enabled('warn')) console.warn(message);
  },
  error: (message: string) => {
    if (enabled('error')) console.error(message);
  },
  debug: (message: string) => {
    if (enabled('debug')) console.log(message);
  },
};

/**
 * Creates a prefixed logger for specific modules.
 *
 * @example
 * const log = createPrefixedLogger('[Research]');
 * log.info('Trying provider tavily'); // logs: "[Research] Trying provider tavily"
 */
export function createPrefixedLogger(prefix: string): Logger {
  return {
    info: (message: string) => logger.info(`${prefix} ${message}`),
    warn: (message: string) => logger.warn(`${prefix} ${message}`),
    error: (message: string) => logger.error(`${prefix} ${message}`),
    debug: (message: string) => logger.debug(`${prefix} ${message}`),
  };
}

/**
 * Logger that drops everything. Handy default for pure helpers under test.
 */
export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};

// ============================================================================
// Structured Logger
// ============================================================================

function formatStructuredEntry(prefix: string, entry: StructuredLogEntry): string {
  const { event, message, ...rest } = entry;
  const dataStr = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';
  const msgStr = message ? `: ${message}` : '';
  return `${prefix} [${event}]${msgStr}${dataStr}`;
}

function formatStructuredJson(prefix: string, level: LogLevel, entry: StructuredLogEntry): string {
  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    module: prefix.replace(/[[\]]/g, '').trim(),
    ...entry,
  });
}

/**
 * Creates a structured logger for specific modules.
 *
 * @example
 * const log = createStructuredLogger('[Orchestrator]');
 * log.structured('info', {
 *   event: 'stage_complete',
 *   stage: 'draft',
 *   workItemId: item.id,
 *   durationMs: 1500,
 * });
 */
export function createStructuredLogger(prefix: string): StructuredLogger {
  const logAtLevel = (level: LogLevel, message: string): void => {
    switch (level) {
      case 'debug':
        logger.debug(message);
        break;
      case 'info':
        logger.info(message);
        break;
      case 'warn':
        logger.warn(message);
        break;
      case 'error':
        logger.error(message);
        break;
    }
  };

  return {
    ...createPrefixedLogger(prefix),

    structured: (level: LogLevel, entry: StructuredLogEntry): void => {
      const formatted = isJsonLogging()
        ? formatStructuredJson(prefix, level, entry)
        : formatStructuredEntry(prefix, entry);
      logAtLevel(level, formatted);
    },
  };
}
