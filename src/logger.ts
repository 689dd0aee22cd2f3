/**
 * Namespaced structured logging
 *
 * Log records go to the console either as one JSON object per line or as a
 * plain text line, filtered by a process-wide minimum level.
 */

/** Log levels in order of severity */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export interface LogConfig {
  /** Minimum level written (default: 'info') */
  level: LogLevel;
  /** JSON output when true, plain text otherwise (default: true) */
  structured: boolean;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEFAULT_CONFIG: LogConfig = {
  level: 'info',
  structured: true,
};

let globalConfig: LogConfig = { ...DEFAULT_CONFIG };

/**
 * Merges settings into the process-wide logging configuration
 */
export function configureLogging(config: Partial<LogConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

/** Restores the default logging configuration */
export function resetLogging(): void {
  globalConfig = { ...DEFAULT_CONFIG };
}

export function getLogConfig(): LogConfig {
  return { ...globalConfig };
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[globalConfig.level];
}

function formatLog(namespace: string, level: LogLevel, message: string, fields?: LogFields): string {
  const timestamp = new Date().toISOString();
  const entries = fields ? Object.entries(fields) : [];

  if (globalConfig.structured) {
    const entry: Record<string, unknown> = { timestamp, level, namespace, message };
    if (entries.length > 0) {
      entry['fields'] = fields;
    }
    return JSON.stringify(entry);
  }

  const fieldsStr =
    entries.length > 0 ? ` ${entries.map(([k, v]) => `${k}=${JSON.stringify(v)}`).join(' ')}` : '';

  return `[${timestamp}] [${level.toUpperCase()}] [${namespace}] ${message}${fieldsStr}`;
}

/**
 * Creates a logger whose records carry `namespace`
 *
 * @example
 * ```typescript
 * const logger = createLogger('maglev');
 * logger.warn('Capacity is smaller than the node count', { nodes: 3, capacity: 2 });
 * ```
 */
export function createLogger(namespace: string): Logger {
  const emit = (level: LogLevel, write: (line: string) => void) =>
    (message: string, fields?: LogFields): void => {
      if (shouldLog(level)) {
        write(formatLog(namespace, level, message, fields));
      }
    };

  return {
    debug: emit('debug', (line) => console.debug(line)),
    info: emit('info', (line) => console.info(line)),
    warn: emit('warn', (line) => console.warn(line)),
    error: emit('error', (line) => console.error(line)),
  };
}
