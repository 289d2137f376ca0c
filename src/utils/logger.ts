type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/** `DEBUG` turns on everything; otherwise CUSTOMER_SIGNALS_LOG_LEVEL, default info. */
function enabled(level: LogLevel): boolean {
  if (process.env.DEBUG) return true;
  const configured = process.env.CUSTOMER_SIGNALS_LOG_LEVEL?.toLowerCase() ?? 'info';
  const minimum = isLogLevel(configured) ? LEVEL_ORDER[configured] : LEVEL_ORDER.info;
  return LEVEL_ORDER[level] >= minimum;
}

/** All logging goes to stderr: stdout carries the stdio MCP transport. */
export const logger = {
  info: (...args: unknown[]) => {
    if (enabled('info')) console.error('[INFO]', ...args);
  },
  warn: (...args: unknown[]) => {
    if (enabled('warn')) console.error('[WARN]', ...args);
  },
  error: (...args: unknown[]) => {
    if (enabled('error')) console.error('[ERROR]', ...args);
  },
  debug: (...args: unknown[]) => {
    if (enabled('debug')) console.error('[DEBUG]', ...args);
  },
};
