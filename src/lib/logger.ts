/**
 * Structured JSON logger writing one line per entry to the console.
 * Threshold comes from LOG_LEVEL (trace | debug | info | warn | error), default info.
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { trace: 10, debug: 20, info: 30, warn: 40, error: 50 };

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function currentThreshold(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase() ?? 'info';
  return isLogLevel(level) ? level : 'info';
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentThreshold()];
}

export type LogFields = Record<string, unknown>;

export interface Logger {
  trace(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

function write(level: LogLevel, scope: string, message: string, fields?: LogFields): void {
  if (!isLevelEnabled(level)) return;
  const line = JSON.stringify({ level: level.toUpperCase(), scope, message, ...fields });
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'trace':
    case 'debug':
      console.debug(line);
      break;
    default:
      console.info(line);
  }
}

export function createLogger(scope: string): Logger {
  return {
    trace: (message, fields) => write('trace', scope, message, fields),
    debug: (message, fields) => write('debug', scope, message, fields),
    info: (message, fields) => write('info', scope, message, fields),
    warn: (message, fields) => write('warn', scope, message, fields),
    error: (message, fields) => write('error', scope, message, fields),
  };
}
