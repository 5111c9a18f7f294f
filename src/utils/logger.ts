/**
 * Logging
 *
 * Console logging with a `[Component]` prefix. The level is global and can
 * be set with `configureLogging` or the WALLET_LOG_LEVEL environment
 * variable.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

const envLevel = process.env.WALLET_LOG_LEVEL;
let minLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function configureLogging(config: { level: LogLevel }): void {
  minLevel = config.level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

function formatContext(context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) {
    return '';
  }
  return ' ' + JSON.stringify(context);
}

export function createLogger(component: string): Logger {
  const emit = (level: Exclude<LogLevel, 'silent'>, message: string, context?: Record<string, unknown>) => {
    if (LOG_LEVELS[level] < LOG_LEVELS[minLevel]) {
      return;
    }
    const line = `[${component}] ${message}${formatContext(context)}`;
    switch (level) {
      case 'debug':
        console.debug(line);
        break;
      case 'info':
        console.log(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'error':
        console.error(line);
        break;
    }
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context)
  };
}
