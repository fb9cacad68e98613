import { container } from '@sapphire/framework';

type LogMethod = (msg: string, ...args: unknown[]) => void;

/**
 * Route a log call to the Sapphire logger when a client is running,
 * otherwise to the console (scripts, tests, early bootstrap)
 */
function route(level: 'info' | 'warn' | 'error' | 'debug', fallback: LogMethod): LogMethod {
  return (msg, ...args) => {
    try {
      if (container.logger) {
        container.logger[level](msg, ...args);
      } else {
        fallback(msg, ...args);
      }
    } catch {
      fallback(msg, ...args);
    }
  };
}

/**
 * Safe logger that works both inside and outside Sapphire context
 * Falls back to console when container.logger is not available
 */
export const safeLogger = {
  info: route('info', console.log),
  warn: route('warn', console.warn),
  error: route('error', console.error),
  debug: route('debug', console.debug),
};
