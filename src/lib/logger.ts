import type { Logger, LogLevel } from '../types.ts';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const noop = () => {};

/**
 * Console-backed logger that drops messages below `level`.
 *
 * @example
 * const logger = createConsoleLogger('warn');
 * logger.info('hidden');
 * logger.warn('shown');
 */
export function createConsoleLogger(level: LogLevel = 'info', sink: Logger = console): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (messageLevel: Exclude<LogLevel, 'silent'>) => LEVEL_ORDER[messageLevel] >= threshold;

  return {
    debug: enabled('debug') ? sink.debug.bind(sink) : noop,
    info: enabled('info') ? sink.info.bind(sink) : noop,
    warn: enabled('warn') ? sink.warn.bind(sink) : noop,
    error: enabled('error') ? sink.error.bind(sink) : noop,
  };
}
