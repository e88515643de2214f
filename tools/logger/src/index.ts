type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

/**
 * Severity order used for level filtering
 */
const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

class Logger implements LoggerMethods {
  public readonly debug: LogFn;
  public readonly info: LogFn;
  public readonly warn: LogFn;
  public readonly error: LogFn;

  constructor(methods: LoggerMethods) {
    this.debug = methods.debug;
    this.info = methods.info;
    this.warn = methods.warn;
    this.error = methods.error;
  }
}

interface GetLoggerOptions {
  /**
   * Minimum level that is forwarded to the sink (default: 'info')
   */
  level?: LogLevel;

  /**
   * Destination for log calls (default: console)
   */
  sink?: LoggerMethods;
}

/**
 * Creates a Logger that forwards to `sink` and drops calls below `level`.
 *
 * @example
 * ```typescript
 * const logger = getLogger({ level: 'debug' });
 * logger.debug('[OutlineTreeBuilder] page 3: 12 lines');
 * ```
 */
function getLogger(options: GetLoggerOptions = {}): Logger {
  const minLevel = LOG_LEVEL_ORDER[options.level ?? 'info'];
  const sink: LoggerMethods = options.sink ?? {
    debug: (...args) => console.debug(...args),
    info: (...args) => console.info(...args),
    warn: (...args) => console.warn(...args),
    error: (...args) => console.error(...args),
  };

  const forward =
    (level: LogLevel): LogFn =>
    (...args) => {
      if (LOG_LEVEL_ORDER[level] >= minLevel) {
        sink[level](...args);
      }
    };

  return new Logger({
    debug: forward('debug'),
    info: forward('info'),
    warn: forward('warn'),
    error: forward('error'),
  });
}

export { Logger, LOG_LEVEL_ORDER, getLogger };
export type { GetLoggerOptions, LoggerMethods, LogFn, LogLevel };
