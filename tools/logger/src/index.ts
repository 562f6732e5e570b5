type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
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

interface ConsoleLoggerOptions {
  /**
   * Lowest level that is written (default: the `LOG_LEVEL` environment
   * variable, else 'info')
   */
  level?: LogLevel;

  /**
   * Sink used instead of the global console, mostly for tests
   */
  sink?: Pick<Console, LogLevel>;
}

const noop: LogFn = () => {};

/**
 * Logger writing to the console, dropping messages below `level`.
 */
function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold =
    LEVEL_ORDER[options.level ?? parseLogLevel(process.env.LOG_LEVEL)];
  const sink = options.sink ?? console;

  const pick = (level: LogLevel): LogFn =>
    LEVEL_ORDER[level] >= threshold
      ? (...args) => sink[level](...args)
      : noop;

  return new Logger({
    debug: pick('debug'),
    info: pick('info'),
    warn: pick('warn'),
    error: pick('error'),
  });
}

/**
 * Unknown or missing level names fall back to 'info'
 */
function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase() ?? '';
  return isLogLevel(normalized) ? normalized : 'info';
}

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export { Logger, createConsoleLogger };
export type { ConsoleLoggerOptions, LoggerMethods, LogFn, LogLevel };
