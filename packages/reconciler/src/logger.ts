import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

/**
 * Structured logger used across Stratoform packages
 */
export interface Logger {
  trace(msg: string, meta?: Record<string, unknown>): void;
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, error?: Error, meta?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context bindings
   */
  child(bindings: Record<string, unknown>): Logger;
}

export interface LoggerConfig {
  level: LogLevel;
  /** Human-readable output through pino-pretty */
  pretty: boolean;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'warn',
  pretty: false,
};

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Read logger configuration from STRATOFORM_LOG_* variables
 */
export function getLoggerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const config: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG };

  const envLevel = env.STRATOFORM_LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) config.level = envLevel;

  if (env.STRATOFORM_LOG_PRETTY === 'true') config.pretty = true;

  return config;
}

class PinoLogger implements Logger {
  constructor(private readonly pinoLogger: pino.Logger) {}

  trace(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.trace(meta ?? {}, msg);
  }

  debug(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.debug(meta ?? {}, msg);
  }

  info(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.info(meta ?? {}, msg);
  }

  warn(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.warn(meta ?? {}, msg);
  }

  error(msg: string, error?: Error, meta?: Record<string, unknown>): void {
    const logData: Record<string, unknown> = { ...meta };
    if (error) logData.error = { name: error.name, message: error.message, stack: error.stack };
    this.pinoLogger.error(logData, msg);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}

/**
 * Create a logger. Output goes to stderr so command output on stdout stays clean.
 */
export function createLogger(config?: Partial<LoggerConfig>): Logger {
  const finalConfig = { ...getLoggerConfigFromEnv(), ...config };

  const options: pino.LoggerOptions = {
    level: finalConfig.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  const destination = finalConfig.pretty
    ? pino.transport({
        target: 'pino-pretty',
        options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname', destination: 2 },
      })
    : pino.destination(2);

  return new PinoLogger(pino(options, destination));
}

export const logger: Logger = createLogger();

export function getComponentLogger(component: string, additionalContext?: Record<string, unknown>): Logger {
  return logger.child({ component, ...additionalContext });
}
