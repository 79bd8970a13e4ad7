import pino, { type Logger as PinoLogger } from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LogContext {
  service?: string;
  runId?: string;
  batchId?: string;
  emailId?: string;
  model?: string;
}

const isDevelopment = process.env['NODE_ENV'] === 'development';

const loggerOptions: pino.LoggerOptions = {
  level: process.env['LOG_LEVEL'] ?? 'info',
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    service: process.env['SERVICE_NAME'] ?? 'inbox-classifier',
    version: process.env['APP_VERSION'] ?? '1.0.0',
  },
};

if (isDevelopment) {
  loggerOptions.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

const baseLogger = pino(loggerOptions);

export type Logger = PinoLogger;

export const logger: Logger = baseLogger;

// Service loggers are created at module load, before configuration is read
const serviceLoggers = new Set<Logger>();

export function createLogger(context: LogContext): Logger {
  const child = baseLogger.child(context);
  serviceLoggers.add(child);
  return child;
}

// Applies a configured level to the base logger and every service logger
export function setLogLevel(level: LogLevel): void {
  baseLogger.level = level;
  for (const serviceLogger of serviceLoggers) {
    serviceLogger.level = level;
  }
}

export function createChildLogger(parent: Logger, context: LogContext): Logger {
  return parent.child(context);
}

// Measures an async step and logs its duration either way
export async function withTiming<T>(
  log: Logger,
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  const startTime = performance.now();
  try {
    const result = await fn();
    const durationMs = Math.round(performance.now() - startTime);
    log.info({ operation, durationMs }, `${operation} completed`);
    return result;
  } catch (error) {
    const durationMs = Math.round(performance.now() - startTime);
    log.error({ operation, durationMs, error }, `${operation} failed`);
    throw error;
  }
}
