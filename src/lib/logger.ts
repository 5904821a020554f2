/**
 * Structured Logging Utility - Household Inventory
 *
 * Writes one JSON object per line so CloudWatch can index the fields.
 */

import type { APIGatewayProxyEvent } from 'aws-lambda';

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
    cause?: string;
  };
}

const isLogLevel = (value: string): value is LogLevel =>
  Object.values<string>(LogLevel).includes(value);

/**
 * Get the current log level from environment variable
 */
const getLogLevel = (): LogLevel => {
  const level = process.env['LOG_LEVEL']?.toUpperCase() ?? LogLevel.INFO;
  return isLogLevel(level) ? level : LogLevel.INFO;
};

const shouldLog = (level: LogLevel): boolean => {
  const levels = Object.values(LogLevel);
  return levels.indexOf(level) >= levels.indexOf(getLogLevel());
};

const describeCause = (cause: unknown): string | undefined => {
  if (cause === undefined) {
    return undefined;
  }
  return cause instanceof Error ? `${cause.name}: ${cause.message}` : String(cause);
};

const CONSOLE_WRITERS: Record<LogLevel, (line: string) => void> = {
  [LogLevel.DEBUG]: (line) => console.debug(line),
  [LogLevel.INFO]: (line) => console.log(line),
  [LogLevel.WARN]: (line) => console.warn(line),
  [LogLevel.ERROR]: (line) => console.error(line),
};

const writeLog = (entry: LogEntry): void => {
  if (shouldLog(entry.level)) {
    CONSOLE_WRITERS[entry.level](JSON.stringify(entry));
  }
};

/**
 * Context given at construction is merged into every entry
 */
export class Logger {
  constructor(private readonly context: Record<string, unknown> = {}) {}

  child(additionalContext: Record<string, unknown>): Logger {
    return new Logger({ ...this.context, ...additionalContext });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, message, context);
  }

  /**
   * Log a warning, optionally with the error that triggered it
   */
  warn(message: string, context?: Record<string, unknown>, error?: Error): void {
    this.write(LogLevel.WARN, message, context, error);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, message, context, error);
  }

  private write(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    writeLog({
      timestamp: new Date().toISOString(),
      level,
      message,
      context: { ...this.context, ...context },
      error: error
        ? {
            name: error.name,
            message: error.message,
            stack: error.stack,
            cause: describeCause(error.cause),
          }
        : undefined,
    });
  }
}

const SERVICE_NAME = 'household-inventory';

export const logger = new Logger({ service: SERVICE_NAME });

/**
 * Logger tagged with the Lambda request id
 */
export const createLambdaLogger = (awsRequestId?: string): Logger =>
  new Logger({ service: SERVICE_NAME, requestId: awsRequestId });

export const logLambdaInvocation = (
  log: Logger,
  functionName: string,
  event: Pick<APIGatewayProxyEvent, 'httpMethod' | 'path'>
): void => {
  log.info('Lambda invocation started', {
    functionName,
    httpMethod: event.httpMethod,
    path: event.path,
  });
};

export const logLambdaCompletion = (
  log: Logger,
  functionName: string,
  durationMs: number,
  statusCode: number
): void => {
  log.info('Lambda invocation completed', { functionName, durationMs, statusCode });
};
