/**
 * Logging utilities for the coordination core
 */

import winston from 'winston';

const { combine, timestamp, printf, colorize, errors } = winston.format;

// Custom log format
const logFormat = printf(({ level, message, timestamp, component, ...meta }) => {
  const componentPrefix = component ? `[${String(component)}]` : '';
  const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} ${level} ${componentPrefix} ${String(message)}${metaStr}`;
});

// stdout belongs to the CLI's JSON payload
const STDERR_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

let globalLevel = process.env.PIPELINE_LOG_LEVEL || process.env.LOG_LEVEL || 'info';
// One logger per component, however many ComponentLoggers name it
const loggers = new Map<string, winston.Logger>();

// Create base logger
export function createLogger(componentName: string): winston.Logger {
  const existing = loggers.get(componentName);
  if (existing) return existing;
  const logger = winston.createLogger({
    level: globalLevel,
    format: combine(
      errors({ stack: true }),
      timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      logFormat
    ),
    defaultMeta: { component: componentName },
    transports: [
      new winston.transports.Console({
        stderrLevels: STDERR_LEVELS,
        format: combine(colorize({ all: true }), logFormat),
      }),
    ],
  });
  loggers.set(componentName, logger);
  return logger;
}

/**
 * Change the level of every logger created so far and of those created later.
 */
export function setLogLevel(level: string): void {
  globalLevel = level;
  for (const logger of loggers.values()) {
    logger.level = level;
  }
}

// Structured logging helpers
export interface LogContext {
  resource?: string;
  mode?: string;
  leaseId?: string;
  pid?: number;
  workspace?: string;
  checkpointId?: string;
  backupId?: string;
  phase?: string;
  label?: string;
  path?: string;
  latencyMs?: number;
  attempt?: number;
  kind?: string;
  count?: number;
  error?: Error;
}

export class ComponentLogger {
  private logger: winston.Logger;

  constructor(componentName: string) {
    this.logger = createLogger(componentName);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(message, this.sanitizeContext(context));
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(message, this.sanitizeContext(context));
  }

  error(message: string, context?: LogContext): void {
    this.logger.error(message, this.sanitizeContext(context));
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(message, this.sanitizeContext(context));
  }

  // Async operation with timing
  async timedAsync<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: LogContext
  ): Promise<T> {
    const start = performance.now();
    try {
      const result = await fn();
      const latencyMs = Math.round(performance.now() - start);
      this.debug(`${operation} completed`, { ...context, latencyMs });
      return result;
    } catch (error) {
      const latencyMs = Math.round(performance.now() - start);
      this.warn(`${operation} failed`, {
        ...context,
        latencyMs,
        error: error instanceof Error ? error : new Error(String(error)),
      });
      throw error;
    }
  }

  private sanitizeContext(context?: LogContext): Record<string, unknown> {
    if (!context) return {};

    const sanitized: Record<string, unknown> = { ...context };

    // Convert Error to string representation
    if (context.error) {
      sanitized.error = context.error.message;
      sanitized.stack = context.error.stack;
    }

    return sanitized;
  }
}
