/**
 * Structured JSON logger (winston)
 * Every line carries the service name; secret-looking metadata keys are redacted.
 */

import winston from 'winston';

/**
 * Logger interface for dependency injection
 */
export interface Logger {
  info: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  debug: (message: string, meta?: Record<string, unknown>) => void;
}

export interface LoggerOptions {
  serviceName: string;
  level?: string;
  environment?: string;
}

const SECRET_KEY_PATTERN = /authorization|password|token|secret/i;

export function redactMeta(meta: Record<string, unknown>): Record<string, unknown> {
  const clone: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    clone[key] = SECRET_KEY_PATTERN.test(key) ? '[redacted]' : value;
  }
  return clone;
}

export function createLogger(options: LoggerOptions): Logger {
  const { format, transports } = winston;

  return winston.createLogger({
    level: options.level ?? 'info',
    defaultMeta: {
      service: options.serviceName,
      environment: options.environment ?? 'development',
    },
    format: format.combine(
      format.timestamp(),
      format.errors({ stack: true }),
      format.printf((info) => {
        const { timestamp, level, message, ...rest } = info;
        return JSON.stringify({ timestamp, level, message, ...redactMeta(rest) });
      })
    ),
    transports: [new transports.Console()],
  });
}
