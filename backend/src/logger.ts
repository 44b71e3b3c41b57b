import { mkdirSync } from 'fs';
import { join } from 'path';

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';

/**
 * The slice of a winston logger that sentinel components log through.
 */
export interface SentinelLogger {
  error(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

export interface SentinelLoggerOptions {
  level?: string;
  fileEnabled?: boolean;
  fileRetentionHours?: number;
  logsDir?: string;
  silent?: boolean;
}

const { createLogger, format, transports } = winston;

const consoleLine = format.printf(({ timestamp, level, message, ...meta }) => {
  const metaStr = Object.keys(meta).length > 0
    ? ` ${JSON.stringify(meta)}`
    : '';
  return `${String(timestamp)} [${level}] ${String(message)}${metaStr}`;
});

function buildFileTransport(options: SentinelLoggerOptions): DailyRotateFile | null {
  const logsDir = options.logsDir ?? join(process.cwd(), 'logs');
  try {
    mkdirSync(logsDir, { recursive: true });
  } catch (err) {
    console.error('[logger] Failed to create logs directory, file logging disabled:', err);
    return null;
  }

  // winston-daily-rotate-file takes 'Nh' or 'Nd'
  const retentionHours = options.fileRetentionHours ?? 24;
  const retentionSpec = retentionHours >= 24
    ? `${Math.floor(retentionHours / 24)}d`
    : `${retentionHours}h`;

  return new DailyRotateFile({
    filename: join(logsDir, 'sentinel-%DATE%.log'),
    datePattern: 'YYYY-MM-DD-HH', // Hourly rotation
    maxSize: '50m',
    maxFiles: retentionSpec,
    format: format.combine(format.timestamp(), format.json()),
    auditFile: join(logsDir, '.audit.json')
  });
}

export function createSentinelLogger(options: SentinelLoggerOptions = {}): SentinelLogger {
  const consoleTransport = new transports.Console({
    format: format.combine(format.timestamp(), format.colorize(), consoleLine)
  });
  const fileTransport = options.fileEnabled ? buildFileTransport(options) : null;

  return createLogger({
    level: options.level ?? 'info',
    silent: options.silent ?? false,
    format: format.combine(
      format.timestamp(),
      format.errors({ stack: true }),
      format.json()
    ),
    transports: fileTransport ? [consoleTransport, fileTransport] : [consoleTransport]
  });
}

/**
 * Logger that drops everything; for components built without one.
 */
export function createSilentLogger(): SentinelLogger {
  return createSentinelLogger({ silent: true });
}
