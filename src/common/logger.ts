import { LoggerService } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import * as winston from 'winston';

export interface WinstonOptions {
  logDir: string;
  level: string;
}

// Upper-case before colorize so the escape codes it adds stay intact
export const uppercaseLevel = winston.format((info) => {
  info.level = info.level.toUpperCase();
  return info;
});

export const customFormat = winston.format.printf(({ level, message, timestamp, context, ...metadata }) => {
  let msg = `${timestamp} [${level}]`;
  if (context) {
    msg += ` [${context}]`;
  }
  msg += ` ${message}`;

  // Add metadata if present
  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }

  return msg;
});

export function consoleFormat(): winston.Logform.Format {
  return winston.format.combine(
    uppercaseLevel(),
    winston.format.colorize(),
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    customFormat
  );
}

export function createWinstonLogger(options: WinstonOptions): winston.Logger {
  // Ensure log directory exists
  if (!fs.existsSync(options.logDir)) {
    fs.mkdirSync(options.logDir, { recursive: true });
  }

  return winston.createLogger({
    level: options.level,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.errors({ stack: true }),
      uppercaseLevel(),
      customFormat
    ),
    transports: [
      new winston.transports.Console({ format: consoleFormat() }),
      // File transport for all logs
      new winston.transports.File({
        filename: path.join(options.logDir, 'pipeline.log'),
        maxsize: 10 * 1024 * 1024, // 10MB
        maxFiles: 5,
        tailable: true
      }),
      // File transport for errors only
      new winston.transports.File({
        filename: path.join(options.logDir, 'pipeline-error.log'),
        level: 'error',
        maxsize: 10 * 1024 * 1024, // 10MB
        maxFiles: 5,
        tailable: true
      })
    ],
    exitOnError: false
  });
}

function formatMessage(message: unknown): string {
  if (message instanceof Error) {
    return message.message;
  }
  return typeof message === 'string' ? message : JSON.stringify(message);
}

/**
 * Nest LoggerService backed by winston. Every `new Logger(Context)` in the
 * application ends up here once the context calls `useLogger`.
 */
export class WinstonLoggerService implements LoggerService {
  constructor(private readonly logger: winston.Logger) {}

  log(message: unknown, ...optionalParams: unknown[]): void {
    this.write('info', message, optionalParams);
  }

  error(message: unknown, ...optionalParams: unknown[]): void {
    this.write('error', message, optionalParams);
  }

  warn(message: unknown, ...optionalParams: unknown[]): void {
    this.write('warn', message, optionalParams);
  }

  debug(message: unknown, ...optionalParams: unknown[]): void {
    this.write('debug', message, optionalParams);
  }

  verbose(message: unknown, ...optionalParams: unknown[]): void {
    this.write('verbose', message, optionalParams);
  }

  fatal(message: unknown, ...optionalParams: unknown[]): void {
    this.write('error', message, optionalParams);
  }

  private write(level: string, message: unknown, optionalParams: unknown[]): void {
    // Nest passes the context last; an error's stack comes before it
    const params = [...optionalParams];
    const last = params[params.length - 1];
    const context = typeof last === 'string' ? last : undefined;
    if (context !== undefined) {
      params.pop();
    }

    const entry: winston.LogEntry = { level, message: formatMessage(message) };
    if (context) {
      entry.context = context;
    }
    if (message instanceof Error && message.stack) {
      entry.stack = message.stack;
    }
    if (params.length > 0) {
      entry.details = params;
    }
    this.logger.log(entry);
  }
}
