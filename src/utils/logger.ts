import winston from 'winston';
import path from 'path';
import { config } from '../config';

const logDir = config.logsDir;

export const logger = winston.createLogger({
  level: process.env.NODE_ENV === 'production' ? 'info' : 'debug',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ level, message, timestamp, stack }) => {
      if (stack) {
        return `${timestamp} [${level.toUpperCase()}]: ${message}\n${stack}`;
      }
      return `${timestamp} [${level.toUpperCase()}]: ${message}`;
    })
  ),
  transports: [
    // Console output with colors
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ level, message, timestamp }) => {
          return `${timestamp} [${level}]: ${message}`;
        })
      ),
    }),
    // File output for errors
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
    }),
    // File output for all logs
    new winston.transports.File({
      filename: path.join(logDir, 'combined.log'),
    }),
  ],
});

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Per-run logger. Forwards to winston with the run id prefix and keeps the
 * transcript that is returned in the evidence bundle.
 */
export class RunLog {
  readonly entries: string[] = [];
  private readonly prefix: string;

  constructor(runId: string) {
    this.prefix = `[run ${runId.slice(0, 8)}]`;
  }

  debug(message: string): void {
    this.write('debug', message);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      this.write('error', `${message}: ${error.message}`);
      if (error.stack) {
        this.entries.push(error.stack);
      }
      return;
    }
    this.write('error', error === undefined ? message : `${message}: ${String(error)}`);
  }

  private write(level: LogLevel, message: string): void {
    this.entries.push(`${new Date().toISOString()} [${level.toUpperCase()}] ${message}`);
    logger[level](`${this.prefix} ${message}`);
  }
}

export const logApplication = (runId: string, jobUrl: string, status: string) => {
  logger.info(`Application [${runId}] ${jobUrl}: ${status}`);
};
