import * as fs from 'fs';
import * as path from 'path';
import winston from 'winston';
import { LogVerbosity } from './config/types.js';

export const DEFAULT_LOG_DIR = '/tmp/swarmup-logs';
export const MAIN_LOG_FILE = 'setup.log';
export const ERROR_LOG_FILE = 'errors.log';

const LEVELS: Record<LogVerbosity, string> = {
  1: 'error',
  2: 'warn',
  3: 'info',
  4: 'debug',
};

export function levelForVerbosity(verbosity: LogVerbosity): string {
  return LEVELS[verbosity];
}

export interface LoggerOptions {
  verbosity: LogVerbosity;
  logDir?: string;
  console?: boolean;
}

export function createLogger(options: LoggerOptions): winston.Logger {
  const transports: winston.transport[] = [];

  if (options.console ?? true) {
    transports.push(
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
          winston.format.printf(({ timestamp, level, message, ...meta }) => {
            const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
            return `${timestamp} [${level}] ${message}${metaStr}`;
          })
        ),
      })
    );
  }

  if (options.logDir) {
    fs.mkdirSync(options.logDir, { recursive: true });
    const fileFormat = winston.format.combine(winston.format.timestamp(), winston.format.json());

    transports.push(
      new winston.transports.File({
        filename: path.join(options.logDir, MAIN_LOG_FILE),
        format: fileFormat,
        maxsize: 5 * 1024 * 1024,
        maxFiles: 3,
      }),
      new winston.transports.File({
        filename: path.join(options.logDir, ERROR_LOG_FILE),
        level: 'error',
        format: fileFormat,
        maxsize: 5 * 1024 * 1024,
        maxFiles: 3,
      })
    );
  }

  // winston warns when a logger has no transports
  if (transports.length === 0) {
    transports.push(new winston.transports.Console({ silent: true }));
  }

  return winston.createLogger({
    level: levelForVerbosity(options.verbosity),
    transports,
  });
}

/**
 * Delete `.log` files in `logDir` older than `maxAgeDays`. Returns the removed paths.
 */
export function pruneLogs(logDir: string, maxAgeDays: number = 7, now: number = Date.now()): string[] {
  if (!fs.existsSync(logDir)) return [];

  const cutoff = now - maxAgeDays * 24 * 60 * 60 * 1000;
  const removed: string[] = [];

  for (const entry of fs.readdirSync(logDir)) {
    if (!entry.endsWith('.log')) continue;
    const file = path.join(logDir, entry);
    const stat = fs.statSync(file);
    if (stat.isFile() && stat.mtimeMs < cutoff) {
      fs.rmSync(file);
      removed.push(file);
    }
  }

  return removed;
}
