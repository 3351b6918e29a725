/**
 * cmdtree Logger Module
 *
 * Provides centralized diagnostic logging on stderr, with optional file output and rotation.
 */

import * as winston from 'winston';
import * as path from 'path';
import * as fs from 'fs';
import { CLI_CONFIG, LogLevel } from '../config/defaults';

const LOG_LEVEL_NAMES: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface LoggerOptions {
  componentName: string;
  logLevel?: LogLevel;
  logFile?: string;
  silent?: boolean;
}

/**
 * Create a Winston logger instance
 */
export function createLogger(options: LoggerOptions): winston.Logger {
  const {
    componentName,
    logLevel = CLI_CONFIG.LOG_LEVEL,
    logFile = CLI_CONFIG.LOG_FILE,
    silent = false
  } = options;

  const logger = winston.createLogger({
    level: logLevel,
    silent,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.splat(),
      winston.format.printf(({ timestamp, level, message, ...rest }) => {
        const extra = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : '';
        return `[${String(timestamp)}] ${level.toUpperCase()} [${componentName}]: ${String(message)}${extra}`;
      })
    ),
    transports: [
      // Diagnostics never share stdout with usage text
      new winston.transports.Console({
        stderrLevels: [...LOG_LEVEL_NAMES]
      })
    ]
  });

  if (logFile) {
    const logDir = path.dirname(logFile);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    logger.add(
      new winston.transports.File({
        filename: logFile,
        maxsize: 10 * 1024 * 1024, // 10MB
        maxFiles: 5, // Keep 5 rotated files
        tailable: true
      })
    );
  }

  return logger;
}
