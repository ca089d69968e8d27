import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { AppConfig, loadConfig, loadDotenv } from '../config';

// ============================================================================
// Types
// ============================================================================

export type LogMeta = Record<string, unknown>;

export const SERVICE_NAME = 'santorini-cli';

// ============================================================================
// Formats
// ============================================================================

/**
 * Custom format to structure log metadata consistently.
 */
const structuredFormat = winston.format((info) => {
  if (!info.service) {
    info.service = SERVICE_NAME;
  }

  // Errors do not survive JSON.stringify; keep the useful parts.
  if (info.error instanceof Error) {
    info.error = {
      message: info.error.message,
      name: info.error.name,
      stack: info.error.stack,
    };
  }

  return info;
});

/**
 * Format for structured JSON logging (used for LOG_FORMAT=json and files).
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.json()
);

/**
 * Format for human-readable console output.
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  structuredFormat(),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, service: _service, environment: _env, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${metaStr}`;
  })
);

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Build a winston logger for `config`. Console output goes to stderr so it
 * never interleaves with the board printed on stdout. In test mode the
 * logger is silent.
 */
export function createLogger(config: AppConfig): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: config.logging.format === 'json' ? jsonFormat : consoleFormat,
      stderrLevels: ['error', 'warn', 'info', 'debug'],
    }),
  ];

  const configuredLogFile = config.logging.file?.trim();
  if (configuredLogFile) {
    const logPath = path.resolve(configuredLogFile);
    fs.mkdirSync(path.dirname(logPath), { recursive: true });
    transports.push(
      new winston.transports.File({
        filename: logPath,
        format: jsonFormat,
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      })
    );
  }

  return winston.createLogger({
    level: config.logging.level,
    silent: config.isTest,
    defaultMeta: {
      service: SERVICE_NAME,
      environment: config.nodeEnv,
    },
    transports,
  });
}

loadDotenv();

const logger = createLogger(loadConfig());

export { logger };
