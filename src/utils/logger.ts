import winston from 'winston';
import { mkdirSync } from 'fs';

const LOG_DIR = process.env.LOG_DIR || 'logs';
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `[${timestamp}] ${level.padEnd(5)} ${message}${metaStr}`;
  })
);

// Dateien als JSON-Lines: Runs lassen sich nachträglich per runId zuordnen
const fileFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

try {
  mkdirSync(LOG_DIR, { recursive: true });
} catch (err) {
  console.error(`[LOGGER] Log-Verzeichnis ${LOG_DIR} nicht anlegbar: ${err instanceof Error ? err.message : String(err)}`);
}

export const logger = winston.createLogger({
  level: LOG_LEVEL === 'silent' ? 'error' : LOG_LEVEL,
  silent: LOG_LEVEL === 'silent',
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
      // stdout gehört den --json Ausgaben der Scripts
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    }),
    new winston.transports.File({
      filename: `${LOG_DIR}/error.log`,
      level: 'error',
      format: fileFormat,
    }),
    new winston.transports.File({
      filename: `${LOG_DIR}/pipeline.log`,
      format: fileFormat,
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
    }),
  ],
});

export default logger;
