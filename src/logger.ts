/**
 * Process-wide logger.
 *
 * Logs to the console by default; a JSON file transport is added when a log
 * file is configured.
 */
import winston from 'winston';

export const logger = winston.createLogger({
  level: 'info',
  format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
  transports: [
    // stderr for every level: stdout carries command output
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp(),
        winston.format.printf(({ level, message, timestamp }) => `${String(timestamp)} ${level}: ${String(message)}`),
      ),
    }),
  ],
});

export function setLogLevel(level: string): void {
  logger.level = level;
}

/**
 * Append JSON log lines to the given file in addition to the console.
 */
export function enableFileLogging(filename: string): void {
  logger.add(new winston.transports.File({ filename }));
}
