// Logger - winston instance shared by every ingestor component
// Writes to stderr so that stdout stays reserved for the JSON-lines sink
// Starts at info; the resolved configuration sets the level through setLogLevel()

import winston from 'winston';

const LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

function resolveLevel(raw: string | undefined): string {
  const level = (raw || '').trim().toLowerCase();
  return LEVELS.includes(level) ? level : 'info';
}

const lineFormat = winston.format.printf(({ level, message, timestamp, stack, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  const trace = typeof stack === 'string' ? `\n${stack}` : '';
  return `${timestamp} ${level}: ${message}${extra}${trace}`;
});

const logger = winston.createLogger({
  level: 'info',
  format: winston.format.combine(
    winston.format.errors({ stack: true }),
    winston.format.timestamp(),
    winston.format.splat(),
    lineFormat
  ),
  transports: [
    new winston.transports.Console({
      stderrLevels: LEVELS,
    }),
  ],
});

export function setLogLevel(level: string): void {
  logger.level = resolveLevel(level);
}

export default logger;
