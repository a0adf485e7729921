import winston from 'winston';
import { config } from './config';

const { combine, timestamp, errors, splat, printf, colorize } = winston.format;

/**
 * One log line: message and metadata first, then the stack trace on the lines below
 */
export function formatLogLine(info: winston.Logform.TransformableInfo): string {
  const { level, message, timestamp: time, stack, ...meta } = info;
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  const trace = typeof stack === 'string' && stack.length > 0 ? `\n${stack}` : '';
  return `${time} [${level}] ${message}${extra}${trace}`;
}

const lineFormat = printf(formatLogLine);

/**
 * Application logger
 * logger.error('Something failed:', error) keeps the message and adds the error's stack below it
 */
const logger = winston.createLogger({
  level: config.logging.level,
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    splat(),
    lineFormat
  ),
  transports: [
    new winston.transports.Console({
      format: combine(colorize(), lineFormat),
    }),
  ],
});

export default logger;
