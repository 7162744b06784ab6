import winston from 'winston';
import config from '../config';

const { combine, timestamp, errors, json, colorize, printf } = winston.format;

const simpleFormat = printf(({ level, message, timestamp: time, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${time} ${level}: ${message}${extra}`;
});

const logger = winston.createLogger({
  level: config.logging.level,
  format: config.logging.format === 'json'
    ? combine(timestamp(), errors({ stack: true }), json())
    : combine(colorize(), timestamp(), errors({ stack: true }), simpleFormat),
  defaultMeta: { service: 'consultant-bot' },
  transports: [new winston.transports.Console()],
  silent: config.app.env === 'test',
});

export default logger;
