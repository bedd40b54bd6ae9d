import winston from 'winston';

const logLevel = process.env.LOG_LEVEL || 'info';

const levels = {
  error: 0,
  warn: 1,
  audit: 2,
  info: 3,
  debug: 4
};

const baseLogger = winston.createLogger({
  levels,
  level: logLevel,
  silent: process.env.NODE_ENV === 'test',
  defaultMeta: { service: 'idp-trust-core' },
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    winston.format.json()
  ),
  transports: [new winston.transports.Console()]
});

// Validity transitions and trust changes go through audit
const logger = Object.assign(baseLogger, {
  audit: (message: string, meta?: Record<string, unknown>) => {
    baseLogger.log('audit', message, meta);
  }
});

export default logger;
