import winston from 'winston';
import path from 'path';
import { config } from './config';

const SERVICE_NAME = 'stability-analyzer';

const logFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({
    format: 'HH:mm:ss',
  }),
  winston.format.printf(({ timestamp, level, message, component, ...meta }) => {
    // Only include essential metadata in console output to reduce noise
    const essentialMeta = Object.keys(meta).filter(key => key !== 'service');

    let output = `${timestamp} [${level}]: ${message}`;

    if (component && component !== SERVICE_NAME) {
      output += ` (${component})`;
    }

    if (essentialMeta.length > 0) {
      const essentialData = essentialMeta.reduce<Record<string, unknown>>((acc, key) => {
        acc[key] = meta[key];
        return acc;
      }, {});

      // Only show if it's small and useful
      const serialized = JSON.stringify(essentialData);
      if (serialized.length < 200) {
        output += ` ${serialized}`;
      }
    }

    return output;
  })
);

export const logger = winston.createLogger({
  level: config.logging.level,
  format: logFormat,
  defaultMeta: { service: SERVICE_NAME },
  silent: config.nodeEnv === 'test',
});

if (config.logging.file) {
  logger.add(
    new winston.transports.File({
      filename: config.logging.file,
      maxsize: 5 * 1024 * 1024, // 5MB
      maxFiles: 5,
    })
  );
  logger.add(
    new winston.transports.File({
      filename: path.join(path.dirname(config.logging.file), 'error.log'),
      level: 'error',
      maxsize: 5 * 1024 * 1024,
      maxFiles: 5,
    })
  );
}

// Console output goes to stderr so that --json output on stdout stays parseable
logger.add(
  new winston.transports.Console({
    format: consoleFormat,
    level: config.nodeEnv === 'production' ? 'warn' : undefined,
    stderrLevels: ['error', 'warn', 'info', 'debug'],
  })
);

// Create child loggers for different components
export const createComponentLogger = (component: string): winston.Logger => {
  return logger.child({ component });
};
