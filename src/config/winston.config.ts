import { WinstonModuleOptions } from 'nest-winston';
import * as winston from 'winston';

/**
 * Winston logging configuration.
 * Console output is human readable; everything else is structured JSON.
 */
export const getWinstonConfig = (): WinstonModuleOptions => {
  const logLevel = process.env.LOG_LEVEL || 'info';

  const logFormat = winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss',
    }),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  );

  const consoleFormat = winston.format.combine(
    winston.format.colorize({ all: process.env.NODE_ENV !== 'production' }),
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss',
    }),
    winston.format.printf(({ timestamp, level, message, context, trace, ...meta }) => {
      let logMessage = `${timestamp} [${context || 'Application'}] ${level}: ${message}`;

      if (Object.keys(meta).length > 0) {
        logMessage += `\n${JSON.stringify(meta, null, 2)}`;
      }

      if (trace) {
        logMessage += `\n${trace}`;
      }

      return logMessage;
    }),
  );

  return {
    level: logLevel,
    format: logFormat,
    transports: [
      new winston.transports.Console({
        level: logLevel,
        format: consoleFormat,
      }),
    ],
    defaultMeta: {
      service: 'learning-platform-backend',
      version: process.env.npm_package_version || '1.0.0',
    },
    exceptionHandlers: [new winston.transports.Console()],
    rejectionHandlers: [new winston.transports.Console()],
  };
};

export default getWinstonConfig;
