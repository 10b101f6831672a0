import winston from 'winston';
import { environment } from '../config/environment';

export const logger = winston.createLogger({
  level: environment.logLevel,
  silent: environment.nodeEnv === 'test',
  format: winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss',
    }),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: {
    service: 'word-scheduler',
    version: environment.version,
  },
  transports: [],
});

if (environment.nodeEnv === 'production') {
  logger.add(new winston.transports.Console());
} else {
  logger.add(new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, service, version: _version, ...meta }) => {
        let line = `${String(timestamp)} [${String(service)}] ${level}: ${String(message)}`;
        if (Object.keys(meta).length > 0) {
          line += ` ${JSON.stringify(meta)}`;
        }
        return line;
      }),
    ),
  }));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export default logger;
