import pino from 'pino';
import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config';

// Create pino logger instance
export const logger = pino({
  name: config.service.name,
  level: config.logging.level,

  // Pretty print in development
  transport: config.logging.pretty ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname',
      translateTime: 'yyyy-mm-dd HH:MM:ss.l',
    }
  } : undefined,

  base: {
    service: config.service.name,
    version: config.service.version,
    env: config.service.environment,
  },

  serializers: {
    req: (req: Request) => ({
      id: req.headers['x-request-id'],
      method: req.method,
      url: req.originalUrl,
      headers: {
        'user-agent': req.headers['user-agent'],
      },
    }),
    res: (res: Response) => ({
      statusCode: res.statusCode,
    }),
    err: pino.stdSerializers.err,
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  // Redact sensitive fields
  redact: {
    paths: [
      'password',
      'apiKey',
      'dsn',
      'connectionString',
      'req.headers["x-api-key"]',
    ],
    censor: '[REDACTED]',
  },
});

// Create child loggers for different components
export const createLogger = (component: string) => {
  return logger.child({ component });
};

export const dbLogger = createLogger('database');
export const apiLogger = createLogger('api');
export const conversionLogger = createLogger('conversion');
export const workspaceLogger = createLogger('workspace');
export const ingestionLogger = createLogger('ingestion');
export const exportLogger = createLogger('export');

export const logRequest = (req: Request, res: Response, next: NextFunction) => {
  const startTime = Date.now();

  if (!req.headers['x-request-id']) {
    req.headers['x-request-id'] = uuidv4();
  }

  apiLogger.info({ req }, 'Request received');

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    apiLogger.info({ req, res, duration }, 'Request completed');
  });

  next();
};
