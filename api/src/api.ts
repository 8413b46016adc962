import express, { Application, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import multer from 'multer';
import { AppConfig } from './config';
import { apiLogger, logRequest } from './utils/logger';
import { DatabaseHealth } from './database/database-manager';
import { GatewayError, PayloadTooLargeError } from './types';
import { requireApiKey } from './middleware/api-key';
import { IngestionService } from './services/ingestion/ingestion-service';
import { ExportPackager } from './services/export/export-packager';
import { createUploadRouter } from './routes/upload';
import { createDownloadRouter } from './routes/download';

export interface GatewayDependencies {
  config: AppConfig;
  ingestionService: IngestionService;
  exportPackager: ExportPackager;
  healthCheck: () => Promise<DatabaseHealth>;
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export class ShapefileGatewayAPI {
  private app: Application;

  constructor(private readonly deps: GatewayDependencies) {
    this.app = express();

    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  /**
   * Set up Express middleware
   */
  private setupMiddleware(): void {
    const { config } = this.deps;

    this.app.use(helmet({
      crossOriginResourcePolicy: { policy: 'cross-origin' },
      contentSecurityPolicy: false, // Disable for API
    }));

    this.app.use(cors({
      origin: config.cors.origins.includes('*') ? true : config.cors.origins,
      credentials: config.cors.credentials,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-API-Key'],
      exposedHeaders: ['Content-Disposition'],
    }));

    this.app.use(compression());
    this.app.use(logRequest);

    this.app.use(rateLimit({
      windowMs: config.rateLimit.windowMs,
      max: config.rateLimit.max,
      message: 'Too many requests, please try again later',
      standardHeaders: true,
      legacyHeaders: false,
    }));

    this.app.set('trust proxy', 1);
  }

  /**
   * Set up API routes
   */
  private setupRoutes(): void {
    const { config, ingestionService, exportPackager, healthCheck } = this.deps;

    // Health check endpoint (left open for probes)
    this.app.get('/health', async (req: Request, res: Response) => {
      try {
        const database = await healthCheck();

        res.status(database.healthy ? 200 : 503).json({
          status: database.healthy ? 'healthy' : 'unhealthy',
          timestamp: new Date().toISOString(),
          service: {
            name: config.service.name,
            version: config.service.version,
            environment: config.service.environment,
          },
          components: { database },
        });
      } catch (error) {
        apiLogger.error({ err: error }, 'Health check failed');
        res.status(503).json({
          status: 'unhealthy',
          error: errorMessage(error),
        });
      }
    });

    const guard = requireApiKey(config.security.apiKey, config.security.apiKeyHeader);

    this.app.get('/', guard, (req: Request, res: Response) => {
      res.json({
        service: config.service.name,
        version: config.service.version,
        endpoints: {
          upload: 'POST /upload',
          downloadAll: 'GET /download/all',
          downloadById: 'GET /download/id/:featureId',
          downloadByIds: 'GET /download/ids?ids=1,2,5',
        },
      });
    });

    this.app.use('/upload', guard, createUploadRouter(ingestionService, config.upload.maxFileSize));
    this.app.use('/download', guard, createDownloadRouter(exportPackager));

    // 404 handler
    this.app.use((req: Request, res: Response) => {
      res.status(404).json({
        error: {
          message: 'Endpoint not found',
          code: 'NOT_FOUND',
          path: req.path,
        },
      });
    });
  }

  /**
   * Set up error handling middleware
   */
  private setupErrorHandling(): void {
    const production = this.deps.config.service.environment === 'production';

    // Express recognises error handlers by their four-argument signature
    this.app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
      const error = err instanceof multer.MulterError && err.code === 'LIMIT_FILE_SIZE'
        ? new PayloadTooLargeError('File too large', { maxBytes: this.deps.config.upload.maxFileSize })
        : err;

      if (error instanceof GatewayError) {
        const level = error.statusCode >= 500 ? 'error' : 'warn';
        apiLogger[level]({
          err: error,
          request: { method: req.method, path: req.path },
        }, 'Request failed');

        return res.status(error.statusCode).json({
          error: {
            message: error.message,
            code: error.code,
            ...(error.context && { context: error.context }),
          },
        });
      }

      if (error instanceof multer.MulterError) {
        apiLogger.warn({ err: error }, 'Rejected multipart request');
        return res.status(400).json({
          error: {
            message: error.message,
            code: error.code,
          },
        });
      }

      apiLogger.error({
        err: error,
        request: { method: req.method, path: req.path },
      }, 'Request error');

      res.status(500).json({
        error: {
          message: production ? 'Internal server error' : errorMessage(error),
          code: 'INTERNAL_ERROR',
        },
      });
    });
  }

  /**
   * Get Express app instance
   */
  getApp(): Application {
    return this.app;
  }
}
