import { createServer } from 'http';
import { assertRequiredConfig, config } from './config';
import { logger } from './utils/logger';
import { databaseManager } from './database/database-manager';
import { ShapefileGatewayAPI } from './api';
import { Ogr2OgrConverter } from './services/conversion/ogr2ogr-converter';
import { WorkspaceManager } from './services/workspace/workspace-manager';
import { StagingLock } from './services/reconciliation/staging-lock';
import { IngestionService } from './services/ingestion/ingestion-service';
import { ExportPackager } from './services/export/export-packager';
import { columnsOf } from './services/reconciliation/schema-introspector';

const converter = new Ogr2OgrConverter({
  binary: config.conversion.binary,
  connectionString: config.postgres.connectionString,
  srid: config.conversion.srid,
  encoding: config.conversion.encoding,
  geometryColumn: config.relations.geometryColumn,
  layerName: config.export.layerName,
  timeoutMs: config.conversion.timeoutMs,
});

/**
 * Validate system health before starting
 */
async function validateSystemHealth(): Promise<void> {
  logger.info('Running system health validations...');

  const validations = [
    {
      name: 'Database Connection',
      critical: true,
      fn: async () => {
        await databaseManager.initialize();
      },
    },
    {
      name: 'Target Relation',
      critical: false,
      fn: async () => {
        const columns = await columnsOf(databaseManager, config.relations.target);
        if (columns.length === 0) {
          throw new Error(`${config.relations.target} has no columns`);
        }
        if (!columns.includes(config.relations.idColumn)) {
          logger.warn(`${config.relations.target} has no "${config.relations.idColumn}" column; every column will be mapped`);
        }
      },
    },
    {
      name: 'ogr2ogr',
      critical: false,
      fn: async () => {
        logger.info(`ogr2ogr: ${await converter.version()}`);
      },
    },
  ];

  for (const validation of validations) {
    try {
      await validation.fn();
      logger.info(`✓ ${validation.name} - OK`);
    } catch (error) {
      logger.error({ err: error }, `✗ ${validation.name} - FAILED`);

      if (validation.critical) {
        throw new Error(`Critical validation failed: ${validation.name}`);
      }
    }
  }

  logger.info('System health validations completed');
}

async function startServer(): Promise<void> {
  try {
    assertRequiredConfig();

    logger.info('Starting shapefile gateway...');
    logger.info(`Environment: ${config.service.environment}`);
    logger.info(`Version: ${config.service.version}`);

    await validateSystemHealth();

    const workspaces = new WorkspaceManager(config.upload.tempDir);

    const api = new ShapefileGatewayAPI({
      config,
      healthCheck: () => databaseManager.healthCheck(),
      ingestionService: new IngestionService(databaseManager, converter, workspaces, new StagingLock(), {
        targetRelation: config.relations.target,
        stagingRelation: config.relations.staging,
        idColumn: config.relations.idColumn,
        maxUploadBytes: config.upload.maxFileSize,
      }),
      exportPackager: new ExportPackager(databaseManager, converter, workspaces, {
        targetRelation: config.relations.target,
        idColumn: config.relations.idColumn,
        filePrefix: config.export.filePrefix,
      }),
    });

    const server = createServer(api.getApp());

    server.listen(config.service.port, () => {
      logger.info(`Shapefile gateway listening on port ${config.service.port}`);
      logger.info({
        target: config.relations.target,
        staging: config.relations.staging,
        workspaceRoot: workspaces.root,
        apiKeyRequired: Boolean(config.security.apiKey),
      }, 'Gateway ready');
    });

    const gracefulShutdown = async (signal: string) => {
      logger.info(`${signal} received, starting graceful shutdown...`);

      try {
        await new Promise<void>((resolve) => server.close(() => resolve()));
        logger.info('HTTP server closed');

        await databaseManager.close();

        logger.info('Graceful shutdown completed');
        process.exit(0);
      } catch (error) {
        logger.error({ err: error }, 'Error during graceful shutdown');
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

    process.on('uncaughtException', (error) => {
      logger.fatal(error, 'Uncaught exception');
      process.exit(1);
    });

    process.on('unhandledRejection', (reason) => {
      logger.fatal({ reason }, 'Unhandled rejection');
      process.exit(1);
    });
  } catch (error) {
    logger.error({ err: error }, 'Failed to start shapefile gateway');
    process.exit(1);
  }
}

startServer().catch((error) => {
  logger.error({ err: error }, 'Failed to start server');
  process.exit(1);
});
