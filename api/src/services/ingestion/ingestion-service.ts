import path from 'path';
import {
  BadInputError,
  IngestionResult,
  PayloadTooLargeError,
  SpatialDatabase,
  UploadedArchive,
} from '../../types';
import { ingestionLogger as logger } from '../../utils/logger';
import { extractArchive } from '../archive/archive-extractor';
import { GeometryConverter } from '../conversion/geometry-converter';
import { reconcile, truncateStaging } from '../reconciliation/staging-reconciler';
import { StagingLock } from '../reconciliation/staging-lock';
import { WorkspaceManager } from '../workspace/workspace-manager';

export interface IngestionOptions {
  targetRelation: string;
  stagingRelation: string;
  idColumn: string;
  maxUploadBytes: number;
}

/**
 * Upload path: extract -> import into staging -> merge into target ->
 * truncate staging. The staging relation is shared, so everything that
 * touches it runs under one lock.
 */
export class IngestionService {
  constructor(
    private readonly db: SpatialDatabase,
    private readonly converter: GeometryConverter,
    private readonly workspaces: WorkspaceManager,
    private readonly lock: StagingLock,
    private readonly options: IngestionOptions
  ) {}

  async ingest(upload: UploadedArchive): Promise<IngestionResult> {
    if (!upload.originalName.toLowerCase().endsWith('.zip')) {
      throw new BadInputError(
        'Upload a .zip file containing a shapefile (.shp .dbf .shx .prj)',
        'INVALID_FILE_TYPE',
        { filename: upload.originalName }
      );
    }

    if (upload.buffer.length > this.options.maxUploadBytes) {
      throw new PayloadTooLargeError('File too large', {
        size: upload.buffer.length,
        maxBytes: this.options.maxUploadBytes,
      });
    }

    const start = Date.now();

    const insertedRows = await this.workspaces.withWorkspace('upload', async (workspace) => {
      const extractDir = path.join(workspace.dir, 'extracted');
      const files = await extractArchive(upload.buffer, extractDir, { maxBytes: this.options.maxUploadBytes });
      logger.info({ filename: upload.originalName, files }, 'Upload extracted');

      return this.lock.runExclusive(async () => {
        await this.converter.importToStaging(extractDir, this.options.stagingRelation);

        return this.db.transaction(async (client) => {
          const inserted = await reconcile(client, this.options.targetRelation, this.options.stagingRelation, {
            idColumn: this.options.idColumn,
          });
          await truncateStaging(client, this.options.stagingRelation);
          return inserted;
        });
      });
    });

    logger.info({
      filename: upload.originalName,
      insertedRows,
      duration: Date.now() - start,
    }, 'Upload merged into target relation');

    return { status: 'ok', inserted_rows: insertedRows };
  }
}
