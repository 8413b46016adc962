import { Router, Request, Response, NextFunction } from 'express';
import { ExportSelector } from '../types';
import { ExportPackager } from '../services/export/export-packager';
import { parseFeatureId, parseIdList } from '../services/export/export-selector';
import { exportLogger } from '../utils/logger';

export function createDownloadRouter(packager: ExportPackager): Router {
  const router = Router();

  const send = async (selector: ExportSelector, res: Response, next: NextFunction) => {
    const artifact = await packager.packageQuery(selector);

    const release = () => {
      artifact.release().catch((error: unknown) => {
        exportLogger.error({ err: error, fileName: artifact.fileName }, 'Export cleanup failed');
      });
    };

    // 'close' fires once the response is finished or the connection drops
    res.once('close', release);

    res.download(artifact.archivePath, artifact.fileName, (error) => {
      release();
      if (!error) {
        return;
      }
      exportLogger.warn({ err: error, fileName: artifact.fileName }, 'Export delivery interrupted');
      if (!res.headersSent) {
        next(error);
      }
    });
  };

  /**
   * GET /download/all
   */
  router.get('/all', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await send({ kind: 'all' }, res, next);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /download/id/:featureId
   */
  router.get('/id/:featureId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await send({ kind: 'id', id: parseFeatureId(req.params.featureId) }, res, next);
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /download/ids?ids=1,2,5
   */
  router.get('/ids', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await send({ kind: 'ids', ids: parseIdList(req.query.ids) }, res, next);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
