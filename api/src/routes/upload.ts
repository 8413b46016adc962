import { Router, Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { BadInputError } from '../types';
import { IngestionService } from '../services/ingestion/ingestion-service';

/**
 * POST /upload
 * Multipart field `file`: a zipped shapefile set
 */
export function createUploadRouter(ingestionService: IngestionService, maxUploadBytes: number): Router {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes, files: 1 },
  });

  router.post('/', upload.single('file'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      if (!req.file) {
        throw new BadInputError('Please provide a .zip file in the "file" field', 'NO_FILE_PROVIDED');
      }

      const result = await ingestionService.ingest({
        originalName: req.file.originalname,
        buffer: req.file.buffer,
      });

      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
