/**
 * Stored audio API: GET /audio lists generated files, GET /audio/:filename serves one.
 */

import { Router, Request, Response } from 'express';
import { param } from 'express-validator';
import { logger } from '../../config/logger';
import type { AudioStorageService } from '../../services/audio-storage.service';
import { validate } from '../middleware/validate';

export function audioRoutes(storage: AudioStorageService): Router {
  const router = Router();

  router.get('/', async (_req: Request, res: Response) => {
    try {
      res.json({ files: await storage.list() });
    } catch (e) {
      logger.error('Listing audio failed', { error: e instanceof Error ? e.message : String(e) });
      res.status(500).json({ error: 'Failed to list audio files' });
    }
  });

  router.get(
    '/:filename',
    validate([param('filename').matches(/^[\w.-]+\.mp3$/).withMessage('filename must be an .mp3 file name')]),
    async (req: Request, res: Response) => {
      const filePath = await storage.resolve(req.params.filename);
      if (!filePath) {
        return res.status(404).json({ error: 'Audio file not found' });
      }
      res.type('audio/mpeg');
      res.sendFile(filePath);
    }
  );

  return router;
}
