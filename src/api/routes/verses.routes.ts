/**
 * Verse inspection API: run the format detector or the field extractor on
 * their own, without synthesis.
 */

import { Router, Request, Response } from 'express';
import { body } from 'express-validator';
import { logger } from '../../config/logger';
import { detectAndNormalize, extract } from '../../services/verse';
import { TEXT_TYPES } from '../../types';
import { validate } from '../middleware/validate';

const router = Router();

/** POST /verses/normalize - Flatten any supported payload shape */
router.post('/normalize', (req: Request, res: Response) => {
  try {
    const detection = detectAndNormalize(req.body);
    const rejected = detection.shape === 'unrecognized' ? [] : detection.rejected;
    res.json({ shape: detection.shape, count: detection.verses.length, verses: detection.verses, rejected });
  } catch (e) {
    logger.error('Normalize failed', { error: e instanceof Error ? e.message : String(e) });
    res.status(500).json({ error: 'Failed to normalize verses' });
  }
});

/** POST /verses/extract - Resolve the text of one verse for a text type */
router.post(
  '/extract',
  validate([
    body('verse').isObject().withMessage('verse must be an object'),
    body('textType').isString().notEmpty().withMessage('textType is required'),
  ]),
  (req: Request, res: Response) => {
    const textType = String(req.body.textType);
    const detection = detectAndNormalize(req.body.verse);
    const record = detection.shape === 'single_verse' ? detection.verses[0] : undefined;
    if (!record) {
      return res.status(400).json({ error: 'verse must be a single verse object' });
    }

    const result = extract(record, textType);
    if (result.unsupported) {
      return res.status(400).json({
        error: `Unsupported text type: ${textType}`,
        supported: TEXT_TYPES,
        ...result,
      });
    }
    res.json({ textType, ...result });
  }
);

export const versesRoutes = router;
