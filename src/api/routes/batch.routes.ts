/**
 * Batch narration API.
 * POST /batch - body { data, languages, options } where `data` is verse JSON
 * in any supported shape and `languages` is an array or "en,hi,gu".
 */

import { Router, Request, Response } from 'express';
import { body } from 'express-validator';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../config/logger';
import type { Services } from '../../services';
import { BatchValidationError, detectAndNormalize, validateVerses } from '../../services/verse';
import { isPlainObject } from '../../services/verse/FormatDetector';
import type { BatchOptions } from '../../types';
import { validate } from '../middleware/validate';

export function parseLanguages(raw: unknown): string[] {
  const list = Array.isArray(raw) ? raw : typeof raw === 'string' ? raw.split(',') : [];
  return list
    .filter((l): l is string => typeof l === 'string')
    .map((l) => l.trim().toLowerCase())
    .filter(Boolean);
}

function readBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return undefined;
}

function readNumber(value: unknown): number | undefined {
  const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  return typeof n === 'number' && Number.isFinite(n) ? n : undefined;
}

/** Reads already-validated options; unknown keys are ignored. */
export function toBatchOptions(raw: unknown): Partial<BatchOptions> {
  if (!isPlainObject(raw)) return {};
  const options: Partial<BatchOptions> = {};
  if (raw.gender === 'male' || raw.gender === 'female') options.gender = raw.gender;
  const skipMissing = readBoolean(raw.skipMissing);
  if (skipMissing !== undefined) options.skipMissing = skipMissing;
  const useFallbacks = readBoolean(raw.useFallbacks);
  if (useFallbacks !== undefined) options.useFallbacks = useFallbacks;
  const includeTransliteration = readBoolean(raw.includeTransliteration);
  if (includeTransliteration !== undefined) options.includeTransliteration = includeTransliteration;
  const play = readBoolean(raw.play);
  if (play !== undefined) options.play = play;
  const maxVerses = readNumber(raw.maxVerses);
  if (maxVerses !== undefined) options.maxVerses = maxVerses;
  const speed = readNumber(raw.speed);
  if (speed !== undefined) options.speed = speed;
  return options;
}

export function batchRoutes(services: Services): Router {
  const router = Router();

  /** POST /batch - Normalize, resolve and narrate verses x languages */
  router.post(
    '/',
    validate([
      body('data').exists({ values: 'null' }).withMessage('data is required'),
      body('languages')
        .custom((value: unknown) => parseLanguages(value).length > 0)
        .withMessage('languages must be a non-empty array or comma-separated string'),
      body('options').optional().isObject(),
      body('options.gender').optional().isIn(['male', 'female']),
      body('options.skipMissing').optional().isBoolean(),
      body('options.useFallbacks').optional().isBoolean(),
      body('options.includeTransliteration').optional().isBoolean(),
      body('options.play').optional().isBoolean(),
      body('options.maxVerses').optional().isInt({ min: 1 }),
      body('options.speed').optional().isFloat({ min: 0.25, max: 4 }),
    ]),
    async (req: Request, res: Response) => {
      const batchId = uuidv4();
      try {
        const languages = parseLanguages(req.body.languages);
        const options = toBatchOptions(req.body.options);
        const detection = detectAndNormalize(req.body.data);
        const verses = validateVerses(detection);

        logger.info('Batch request received', { batchId, shape: detection.shape, verses: verses.length, languages });
        const summary = await services.orchestrator.process(verses, languages, options);
        res.json({ batchId, shape: detection.shape, languages, ...summary });
      } catch (e) {
        if (e instanceof BatchValidationError) {
          return res.status(400).json({ error: e.message, details: e.details });
        }
        logger.error('Batch processing failed', { batchId, error: e instanceof Error ? e.message : String(e) });
        res.status(500).json({ error: 'Batch processing failed' });
      }
    }
  );

  return router;
}
