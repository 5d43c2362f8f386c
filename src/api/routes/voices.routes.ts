import { Router } from 'express';
import type { TTSProviderName } from '../../config';
import { voicesFor } from '../../services/verse';
import { LANGUAGE_CODES } from '../../types';

/** GET /voices - Voices per language and gender for the active provider */
export function voicesRoutes(provider: TTSProviderName): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const voices = Object.fromEntries(
      LANGUAGE_CODES.map((language) => [
        language,
        { male: voicesFor(provider, language, 'male'), female: voicesFor(provider, language, 'female') },
      ])
    );
    res.json({ provider, voices });
  });

  return router;
}
