/**
 * Direct synthesis API.
 * POST /synthesize        - free text (raw body of any text or form type, or JSON { text }),
 *                           optional translation
 * POST /synthesize/verse  - one verse read from a single commentator's fields
 */

import express, { Router, Request, Response } from 'express';
import { query } from 'express-validator';
import { logger } from '../../config/logger';
import { isProviderError } from '../../ai/errors';
import type { Services } from '../../services';
import { buildNarration, formatForNarration } from '../../services/narration-text';
import { playInBackground } from '../../services/playback.service';
import { extractCommentary, getRecommendedVoice } from '../../services/verse';
import { isPlainObject } from '../../services/verse/FormatDetector';
import { SANSKRIT_MAX_SPEED } from '../../services/verse/BatchOrchestrator';
import { toNonNegativeInt } from '../../services/verse/VerseValidator';
import type { VoiceGender } from '../../types';
import { validate } from '../middleware/validate';

function providerStatus(error: unknown): { status: number; error: string } {
  if (isProviderError(error)) {
    switch (error.kind) {
      case 'timeout':
        return { status: 504, error: `${error.provider} timed out` };
      case 'config':
        return { status: 503, error: error.message };
      case 'http':
      case 'network':
        return { status: 502, error: error.message };
    }
  }
  return { status: 500, error: 'Synthesis failed' };
}

function requestText(req: Request): string {
  if (typeof req.body === 'string') return req.body;
  if (req.body && typeof req.body.text === 'string') return req.body.text;
  return '';
}

/** "hi-IN" and "hi" both map to "hi"; anything else reads as English. */
function verseLanguage(raw: unknown): 'en' | 'hi' {
  return typeof raw === 'string' && raw.toLowerCase().startsWith('hi') ? 'hi' : 'en';
}

export function synthesizeRoutes(services: Services): Router {
  const router = Router();
  const { tts, translator, storage, player } = services;
  const defaultSpeed = services.config.batch.defaultSpeed;

  /** POST /synthesize - Synthesize free text, translating English to hi/gu first */
  router.post(
    '/',
    // `curl -d` sends form-encoded; the body is still the text itself.
    express.text({ type: ['text/*', 'application/x-www-form-urlencoded'], limit: '1mb' }),
    validate([
      query('language').optional().isIn(['en', 'hi', 'sa', 'gu']),
      query('gender').optional().isIn(['male', 'female']),
      query('speed').optional().isFloat({ min: 0.25, max: 4 }),
      query('play').optional().isBoolean(),
      query('voice').optional().isString().trim().notEmpty(),
    ]),
    async (req: Request, res: Response) => {
      const text = requestText(req).trim();
      if (!text) {
        return res.status(400).json({ error: 'Text cannot be empty' });
      }

      const language = typeof req.query.language === 'string' ? req.query.language : 'en';
      const gender: VoiceGender = req.query.gender === 'female' ? 'female' : 'male';
      const requestedSpeed = typeof req.query.speed === 'string' ? Number(req.query.speed) : defaultSpeed;
      const speed = language === 'sa' ? Math.min(requestedSpeed, SANSKRIT_MAX_SPEED) : requestedSpeed;
      const play = req.query.play === 'true';
      const voice =
        typeof req.query.voice === 'string' && req.query.voice
          ? req.query.voice
          : getRecommendedVoice(language, gender, tts.name);

      try {
        let finalText = text;
        if (language === 'hi' || language === 'gu') {
          try {
            finalText = await translator.translate(text, language);
          } catch (e) {
            logger.warn('Translation failed, using original text', {
              language,
              error: e instanceof Error ? e.message : String(e),
            });
          }
        }

        const audio = await tts.synthesize(formatForNarration(finalText, language), { voice, speed });
        const stored = await storage.save(audio, voice);
        if (play) playInBackground(player, stored.path);

        res.json({
          success: true,
          message: 'Synthesis completed successfully',
          originalText: text,
          finalText,
          translationUsed: language !== 'en' && finalText !== text,
          audioFile: stored.filename,
          voice,
          language,
          speed,
          played: play,
          fileSizeBytes: stored.sizeBytes,
        });
      } catch (e) {
        const { status, error } = providerStatus(e);
        logger.error('Synthesis failed', { language, voice, error: e instanceof Error ? e.message : String(e) });
        res.status(status).json({ error });
      }
    }
  );

  /** POST /synthesize/verse - Narrate one verse from a commentator's translation */
  router.post(
    '/verse',
    validate([
      query('author').optional().isString().trim().notEmpty(),
      query('language').optional().isString(),
      query('voice').optional().isString().trim().notEmpty(),
      query('speed').optional().isFloat({ min: 0.25, max: 4 }),
    ]),
    async (req: Request, res: Response) => {
      // Read as received: commentator keys outside the known set must survive.
      const record: unknown = req.body;
      if (!isPlainObject(record) || 'chapters' in record) {
        return res.status(400).json({ error: 'Body must be a single verse object' });
      }

      const author = typeof req.query.author === 'string' ? req.query.author : 'purohit';
      const text = extractCommentary(record, author);
      if (!text) {
        return res.status(400).json({ error: `No text found for author: ${author}` });
      }

      const language = verseLanguage(req.query.language);
      const voice =
        typeof req.query.voice === 'string' && req.query.voice
          ? req.query.voice
          : getRecommendedVoice(language, 'male', tts.name);
      const speed = typeof req.query.speed === 'string' ? Number(req.query.speed) : defaultSpeed;
      const verseId = typeof record._id === 'string' ? record._id : 'unknown';
      const chapter = toNonNegativeInt(record.chapter) ?? null;
      const verse = toNonNegativeInt(record.verse) ?? null;

      try {
        const audio = await tts.synthesize(buildNarration(text, chapter, verse, language), { voice, speed });
        res.set({
          'Content-Type': 'audio/mpeg',
          'Content-Length': String(audio.length),
          'Content-Disposition': `attachment; filename=verse_${verseId.replace(/[^\w.-]/g, '_')}.mp3`,
          'X-Verse-ID': verseId,
          'X-Voice-Used': voice,
        });
        res.send(audio);
      } catch (e) {
        const { status, error } = providerStatus(e);
        logger.error('Verse synthesis failed', { verseId, author, error: e instanceof Error ? e.message : String(e) });
        res.status(status).json({ error });
      }
    }
  );

  return router;
}
