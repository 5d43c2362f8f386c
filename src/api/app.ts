/**
 * Express app: CORS, JSON bodies, mount verse, batch, synthesis,
 * voice and audio routes. Built from a Services graph so tests can inject fakes.
 */

import express, { type Express } from 'express';
import cors from 'cors';
import type { Services } from '../services';
import { audioRoutes } from './routes/audio.routes';
import { batchRoutes } from './routes/batch.routes';
import { synthesizeRoutes } from './routes/synthesize.routes';
import { versesRoutes } from './routes/verses.routes';
import { voicesRoutes } from './routes/voices.routes';

export function createApp(services: Services): Express {
  const { config } = services;
  const app = express();

  app.use(cors({ origin: true }));
  app.use(express.json({ limit: '10mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      ts: new Date().toISOString(),
      ttsProvider: services.tts.name,
      ttsConfigured: services.tts.isConfigured(),
      translator: services.translator.name,
    });
  });

  app.get('/', (_req, res) => {
    res.json({
      message: 'Bhagavad Gita narration API',
      status: services.tts.isConfigured() ? 'healthy' : 'degraded',
      endpoints: {
        [`POST ${config.apiPrefix}/batch`]: 'Narrate verses x languages',
        [`POST ${config.apiPrefix}/verses/normalize`]: 'Flatten a verse payload',
        [`POST ${config.apiPrefix}/verses/extract`]: 'Resolve one verse text',
        [`POST ${config.apiPrefix}/synthesize`]: 'Synthesize text, with translation',
        [`POST ${config.apiPrefix}/synthesize/verse`]: 'Synthesize one verse by commentator',
        [`GET ${config.apiPrefix}/voices`]: 'Voices by language',
        [`GET ${config.apiPrefix}/audio`]: 'List generated audio',
        [`GET ${config.apiPrefix}/audio/:filename`]: 'Download generated audio',
      },
      languages: {
        en: 'English (Indian accent)',
        hi: 'Hindi (auto-translated when missing)',
        sa: 'Sanskrit',
        gu: 'Gujarati (auto-translated when missing)',
      },
    });
  });

  app.use(`${config.apiPrefix}/verses`, versesRoutes);
  app.use(`${config.apiPrefix}/batch`, batchRoutes(services));
  app.use(`${config.apiPrefix}/synthesize`, synthesizeRoutes(services));
  app.use(`${config.apiPrefix}/voices`, voicesRoutes(services.tts.name));
  app.use(`${config.apiPrefix}/audio`, audioRoutes(services.storage));

  return app;
}
