/**
 * Entry point: build services from config and start the HTTP server.
 */
import { createServer } from 'http';
import { createApp } from './api/app';
import { config } from './config';
import { logger } from './config/logger';
import { createServices } from './services';

async function start() {
  const services = createServices(config);

  if (!services.tts.isConfigured()) {
    logger.warn(`TTS provider "${services.tts.name}" has no API key; synthesis requests will fail`, {
      hint: services.tts.name === 'narakeet' ? 'Set NARAKEET_API_KEY' : 'Set OPENAI_API_KEY',
    });
  }
  if (services.translator.name === 'passthrough') {
    logger.warn('No translation provider configured; Hindi and Gujarati fallbacks will use English text', {
      hint: 'Set OPENAI_API_KEY',
    });
  }

  const httpServer = createServer(createApp(services));
  const server = httpServer.listen(config.port, config.host, () => {
    logger.info(`Server listening on ${config.host}:${config.port} (env: ${config.env})`);
    logger.info('Audio output directory', { dir: services.storage.directory });
  });

  return server;
}

const serverPromise = start().catch((e) => {
  logger.error('Startup failed:', e);
  process.exit(1);
});

export default serverPromise;
