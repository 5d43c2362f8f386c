/**
 * Single TTS provider export. Narakeet by default; OpenAI when TTS_PROVIDER=openai.
 */
import type { AppConfig } from '../../config';
import { NarakeetTTSService } from './NarakeetTTSService';
import { OpenAITTSService } from './OpenAITTSService';
import type { ITTSService } from './types';

export function createTTSService(cfg: AppConfig): ITTSService {
  if (cfg.tts.provider === 'openai') {
    return new OpenAITTSService({
      apiKey: cfg.openai.apiKey,
      model: cfg.openai.ttsModel,
      timeoutMs: cfg.providers.timeoutMs,
    });
  }
  return new NarakeetTTSService({
    apiKey: cfg.narakeet.apiKey,
    baseUrl: cfg.narakeet.baseUrl,
    timeoutMs: cfg.providers.timeoutMs,
  });
}

export type { ITTSService, SynthesisOptions } from './types';
