/**
 * Translation provider export. OpenAI when OPENAI_API_KEY is set; otherwise a
 * pass-through so Hindi and Gujarati fallbacks degrade to the English text.
 */
import type { AppConfig } from '../../config';
import { OpenAITranslationService } from './OpenAITranslationService';
import { PassthroughTranslationService } from './PassthroughTranslationService';
import type { ITranslationService } from './types';

export function createTranslationService(cfg: AppConfig): ITranslationService {
  if (cfg.openai.apiKey) {
    return new OpenAITranslationService({
      apiKey: cfg.openai.apiKey,
      model: cfg.openai.translationModel,
      timeoutMs: cfg.providers.timeoutMs,
    });
  }
  return new PassthroughTranslationService();
}

export type { ITranslationService } from './types';
