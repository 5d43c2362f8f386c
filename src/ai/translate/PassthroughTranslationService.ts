import { logger } from '../../config/logger';
import type { ITranslationService } from './types';

/** Used when no translation provider is configured: returns the text unchanged. */
export class PassthroughTranslationService implements ITranslationService {
  readonly name = 'passthrough';

  async translate(text: string, targetLanguage: string): Promise<string> {
    logger.debug('Translation not configured; using original text', { targetLanguage });
    return text;
  }
}
