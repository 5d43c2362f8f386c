import OpenAI from 'openai';
import { logger } from '../../config/logger';
import { ProviderError, withTimeout } from '../errors';
import type { ITranslationService } from './types';

export const LANGUAGE_NAMES: Readonly<Record<string, string>> = {
  en: 'English',
  hi: 'Hindi',
  gu: 'Gujarati',
  sa: 'Sanskrit',
};

export interface OpenAITranslationOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

/**
 * Translation through an OpenAI chat model. The prompt asks for the
 * translation only, in the target language's native script.
 */
export class OpenAITranslationService implements ITranslationService {
  readonly name = 'openai';
  private client: OpenAI;

  constructor(private readonly options: OpenAITranslationOptions, client?: OpenAI) {
    this.client =
      client ??
      new OpenAI({
        apiKey: options.apiKey,
        timeout: options.timeoutMs,
        maxRetries: 0,
      });
  }

  async translate(text: string, targetLanguage: string): Promise<string> {
    if (targetLanguage === 'en') return text;
    const languageName = LANGUAGE_NAMES[targetLanguage] ?? targetLanguage;

    logger.info('Translating verse text', { targetLanguage, preview: text.slice(0, 50) });
    try {
      const completion = await withTimeout(
        this.name,
        this.client.chat.completions.create({
          model: this.options.model,
          messages: [
            {
              role: 'system',
              content: `You translate passages of the Bhagavad Gita from English into ${languageName}. Reply with the translation only, written in the native script, with no notes or quotation marks.`,
            },
            { role: 'user', content: text },
          ],
          temperature: 0.2,
          max_tokens: 1024,
        }),
        this.options.timeoutMs
      );
      const translated = completion.choices[0]?.message?.content?.trim() ?? '';
      return translated || text;
    } catch (error) {
      if (error instanceof ProviderError) throw error;
      if (error instanceof OpenAI.APIConnectionTimeoutError) {
        throw new ProviderError(this.name, 'timeout', `OpenAI translation timeout after ${this.options.timeoutMs}ms`);
      }
      if (error instanceof OpenAI.APIError && error.status !== undefined) {
        throw new ProviderError(this.name, 'http', `OpenAI translation error ${error.status}: ${error.message}`, error.status);
      }
      throw new ProviderError(this.name, 'network', error instanceof Error ? error.message : String(error));
    }
  }
}
