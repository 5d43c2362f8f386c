import OpenAI from 'openai';
import { ProviderError } from '../errors';
import type { ITTSService, SynthesisOptions } from './types';

export const OPENAI_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;

type OpenAIVoice = (typeof OPENAI_VOICES)[number];

function isOpenAIVoice(voice: string): voice is OpenAIVoice {
  return (OPENAI_VOICES as readonly string[]).includes(voice);
}

export interface OpenAITTSOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export class OpenAITTSService implements ITTSService {
  readonly name = 'openai' as const;
  private openai: OpenAI | null = null;

  /** `client` replaces the one built from `options`. */
  constructor(private readonly options: OpenAITTSOptions, client?: OpenAI) {
    if (client) {
      this.openai = client;
    } else if (options.apiKey) {
      this.openai = new OpenAI({
        apiKey: options.apiKey,
        timeout: options.timeoutMs,
        maxRetries: 0,
      });
    }
  }

  isConfigured(): boolean {
    return this.openai !== null;
  }

  async synthesize(text: string, { voice, speed }: SynthesisOptions): Promise<Buffer> {
    if (!this.openai) {
      throw new ProviderError(this.name, 'config', 'OpenAI API key missing for TTS');
    }

    try {
      const mp3 = await this.openai.audio.speech.create({
        model: this.options.model,
        voice: isOpenAIVoice(voice) ? voice : 'nova',
        input: text,
        // OpenAI accepts 0.25 - 4.0.
        speed: Math.min(4, Math.max(0.25, speed)),
      });
      return Buffer.from(await mp3.arrayBuffer());
    } catch (error) {
      if (error instanceof OpenAI.APIConnectionTimeoutError) {
        throw new ProviderError(this.name, 'timeout', `OpenAI TTS timeout after ${this.options.timeoutMs}ms`);
      }
      if (error instanceof OpenAI.APIError && error.status !== undefined) {
        throw new ProviderError(this.name, 'http', `OpenAI TTS error ${error.status}: ${error.message}`, error.status);
      }
      throw new ProviderError(this.name, 'network', error instanceof Error ? error.message : String(error));
    }
  }
}
