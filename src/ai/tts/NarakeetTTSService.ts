import axios from 'axios';
import { logger } from '../../config/logger';
import { ProviderError } from '../errors';
import type { ITTSService, SynthesisOptions } from './types';

export interface NarakeetOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

function describeBody(data: unknown): string {
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8');
  return typeof data === 'string' ? data : '';
}

/**
 * Narakeet short-content TTS (https://www.narakeet.com/docs/automating/text-to-speech-api/).
 * Plain-text body, voice and speed as query params, MP3 bytes back.
 */
export class NarakeetTTSService implements ITTSService {
  readonly name = 'narakeet' as const;

  constructor(private readonly options: NarakeetOptions) {}

  isConfigured(): boolean {
    return Boolean(this.options.apiKey);
  }

  async synthesize(text: string, { voice, speed }: SynthesisOptions): Promise<Buffer> {
    if (!this.options.apiKey) {
      throw new ProviderError(this.name, 'config', 'Narakeet API key not configured');
    }

    logger.debug('Sending to Narakeet', { voice, speed, chars: text.length });
    try {
      const response = await axios.post<ArrayBuffer>(
        `${this.options.baseUrl}/text-to-speech/mp3`,
        Buffer.from(text, 'utf-8'),
        {
          params: { voice, speed },
          headers: {
            Accept: 'application/octet-stream',
            'Content-Type': 'text/plain',
            'x-api-key': this.options.apiKey,
          },
          responseType: 'arraybuffer',
          timeout: this.options.timeoutMs,
        }
      );
      return Buffer.from(response.data);
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
          throw new ProviderError(this.name, 'timeout', `Narakeet timeout after ${this.options.timeoutMs}ms`);
        }
        if (status !== undefined) {
          const body = describeBody(error.response?.data).slice(0, 300);
          logger.error('Narakeet API error', { status, body });
          throw new ProviderError(this.name, 'http', `Narakeet API error ${status}: ${body}`, status);
        }
        throw new ProviderError(this.name, 'network', `Narakeet request failed: ${error.message}`);
      }
      throw new ProviderError(
        this.name,
        'network',
        error instanceof Error ? error.message : String(error)
      );
    }
  }
}
