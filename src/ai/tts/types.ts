/**
 * Text-to-Speech abstraction for verse narration. Implemented with Narakeet
 * or OpenAI TTS; the interface allows pluggable backends and test fakes.
 */
import type { TTSProviderName } from '../../config';

export interface SynthesisOptions {
  voice: string;
  /** 1.0 is the provider's normal rate. */
  speed: number;
}

export interface ITTSService {
  readonly name: TTSProviderName;
  /** Whether credentials are present; synthesize rejects with a config error otherwise. */
  isConfigured(): boolean;
  /** Resolves to MP3 bytes or rejects with a ProviderError. */
  synthesize(text: string, options: SynthesisOptions): Promise<Buffer>;
}
