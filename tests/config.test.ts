import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const cfg = loadConfig({});
    expect(cfg.port).toBe(8081);
    expect(cfg.apiPrefix).toBe('/api/v1');
    expect(cfg.tts.provider).toBe('narakeet');
    expect(cfg.providers.timeoutMs).toBe(30000);
    expect(cfg.batch).toEqual({ maxVerses: 50, defaultSpeed: 0.85 });
    expect(cfg.audio.outputDir).toBe('audio_output');
  });

  it('reads overrides and ignores malformed numbers', () => {
    const cfg = loadConfig({
      TTS_PROVIDER: 'OpenAI',
      BATCH_MAX_VERSES: '5',
      PROVIDER_TIMEOUT_MS: 'soon',
      NARAKEET_API_KEY: 'test-key',
    });
    expect(cfg.tts.provider).toBe('openai');
    expect(cfg.batch.maxVerses).toBe(5);
    expect(cfg.providers.timeoutMs).toBe(30000);
    expect(cfg.narakeet.apiKey).toBe('test-key');
  });
});
