/**
 * Central configuration. All env vars are read here so the rest of the app
 * stays env-agnostic and testable. `loadConfig` builds the struct once at
 * startup; services receive the parts they need through their constructors.
 */
import dotenv from 'dotenv';

dotenv.config();

export type TTSProviderName = 'narakeet' | 'openai';

export interface AppConfig {
  env: string;
  host: string;
  port: number;
  apiPrefix: string;
  logLevel: string;

  tts: {
    provider: TTSProviderName;
  };

  narakeet: {
    apiKey: string;
    baseUrl: string;
  };

  openai: {
    apiKey: string;
    /** Chat model used for machine translation of verse text. */
    translationModel: string;
    ttsModel: string;
  };

  providers: {
    /** Upper bound for every translation and synthesis call. */
    timeoutMs: number;
  };

  audio: {
    outputDir: string;
    ffplayPath: string;
    playbackTimeoutMs: number;
  };

  batch: {
    maxVerses: number;
    defaultSpeed: number;
  };
}

type Env = Record<string, string | undefined>;

function parseNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const provider = (env.TTS_PROVIDER || 'narakeet').toLowerCase();

  return {
    env: env.NODE_ENV || 'development',
    host: env.HOST || '0.0.0.0',
    port: parseInt(env.PORT || '8081', 10),
    apiPrefix: env.API_PREFIX || '/api/v1',
    logLevel: env.LOG_LEVEL || 'info',

    tts: {
      provider: provider === 'openai' ? 'openai' : 'narakeet',
    },

    narakeet: {
      apiKey: env.NARAKEET_API_KEY || '',
      baseUrl: env.NARAKEET_BASE_URL || 'https://api.narakeet.com',
    },

    openai: {
      apiKey: env.OPENAI_API_KEY || '',
      translationModel: env.OPENAI_TRANSLATION_MODEL || 'gpt-4o-mini',
      ttsModel: env.OPENAI_TTS_MODEL || 'tts-1-hd',
    },

    providers: {
      timeoutMs: parseNumber(env.PROVIDER_TIMEOUT_MS, 30000),
    },

    audio: {
      outputDir: env.AUDIO_OUTPUT_DIR || 'audio_output',
      ffplayPath: env.FFPLAY_PATH || 'ffplay',
      playbackTimeoutMs: parseNumber(env.PLAYBACK_TIMEOUT_MS, 30000),
    },

    batch: {
      maxVerses: parseNumber(env.BATCH_MAX_VERSES, 50),
      defaultSpeed: parseNumber(env.DEFAULT_SPEED, 0.85),
    },
  };
}

export const config: AppConfig = loadConfig();
