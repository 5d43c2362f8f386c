/**
 * Builds the service graph once from an AppConfig. Routes receive this
 * object instead of reaching for module-level singletons, so tests can swap
 * providers for in-process fakes.
 */
import type { AppConfig } from '../config';
import { createTTSService, type ITTSService } from '../ai/tts';
import { createTranslationService, type ITranslationService } from '../ai/translate';
import { AudioStorageService } from './audio-storage.service';
import { FfplayAudioPlayer, type IAudioPlayer } from './playback.service';
import { BatchOrchestrator } from './verse/BatchOrchestrator';

export interface Services {
  config: AppConfig;
  tts: ITTSService;
  translator: ITranslationService;
  storage: AudioStorageService;
  player: IAudioPlayer;
  orchestrator: BatchOrchestrator;
}

export function createServices(cfg: AppConfig, overrides: Partial<Omit<Services, 'config' | 'orchestrator'>> = {}): Services {
  const tts = overrides.tts ?? createTTSService(cfg);
  const translator = overrides.translator ?? createTranslationService(cfg);
  const storage = overrides.storage ?? new AudioStorageService(cfg.audio.outputDir, `${cfg.apiPrefix}/audio`);
  const player =
    overrides.player ?? new FfplayAudioPlayer({ bin: cfg.audio.ffplayPath, timeoutMs: cfg.audio.playbackTimeoutMs });

  const orchestrator = new BatchOrchestrator({
    tts,
    translator,
    storage,
    player,
    defaults: { maxVerses: cfg.batch.maxVerses, speed: cfg.batch.defaultSpeed },
  });

  return { config: cfg, tts, translator, storage, player, orchestrator };
}
