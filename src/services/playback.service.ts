/**
 * Local playback through ffplay (ships with ffmpeg). Playback is a side
 * effect only: `play` never rejects, it resolves false on any failure.
 */
import { spawn } from 'child_process';
import { logger } from '../config/logger';

export interface IAudioPlayer {
  play(filePath: string): Promise<boolean>;
}

export interface FfplayOptions {
  bin: string;
  timeoutMs: number;
  volume?: number;
}

export class FfplayAudioPlayer implements IAudioPlayer {
  private unavailableWarned = false;

  constructor(private readonly options: FfplayOptions) {}

  async play(filePath: string): Promise<boolean> {
    const args = ['-nodisp', '-autoexit', '-volume', String(this.options.volume ?? 80), filePath];
    logger.info('Playing audio', { filePath });

    return await new Promise<boolean>((resolve) => {
      const child = spawn(this.options.bin, args, { stdio: ['ignore', 'ignore', 'pipe'] });
      let stderr = '';

      const timeoutId = setTimeout(() => {
        child.kill('SIGKILL');
        logger.warn('Audio playback timed out', { filePath, timeoutMs: this.options.timeoutMs });
        resolve(false);
      }, this.options.timeoutMs);

      child.stderr.on('data', (d: Buffer) => (stderr += d.toString()));

      child.on('error', (e: Error) => {
        clearTimeout(timeoutId);
        if ('code' in e && e.code === 'ENOENT') {
          if (!this.unavailableWarned) {
            this.unavailableWarned = true;
            logger.warn('ffplay not found; install ffmpeg (macOS: brew install ffmpeg, Ubuntu: apt install ffmpeg)', {
              bin: this.options.bin,
            });
          }
        } else {
          logger.error('Audio playback failed', { filePath, error: e.message });
        }
        resolve(false);
      });

      child.on('close', (code) => {
        clearTimeout(timeoutId);
        if (code === 0) {
          logger.debug('Audio playback completed', { filePath });
          resolve(true);
        } else {
          logger.warn('ffplay exited with an error', { code, stderr: stderr.slice(0, 500) });
          resolve(false);
        }
      });
    });
  }
}

/** Starts playback without waiting for it; the outcome is only logged. */
export function playInBackground(player: IAudioPlayer, filePath: string): void {
  player.play(filePath).catch((e: unknown) => {
    logger.error('Audio playback crashed', { filePath, error: e instanceof Error ? e.message : String(e) });
  });
}
