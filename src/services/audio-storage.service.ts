/**
 * Stores synthesized audio under the configured output directory and lists
 * what is there. Filenames are `<voice>-<timestamp>-<suffix>.mp3`.
 */
import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../config/logger';

export interface StoredAudio {
  filename: string;
  path: string;
  sizeBytes: number;
}

export interface AudioFileInfo {
  filename: string;
  size: number;
  created: string;
  url: string;
}

function timestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export class AudioStorageService {
  private readonly root: string;

  constructor(outputDir: string, private readonly urlPrefix = '/audio') {
    this.root = path.resolve(outputDir);
  }

  get directory(): string {
    return this.root;
  }

  async save(audio: Buffer, voice: string): Promise<StoredAudio> {
    await fs.mkdir(this.root, { recursive: true });
    const safeVoice = voice.replace(/[^a-zA-Z0-9_-]/g, '') || 'voice';
    const filename = `${safeVoice}-${timestamp(new Date())}-${uuidv4().slice(0, 8)}.mp3`;
    const filePath = path.join(this.root, filename);
    await fs.writeFile(filePath, audio);
    logger.info('Audio saved', { filename, sizeBytes: audio.length });
    return { filename, path: filePath, sizeBytes: audio.length };
  }

  /** Absolute path of a stored file, or null when missing or outside the output directory. */
  async resolve(filename: string): Promise<string | null> {
    if (filename !== path.basename(filename) || filename.startsWith('.')) return null;
    const filePath = path.join(this.root, filename);
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile() ? filePath : null;
    } catch {
      return null;
    }
  }

  async list(): Promise<AudioFileInfo[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.root);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
      throw error;
    }

    const files: AudioFileInfo[] = [];
    for (const filename of names.filter((n) => n.endsWith('.mp3')).sort()) {
      const stat = await fs.stat(path.join(this.root, filename));
      files.push({
        filename,
        size: stat.size,
        created: stat.birthtime.toISOString(),
        url: `${this.urlPrefix}/${filename}`,
      });
    }
    return files;
  }
}
