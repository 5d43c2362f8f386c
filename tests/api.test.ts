/**
 * HTTP-level tests. The app listens on an ephemeral local port inside the
 * test process; providers are in-process fakes.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Server } from 'http';
import { createApp } from '../src/api/app';
import { loadConfig } from '../src/config';
import type { AudioStorageService } from '../src/services/audio-storage.service';
import { createServices } from '../src/services';
import { FakePlayer, FakeTTS, FakeTranslator, tempStorage } from './helpers/fakes';

let server: Server;
let baseUrl: string;
let audioStorage: AudioStorageService;
let removeAudioDir: () => Promise<void>;
let tts: FakeTTS;

beforeAll(async () => {
  const { storage, dir, cleanup } = await tempStorage();
  audioStorage = storage;
  removeAudioDir = cleanup;
  tts = new FakeTTS();
  const config = loadConfig({ NODE_ENV: 'test', AUDIO_OUTPUT_DIR: dir, BATCH_MAX_VERSES: '10' });
  const services = createServices(config, {
    tts,
    translator: new FakeTranslator(),
    storage,
    player: new FakePlayer(),
  });
  server = createApp(services).listen(0, '127.0.0.1');
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('server did not bind a TCP port');
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  await removeAudioDir();
});

function postJson(path: string, body: unknown): Promise<Response> {
  return fetch(`${baseUrl}${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

describe('GET /health', () => {
  it('reports provider state', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body).toMatchObject({ status: 'ok', ttsProvider: 'narakeet', ttsConfigured: true, translator: 'fake' });
  });
});

describe('POST /api/v1/batch', () => {
  it('narrates a single verse across languages', async () => {
    const res = await postJson('/api/v1/batch', {
      data: { _id: 'BG1.1', chapter: 1, verse: 1, english: 'Dhritarashtra said', hindi: 'धृतराष्ट्र ने कहा' },
      languages: 'en,hi,gu',
      options: { useFallbacks: true },
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      batchId: expect.any(String),
      shape: 'single_verse',
      languages: ['en', 'hi', 'gu'],
      totalVerses: 1,
      processed: 1,
      skipped: 0,
      failed: 0,
      fallbacksUsed: 1,
      chapters: [1],
      verses: [{ verseId: 'BG1.1', chapter: 1, verse: 1, attempted: 3, succeeded: 3 }],
    });
  });

  it('rejects a request without languages', async () => {
    const res = await postJson('/api/v1/batch', { data: [{ _id: 'a' }] });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Validation failed',
      details: ['languages: languages must be a non-empty array or comma-separated string'],
    });
  });

  it('rejects a batch over the verse limit', async () => {
    const res = await postJson('/api/v1/batch', {
      data: [
        { _id: 'a', english: 'A' },
        { _id: 'b', english: 'B' },
      ],
      languages: ['en'],
      options: { maxVerses: 1 },
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Too many verses: 2 exceeds the limit of 1', details: [] });
  });

  it('does not let the request raise the configured verse limit', async () => {
    const data = Array.from({ length: 11 }, (_, i) => ({ _id: `BG1.${i + 1}`, english: 'E' }));
    const callsBefore = tts.calls.length;
    const res = await postJson('/api/v1/batch', { data, languages: ['en'], options: { maxVerses: 100000 } });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Too many verses: 11 exceeds the limit of 10', details: [] });
    expect(tts.calls.length).toBe(callsBefore);
  });

  it('rejects a chapters value that is not a list', async () => {
    const res = await postJson('/api/v1/batch', { data: { chapters: 'oops' }, languages: ['en'] });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: 'Invalid verse payload',
      details: ['payload.chapters: must be an array of chapter groups'],
    });
  });

  it('rejects verses without an id', async () => {
    const res = await postJson('/api/v1/batch', { data: [{ chapter: 1, verse: 1 }], languages: ['en'] });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid verse payload', details: ['verses[0]: missing _id'] });
  });
});

describe('POST /api/v1/verses', () => {
  it('normalizes a chapters payload', async () => {
    const res = await postJson('/api/v1/verses/normalize', {
      chapters: [{ chapter_number: 2, verses: [{ _id: 'BG2.47', verse: 47, en: 'Your right is to action' }] }],
    });
    expect(await res.json()).toEqual({
      shape: 'chapters_object',
      count: 1,
      verses: [{ _id: 'BG2.47', chapter: 2, verse: 47, en: 'Your right is to action' }],
      rejected: [],
    });
  });

  it('extracts text with its provenance', async () => {
    const res = await postJson('/api/v1/verses/extract', {
      verse: { english: 'Current', en: 'Legacy' },
      textType: 'english',
    });
    expect(await res.json()).toEqual({ textType: 'english', text: 'Current', provenance: 'direct', source: 'english' });
  });

  it('reports unsupported text types', async () => {
    const res = await postJson('/api/v1/verses/extract', { verse: { english: 'E' }, textType: 'french' });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: 'Unsupported text type: french',
      text: null,
      provenance: 'none',
      unsupported: true,
    });
  });
});

describe('POST /api/v1/synthesize', () => {
  it('translates before synthesizing Hindi', async () => {
    const res = await fetch(`${baseUrl}/api/v1/synthesize?language=hi`, {
      method: 'POST',
      headers: { 'Content-Type': 'text/plain' },
      body: 'Hello there',
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      success: true,
      originalText: 'Hello there',
      finalText: '[hi] Hello there',
      translationUsed: true,
      voice: 'amitabh',
      language: 'hi',
      speed: 0.85,
      played: false,
      fileSizeBytes: Buffer.byteLength('audio:amitabh'),
    });
  });

  it('reads a form-encoded body as the text', async () => {
    const res = await fetch(`${baseUrl}/api/v1/synthesize?language=en`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: 'Namaste friend',
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      originalText: 'Namaste friend',
      finalText: 'Namaste friend',
      translationUsed: false,
      voice: 'ravi',
      speed: 0.85,
    });
  });

  it('rejects empty text', async () => {
    const res = await postJson('/api/v1/synthesize', { text: '  ' });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Text cannot be empty' });
  });

  it('streams audio for one verse by commentator', async () => {
    const res = await postJson('/api/v1/synthesize/verse?author=purohit', {
      _id: 'BG1.1',
      chapter: 1,
      verse: 1,
      purohit: { et: 'The King Dhritarashtra asked' },
    });
    expect(res.status).toBe(200);
    expect(res.headers.get('x-verse-id')).toBe('BG1.1');
    expect(res.headers.get('x-voice-used')).toBe('ravi');
    expect(res.headers.get('content-type')).toBe('audio/mpeg');
    expect(Buffer.from(await res.arrayBuffer()).toString()).toBe('audio:ravi');
    expect(tts.calls[tts.calls.length - 1]).toEqual({
      text: 'Chapter 1, Verse 1. The King Dhritarashtra asked',
      voice: 'ravi',
      speed: 0.85,
    });
  });

  it('answers 400 when the commentator has no text', async () => {
    const res = await postJson('/api/v1/synthesize/verse?author=tej', { _id: 'BG1.1', purohit: { et: 'x' } });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'No text found for author: tej' });
  });
});

describe('voices and audio', () => {
  it('lists voices for the active provider', async () => {
    const res = await fetch(`${baseUrl}/api/v1/voices`);
    expect(await res.json()).toMatchObject({
      provider: 'narakeet',
      voices: {
        en: { male: ['ravi', 'dev', 'rajesh', 'manish', 'himesh'] },
        gu: { female: ['madhuri', 'kareena', 'rashmi', 'janhvi', 'shreya'] },
      },
    });
  });

  it('serves stored audio and 404s for unknown files', async () => {
    const files = await audioStorage.list();
    expect(files.length).toBeGreaterThan(0);
    const listing = await fetch(`${baseUrl}/api/v1/audio`);
    expect(await listing.json()).toEqual({ files });

    const first = files[0];
    expect(first.url).toBe(`/api/v1/audio/${first.filename}`);
    const audio = await fetch(`${baseUrl}${first.url}`);
    expect(audio.status).toBe(200);
    expect(await audio.text()).toBe(`audio:${first.filename.split('-')[0]}`);

    const missing = await fetch(`${baseUrl}/api/v1/audio/missing.mp3`);
    expect(missing.status).toBe(404);
  });
});
