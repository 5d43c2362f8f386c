/**
 * Format Detector: accepts verse JSON in any of the historical export shapes
 * and flattens it to an ordered list of verse records.
 *
 * Accepted shapes, probed in this order:
 *   { chapters: [{ chapter_number, verses: [...] }] }
 *   { _id, chapter, verse, ... }                       (single verse)
 *   [{ _id, ... }, ...]                                (flat list)
 *   [{ chapter, verses: [...] }, ...]                  (chapter groups)
 *   [{ ... }, ...]                                     (best effort)
 * Anything else comes back wrapped as a single unrecognized value.
 * Elements a recognized shape cannot use are listed in `rejected`.
 */

import { COMMENTARY_KEYS, type VerseRecord } from '../../types';

export type PayloadShape =
  | 'chapters_object'
  | 'single_verse'
  | 'flat_list'
  | 'chapter_groups'
  | 'mapping_list'
  | 'unrecognized';

export interface RejectedElement {
  path: string;
  reason: string;
}

export type DetectionResult =
  | { shape: Exclude<PayloadShape, 'unrecognized'>; verses: VerseRecord[]; rejected: RejectedElement[] }
  | { shape: 'unrecognized'; verses: [unknown] };

const RECOGNIZED_KEYS = [
  '_id',
  'chapter',
  'verse',
  'slok',
  'transliteration',
  'sa',
  'en',
  'hi',
  'gu',
  'sanskrit',
  'english',
  'hindi',
  'gujarati',
] as const;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function hasCommentaryKeys(record: Record<string, unknown>): boolean {
  return COMMENTARY_KEYS.some((key) => key in record);
}

/**
 * Records carrying per-commentator objects are assumed complete and copied as
 * they are; everything else keeps only the recognized fields.
 */
export function normalizeVerse(raw: Record<string, unknown>, chapter?: number): VerseRecord {
  let record: VerseRecord;
  if (hasCommentaryKeys(raw)) {
    record = { ...raw };
  } else {
    record = {};
    for (const key of RECOGNIZED_KEYS) {
      if (raw[key] !== undefined) record[key] = raw[key];
    }
  }
  if (chapter !== undefined) record.chapter = chapter;
  return record;
}

function chapterNumberOf(group: Record<string, unknown>): number | undefined {
  const value = group.chapter_number ?? group.chapter;
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return undefined;
}

function flattenGroups(groups: unknown[], prefix: string, rejected: RejectedElement[]): VerseRecord[] {
  const out: VerseRecord[] = [];
  groups.forEach((group, i) => {
    if (!isPlainObject(group) || !Array.isArray(group.verses)) {
      rejected.push({ path: `${prefix}[${i}]`, reason: 'chapter group must have a verses array' });
      return;
    }
    const chapter = chapterNumberOf(group);
    group.verses.forEach((verse: unknown, j) => {
      if (isPlainObject(verse)) out.push(normalizeVerse(verse, chapter));
      else rejected.push({ path: `${prefix}[${i}].verses[${j}]`, reason: 'verse must be an object' });
    });
  });
  return out;
}

export function detectAndNormalize(payload: unknown): DetectionResult {
  const rejected: RejectedElement[] = [];

  if (isPlainObject(payload)) {
    if ('chapters' in payload) {
      if (!Array.isArray(payload.chapters)) {
        rejected.push({ path: 'payload.chapters', reason: 'must be an array of chapter groups' });
        return { shape: 'chapters_object', verses: [], rejected };
      }
      return { shape: 'chapters_object', verses: flattenGroups(payload.chapters, 'payload.chapters', rejected), rejected };
    }
    return { shape: 'single_verse', verses: [normalizeVerse(payload)], rejected };
  }

  if (Array.isArray(payload)) {
    if (payload.length === 0) return { shape: 'flat_list', verses: [], rejected };

    const first: unknown = payload[0];
    if (isPlainObject(first) && '_id' in first) {
      const verses: VerseRecord[] = [];
      payload.forEach((item: unknown, i) => {
        if (isPlainObject(item)) verses.push(normalizeVerse(item));
        else rejected.push({ path: `payload[${i}]`, reason: 'verse must be an object' });
      });
      return { shape: 'flat_list', verses, rejected };
    }
    if (isPlainObject(first) && 'chapter' in first && 'verses' in first) {
      return { shape: 'chapter_groups', verses: flattenGroups(payload, 'payload', rejected), rejected };
    }
    if (payload.every(isPlainObject)) {
      return { shape: 'mapping_list', verses: payload.map((v) => normalizeVerse(v)), rejected };
    }
  }

  return { shape: 'unrecognized', verses: [payload] };
}
