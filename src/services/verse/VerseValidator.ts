import type { ValidatedVerse } from '../../types';
import type { DetectionResult } from './FormatDetector';
import { BatchValidationError } from './errors';

export function toNonNegativeInt(value: unknown): number | null | undefined {
  if (value === undefined || value === null || value === '') return null;
  const n = typeof value === 'string' ? Number(value.trim()) : value;
  if (typeof n === 'number' && Number.isInteger(n) && n >= 0) return n;
  return undefined;
}

function idOf(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
}

/**
 * Checks detected verses before any processing: nothing the detector rejected,
 * and each verse has a non-empty `_id` (string, or a finite number read as its
 * decimal string), unique in the batch; chapter and verse numbers, when
 * present, must be non-negative integers (numeric strings are accepted).
 */
export function validateVerses(detection: DetectionResult): ValidatedVerse[] {
  if (detection.shape === 'unrecognized') {
    throw new BatchValidationError('Unrecognized verse payload', [
      'Expected a verse object, a list of verses, a list of {chapter, verses} groups, or {chapters: [...]}',
    ]);
  }

  const errors = detection.rejected.map(({ path, reason }) => `${path}: ${reason}`);
  const seen = new Set<string>();
  const out: ValidatedVerse[] = [];

  detection.verses.forEach((record, index) => {
    const id = idOf(record._id);
    if (!id) {
      const raw = record._id;
      const missing = raw === undefined || raw === null || typeof raw === 'string';
      errors.push(`verses[${index}]: ${missing ? 'missing _id' : '_id must be a string or a number'}`);
      return;
    }
    if (seen.has(id)) {
      errors.push(`verses[${index}]: duplicate _id ${id}`);
      return;
    }
    seen.add(id);

    const chapter = toNonNegativeInt(record.chapter);
    const verse = toNonNegativeInt(record.verse);
    if (chapter === undefined) errors.push(`verses[${index}] (${id}): chapter must be a non-negative integer`);
    if (verse === undefined) errors.push(`verses[${index}] (${id}): verse must be a non-negative integer`);
    if (chapter === undefined || verse === undefined) return;

    out.push({ id, chapter, verse, record });
  });

  if (errors.length > 0) {
    throw new BatchValidationError('Invalid verse payload', errors);
  }
  return out;
}
