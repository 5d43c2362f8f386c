/**
 * Field Extractor: resolves the text of one verse for a requested text type.
 *
 * Each text type has an ordered chain of lookup rules covering three
 * generations of verse exports (long-form fields, short legacy codes, and
 * per-commentator objects). Rules are tried in order and the first non-empty
 * string wins. The order is part of the public contract: changing it changes
 * which text gets narrated for records that carry several variants.
 */

import { logger } from '../../config/logger';
import {
  TEXT_TYPES,
  type CommentaryField,
  type CommentaryKey,
  type ExtractionResult,
  type TextType,
  type VerseRecord,
} from '../../types';
import { isPlainObject } from './FormatDetector';

export type LookupRule =
  | { kind: 'field'; field: string; provenance: 'direct' | 'legacy_field' }
  | { kind: 'nested'; authors: readonly CommentaryKey[]; field: CommentaryField };

const SANSKRIT_AUTHORS = ['tej', 'siva', 'prabhu', 'rams', 'sankar'] as const;

export const EXTRACTION_CHAINS: Readonly<Record<TextType, readonly LookupRule[]>> = {
  sanskrit: [
    { kind: 'field', field: 'sanskrit', provenance: 'direct' },
    { kind: 'field', field: 'transliteration', provenance: 'legacy_field' },
    { kind: 'field', field: 'slok', provenance: 'legacy_field' },
    { kind: 'field', field: 'sa', provenance: 'legacy_field' },
    { kind: 'nested', authors: SANSKRIT_AUTHORS, field: 'st' },
  ],
  sanskrit_devanagari: [
    { kind: 'field', field: 'sanskrit', provenance: 'direct' },
    { kind: 'field', field: 'slok', provenance: 'legacy_field' },
    { kind: 'nested', authors: SANSKRIT_AUTHORS, field: 'sd' },
  ],
  hindi: [
    { kind: 'field', field: 'hindi', provenance: 'direct' },
    { kind: 'field', field: 'hi', provenance: 'legacy_field' },
    { kind: 'nested', authors: ['tej', 'rams', 'sankar', 'siva', 'prabhu'], field: 'ht' },
  ],
  gujarati: [
    { kind: 'field', field: 'gujarati', provenance: 'direct' },
    { kind: 'field', field: 'gu', provenance: 'legacy_field' },
    { kind: 'nested', authors: ['tej', 'siva', 'prabhu'], field: 'gt' },
  ],
  english: [
    { kind: 'field', field: 'english', provenance: 'direct' },
    { kind: 'field', field: 'en', provenance: 'legacy_field' },
    { kind: 'nested', authors: ['prabhu', 'siva', 'purohit', 'san', 'adi', 'gambir', 'tej'], field: 'et' },
  ],
};

export function isTextType(value: string): value is TextType {
  return (TEXT_TYPES as readonly string[]).includes(value);
}

function nonEmpty(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

function applyRule(record: VerseRecord, rule: LookupRule): ExtractionResult | null {
  if (rule.kind === 'field') {
    const text = nonEmpty(record[rule.field]);
    return text ? { text, provenance: rule.provenance, source: rule.field } : null;
  }
  for (const author of rule.authors) {
    const entry = record[author];
    if (!isPlainObject(entry)) continue;
    const text = nonEmpty(entry[rule.field]);
    if (text) return { text, provenance: 'commentary_nested', source: `${author}.${rule.field}` };
  }
  return null;
}

const ABSENT: ExtractionResult = { text: null, provenance: 'none' };

export function extract(record: VerseRecord, textType: string): ExtractionResult {
  if (!isTextType(textType)) {
    logger.warn('Unsupported text type requested', { textType, verseId: record._id });
    return { ...ABSENT, unsupported: true };
  }
  for (const rule of EXTRACTION_CHAINS[textType]) {
    const hit = applyRule(record, rule);
    if (hit) return hit;
  }
  return { ...ABSENT };
}

/** Single-commentator lookup used by the per-verse endpoint: translation, then Hindi, then commentary. */
export function extractCommentary(record: VerseRecord, author: string): string | null {
  const entry = record[author];
  if (!isPlainObject(entry)) return null;
  return nonEmpty(entry.et) ?? nonEmpty(entry.ht) ?? nonEmpty(entry.sc);
}
