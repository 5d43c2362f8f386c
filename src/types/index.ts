/**
 * Shared domain types for the verse narration service.
 * Keeps API, services, and providers aligned on the same shapes.
 */

/** Per-commentator keys found in the oldest verse exports. */
export const COMMENTARY_KEYS = [
  'tej',
  'siva',
  'prabhu',
  'rams',
  'sankar',
  'purohit',
  'san',
  'adi',
  'gambir',
] as const;

export type CommentaryKey = (typeof COMMENTARY_KEYS)[number];

/** Sub-fields of a commentary entry: English, Hindi, Sanskrit (romanized / Devanagari), Gujarati, commentary. */
export type CommentaryField = 'et' | 'ht' | 'st' | 'sd' | 'gt' | 'sc';

/**
 * One verse as received. Text may live under the current long-form names
 * (`sanskrit`, `english`, `hindi`, `gujarati`), the legacy short codes
 * (`slok`, `transliteration`, `sa`, `en`, `hi`, `gu`), or inside
 * per-commentator objects (`tej.et`, `siva.ht`, ...). Values are untrusted
 * until read through the field extractor.
 */
export type VerseRecord = Record<string, unknown>;

/** A verse that passed request validation. */
export interface ValidatedVerse {
  id: string;
  chapter: number | null;
  verse: number | null;
  record: VerseRecord;
}

export type TextType = 'sanskrit' | 'sanskrit_devanagari' | 'hindi' | 'gujarati' | 'english';

export const TEXT_TYPES: readonly TextType[] = [
  'sanskrit',
  'sanskrit_devanagari',
  'hindi',
  'gujarati',
  'english',
];

/** Which rule produced an extracted text. */
export type ExtractionProvenance = 'direct' | 'legacy_field' | 'commentary_nested' | 'translated' | 'none';

/** Orchestrator-level fallback tiers. */
export type FallbackProvenance = 'devanagari_fallback' | 'hindi_as_sanskrit' | 'english_with_disclaimer' | 'translated';

export type Provenance = ExtractionProvenance | FallbackProvenance;

export interface ExtractionResult {
  text: string | null;
  provenance: ExtractionProvenance;
  /** Field path that supplied the text, e.g. "hi" or "tej.ht". */
  source?: string;
  /** Set when the requested text type is not one of TEXT_TYPES. */
  unsupported?: boolean;
}

export type LanguageCode = 'en' | 'hi' | 'sa' | 'gu';

export const LANGUAGE_CODES: readonly LanguageCode[] = ['en', 'hi', 'sa', 'gu'];

export type VoiceGender = 'male' | 'female';

export interface BatchOptions {
  gender: VoiceGender;
  skipMissing: boolean;
  useFallbacks: boolean;
  maxVerses: number;
  includeTransliteration: boolean;
  speed: number;
  play: boolean;
}

export type BatchItemStatus = 'success' | 'skipped' | 'failed';

export type BatchFailureReason = 'missing_text' | 'unsupported_language' | 'timeout' | 'provider_error' | 'storage_error';

export interface BatchItemResult {
  verseId: string;
  chapter: number | null;
  verse: number | null;
  language: string;
  status: BatchItemStatus;
  text?: string;
  provenance: Provenance;
  fallbackUsed: boolean;
  voice?: string;
  audioFile?: string;
  reason?: BatchFailureReason;
  /** Provider or filesystem message for timeout, provider_error and storage_error. */
  detail?: string;
}

export interface VerseSummary {
  verseId: string;
  chapter: number | null;
  verse: number | null;
  attempted: number;
  succeeded: number;
}

export interface BatchSummary {
  totalVerses: number;
  processed: number;
  skipped: number;
  failed: number;
  fallbacksUsed: number;
  chapters: number[];
  verses: VerseSummary[];
  items: BatchItemResult[];
  warnings: string[];
}
