/**
 * Batch Orchestrator: narrates every (verse, language) pair of a request.
 *
 * Items are handled strictly in input order, one provider call at a time.
 * Text is resolved through the field extractor, optionally replaced by one
 * fallback tier, then synthesized and stored. Problems with a single item
 * (missing text, unsupported language, provider failure) are recorded on that
 * item and never stop the batch; only request validation is fatal.
 */

import { logger } from '../../config/logger';
import { isProviderError } from '../../ai/errors';
import type { ITTSService } from '../../ai/tts';
import type { ITranslationService } from '../../ai/translate';
import { buildNarration } from '../narration-text';
import type { AudioStorageService } from '../audio-storage.service';
import { playInBackground, type IAudioPlayer } from '../playback.service';
import {
  LANGUAGE_CODES,
  type BatchItemResult,
  type BatchOptions,
  type BatchSummary,
  type LanguageCode,
  type Provenance,
  type TextType,
  type ValidatedVerse,
  type VerseSummary,
} from '../../types';
import { BatchValidationError } from './errors';
import { extract } from './FieldExtractor';
import { getRecommendedVoice } from './voices';

export const SANSKRIT_MAX_SPEED = 0.75;
export const SANSKRIT_DISCLAIMER = 'Sanskrit text unavailable. English translation: ';

export interface BatchOrchestratorDeps {
  tts: ITTSService;
  translator: ITranslationService;
  storage: AudioStorageService;
  player?: IAudioPlayer;
  defaults: { maxVerses: number; speed: number };
}

interface ResolvedText {
  text: string;
  provenance: Provenance;
  fallbackUsed: boolean;
}

export function isLanguageCode(value: string): value is LanguageCode {
  return (LANGUAGE_CODES as readonly string[]).includes(value);
}

export function primaryTextType(language: LanguageCode, includeTransliteration: boolean): TextType {
  switch (language) {
    case 'en':
      return 'english';
    case 'hi':
      return 'hindi';
    case 'gu':
      return 'gujarati';
    case 'sa':
      return includeTransliteration ? 'sanskrit' : 'sanskrit_devanagari';
  }
}

export class BatchOrchestrator {
  constructor(private readonly deps: BatchOrchestratorDeps) {}

  /** A request may lower the configured verse limit, never raise it. */
  resolveOptions(options: Partial<BatchOptions> = {}): BatchOptions {
    const { defaults } = this.deps;
    return {
      gender: options.gender ?? 'male',
      skipMissing: options.skipMissing ?? true,
      useFallbacks: options.useFallbacks ?? true,
      maxVerses: Math.min(options.maxVerses ?? defaults.maxVerses, defaults.maxVerses),
      includeTransliteration: options.includeTransliteration ?? true,
      speed: options.speed ?? defaults.speed,
      play: options.play ?? false,
    };
  }

  async process(
    verses: ValidatedVerse[],
    languages: string[],
    options: Partial<BatchOptions> = {}
  ): Promise<BatchSummary> {
    const opts = this.resolveOptions(options);
    if (verses.length > opts.maxVerses) {
      throw new BatchValidationError(`Too many verses: ${verses.length} exceeds the limit of ${opts.maxVerses}`);
    }

    logger.info('Batch started', {
      verses: verses.length,
      languages,
      gender: opts.gender,
      useFallbacks: opts.useFallbacks,
      skipMissing: opts.skipMissing,
    });

    const items: BatchItemResult[] = [];
    const verseSummaries: VerseSummary[] = [];
    const warnings: string[] = [];
    let processed = 0;
    let skipped = 0;
    let failed = 0;

    for (const verse of verses) {
      const verseItems: BatchItemResult[] = [];
      for (const language of languages) {
        verseItems.push(await this.processItem(verse, language, opts, warnings));
      }
      items.push(...verseItems);

      const succeeded = verseItems.filter((i) => i.status === 'success').length;
      verseSummaries.push({
        verseId: verse.id,
        chapter: verse.chapter,
        verse: verse.verse,
        attempted: languages.length,
        succeeded,
      });

      if (succeeded > 0) processed++;
      else if (verseItems.every((i) => i.status === 'skipped')) skipped++;
      else failed++;
    }

    const chapters = [...new Set(verses.map((v) => v.chapter).filter((c): c is number => c !== null))].sort(
      (a, b) => a - b
    );

    const summary: BatchSummary = {
      totalVerses: verses.length,
      processed,
      skipped,
      failed,
      fallbacksUsed: items.filter((i) => i.fallbackUsed).length,
      chapters,
      verses: verseSummaries,
      items,
      warnings,
    };

    logger.info('Batch finished', {
      processed,
      skipped,
      failed,
      fallbacksUsed: summary.fallbacksUsed,
      chapters: chapters.length,
    });
    return summary;
  }

  private async processItem(
    verse: ValidatedVerse,
    language: string,
    opts: BatchOptions,
    warnings: string[]
  ): Promise<BatchItemResult> {
    const base = { verseId: verse.id, chapter: verse.chapter, verse: verse.verse, language };

    if (!isLanguageCode(language)) {
      const message = `Unsupported language "${language}" skipped for verse ${verse.id}`;
      logger.warn(message);
      warnings.push(message);
      return { ...base, status: 'skipped', provenance: 'none', fallbackUsed: false, reason: 'unsupported_language' };
    }

    const resolved = await this.resolveText(verse, language, opts, warnings);
    if (!resolved) {
      logger.warn('No text found', { verseId: verse.id, language, skipMissing: opts.skipMissing });
      return {
        ...base,
        status: opts.skipMissing ? 'skipped' : 'failed',
        provenance: 'none',
        fallbackUsed: false,
        reason: 'missing_text',
      };
    }

    const voice = getRecommendedVoice(language, opts.gender, this.deps.tts.name);
    const speed = language === 'sa' ? Math.min(opts.speed, SANSKRIT_MAX_SPEED) : opts.speed;
    const narrationLanguage = resolved.provenance === 'english_with_disclaimer' ? 'en' : language;
    const narration = buildNarration(resolved.text, verse.chapter, verse.verse, narrationLanguage);
    const item = { ...base, text: resolved.text, provenance: resolved.provenance, fallbackUsed: resolved.fallbackUsed, voice };

    let audio: Buffer;
    try {
      audio = await this.deps.tts.synthesize(narration, { voice, speed });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      const reason = isProviderError(error) && error.kind === 'timeout' ? 'timeout' : 'provider_error';
      logger.error('Synthesis failed', { verseId: verse.id, language, reason, detail });
      return { ...item, status: 'failed', reason, detail };
    }

    try {
      const stored = await this.deps.storage.save(audio, voice);
      if (opts.play && this.deps.player) playInBackground(this.deps.player, stored.path);
      return { ...item, status: 'success', audioFile: stored.filename };
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      logger.error('Could not store audio', { verseId: verse.id, language, detail });
      return { ...item, status: 'failed', reason: 'storage_error', detail };
    }
  }

  private async resolveText(
    verse: ValidatedVerse,
    language: LanguageCode,
    opts: BatchOptions,
    warnings: string[]
  ): Promise<ResolvedText | null> {
    const primaryType = primaryTextType(language, opts.includeTransliteration);
    const primary = extract(verse.record, primaryType);
    if (primary.text) return { text: primary.text, provenance: primary.provenance, fallbackUsed: false };
    if (!opts.useFallbacks) return null;

    const fallback = await this.applyFallback(verse, language, primaryType, warnings);
    if (fallback) {
      logger.info('Fallback used', { verseId: verse.id, language, provenance: fallback.provenance });
      return { ...fallback, fallbackUsed: true };
    }
    return null;
  }

  /** First tier that yields text wins; at most one tier is applied. */
  private async applyFallback(
    verse: ValidatedVerse,
    language: LanguageCode,
    primaryType: TextType,
    warnings: string[]
  ): Promise<{ text: string; provenance: Provenance } | null> {
    const record = verse.record;

    if (language === 'sa') {
      if (primaryType === 'sanskrit') {
        const devanagari = extract(record, 'sanskrit_devanagari').text;
        if (devanagari) return { text: devanagari, provenance: 'devanagari_fallback' };
      }
      const hindi = extract(record, 'hindi').text;
      if (hindi) return { text: hindi, provenance: 'hindi_as_sanskrit' };
      const english = extract(record, 'english').text;
      if (english) return { text: `${SANSKRIT_DISCLAIMER}${english}`, provenance: 'english_with_disclaimer' };
      return null;
    }

    if (language === 'hi' || language === 'gu') {
      const english = extract(record, 'english').text;
      if (!english) return null;
      return { text: await this.translate(verse.id, english, language, warnings), provenance: 'translated' };
    }

    return null;
  }

  /** Never throws: a failed or no-op translation leaves the English text in place. */
  private async translate(verseId: string, text: string, language: LanguageCode, warnings: string[]): Promise<string> {
    try {
      const translated = await this.deps.translator.translate(text, language);
      if (translated.trim() && translated !== text) return translated.trim();
      const message = `Translation to ${language} returned the original text for verse ${verseId}`;
      logger.warn(message, { translator: this.deps.translator.name });
      warnings.push(message);
      return text;
    } catch (error) {
      const kind = isProviderError(error) ? error.kind : 'error';
      const message = `Translation to ${language} failed (${kind}) for verse ${verseId}; using English text`;
      logger.warn(message, { detail: error instanceof Error ? error.message : String(error) });
      warnings.push(message);
      return text;
    }
  }
}
