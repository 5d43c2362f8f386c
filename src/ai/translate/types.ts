/**
 * Machine translation abstraction. Providers may fail or hand back the input
 * unchanged; callers treat both as "no translation happened" and continue.
 */

export interface ITranslationService {
  readonly name: string;
  /** Translate English text into `targetLanguage` (ISO 639-1, e.g. "hi", "gu"). */
  translate(text: string, targetLanguage: string): Promise<string>;
}
