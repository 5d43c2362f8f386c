/**
 * Text clean-up applied right before synthesis, plus the spoken
 * "Chapter N, Verse M" intro in the narration language.
 */

const DEVANAGARI_LANGUAGES = new Set(['hi', 'sa']);

export function formatForNarration(text: string, language: string): string {
  let out = text.trim().replace(/\s+/g, ' ');
  if (!out) return '';

  if (DEVANAGARI_LANGUAGES.has(language) || language === 'gu') {
    out = out.replace(/।\s*/g, '। ').replace(/॥\s*/g, '॥ ');
  } else {
    out = out.replace(/([.!?,;:])\s*/g, '$1 ');
  }
  return out.trim();
}

export function verseIntro(chapter: number | null, verse: number | null, language: string): string {
  if (chapter === null || verse === null) return '';
  if (DEVANAGARI_LANGUAGES.has(language)) return `अध्याय ${chapter}, श्लोक ${verse}`;
  if (language === 'gu') return `અધ્યાય ${chapter}, શ્લોક ${verse}`;
  return `Chapter ${chapter}, Verse ${verse}`;
}

/** Intro and verse text joined the way they are spoken. */
export function buildNarration(text: string, chapter: number | null, verse: number | null, language: string): string {
  const intro = verseIntro(chapter, verse, language);
  return formatForNarration(intro ? `${intro}. ${text}` : text, language);
}
