/**
 * Voice lookup per provider, language and gender. The first name of each
 * list is the one used for batch narration.
 */
import type { TTSProviderName } from '../../config';
import type { VoiceGender } from '../../types';

type VoiceTable = Record<string, Record<VoiceGender, readonly string[]>>;

const HINDI_VOICES = {
  male: ['amitabh', 'sanjay', 'ranbir', 'varun', 'sunil'],
  female: ['madhuri', 'kareena', 'rashmi', 'janhvi', 'shreya'],
} as const;

export const NARAKEET_VOICES: VoiceTable = {
  en: {
    male: ['ravi', 'dev', 'rajesh', 'manish', 'himesh'],
    female: ['anushka', 'deepika', 'neerja', 'pooja', 'vidya'],
  },
  hi: HINDI_VOICES,
  // Sanskrit and Gujarati are read by the Hindi voices.
  sa: {
    male: HINDI_VOICES.male.slice(0, 3),
    female: HINDI_VOICES.female.slice(0, 3),
  },
  gu: HINDI_VOICES,
};

const OPENAI_DEFAULT = { male: ['onyx', 'echo'], female: ['nova', 'shimmer'] } as const;

export const OPENAI_VOICE_TABLE: VoiceTable = {
  en: OPENAI_DEFAULT,
  hi: OPENAI_DEFAULT,
  sa: OPENAI_DEFAULT,
  gu: OPENAI_DEFAULT,
};

export function voicesFor(provider: TTSProviderName, language: string, gender: VoiceGender): readonly string[] {
  const table = provider === 'openai' ? OPENAI_VOICE_TABLE : NARAKEET_VOICES;
  return (table[language] ?? table.en)[gender];
}

export function getRecommendedVoice(
  language: string,
  gender: VoiceGender,
  provider: TTSProviderName = 'narakeet'
): string {
  return voicesFor(provider, language, gender)[0];
}
