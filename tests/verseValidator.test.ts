import { describe, it, expect } from 'vitest';
import { detectAndNormalize } from '../src/services/verse/FormatDetector';
import { validateVerses } from '../src/services/verse/VerseValidator';
import { BatchValidationError } from '../src/services/verse/errors';

function errorOf(fn: () => unknown): BatchValidationError {
  try {
    fn();
  } catch (e) {
    if (e instanceof BatchValidationError) return e;
    throw e;
  }
  throw new Error('expected a BatchValidationError');
}

describe('validateVerses', () => {
  it('returns ids and coerced numbers', () => {
    const verses = validateVerses(detectAndNormalize([{ _id: ' BG2.47 ', chapter: '2', verse: 47, english: 'E' }]));
    expect(verses).toEqual([
      { id: 'BG2.47', chapter: 2, verse: 47, record: { _id: ' BG2.47 ', chapter: '2', verse: 47, english: 'E' } },
    ]);
  });

  it('accepts verses without chapter or verse numbers', () => {
    const [verse] = validateVerses(detectAndNormalize({ _id: 'intro' }));
    expect(verse.chapter).toBeNull();
    expect(verse.verse).toBeNull();
  });

  it('rejects a missing _id', () => {
    const error = errorOf(() => validateVerses(detectAndNormalize([{ _id: 'a' }, { _id: '' }])));
    expect(error.message).toBe('Invalid verse payload');
    expect(error.details).toEqual(['verses[1]: missing _id']);
  });

  it('reads numeric ids as strings', () => {
    const [verse] = validateVerses(detectAndNormalize([{ _id: 101, chapter: 1, verse: 1 }]));
    expect(verse.id).toBe('101');
  });

  it('rejects ids that are neither strings nor numbers', () => {
    const error = errorOf(() => validateVerses(detectAndNormalize([{ _id: { oid: 'x' } }])));
    expect(error.details).toEqual(['verses[0]: _id must be a string or a number']);
  });

  it('turns every rejected element into a detail', () => {
    const error = errorOf(() => validateVerses(detectAndNormalize([{ _id: 'a', english: 'A' }, 'junk', 42])));
    expect(error.message).toBe('Invalid verse payload');
    expect(error.details).toEqual(['payload[1]: verse must be an object', 'payload[2]: verse must be an object']);
  });

  it('rejects a chapters value that is not a list', () => {
    const error = errorOf(() => validateVerses(detectAndNormalize({ chapters: 'oops' })));
    expect(error.details).toEqual(['payload.chapters: must be an array of chapter groups']);
  });

  it('rejects duplicate ids', () => {
    const error = errorOf(() => validateVerses(detectAndNormalize([{ _id: 'a' }, { _id: 'a' }])));
    expect(error.details).toEqual(['verses[1]: duplicate _id a']);
  });

  it('rejects negative or fractional numbers', () => {
    const error = errorOf(() => validateVerses(detectAndNormalize([{ _id: 'a', chapter: -1, verse: 1.5 }])));
    expect(error.details).toEqual([
      'verses[0] (a): chapter must be a non-negative integer',
      'verses[0] (a): verse must be a non-negative integer',
    ]);
  });

  it('rejects unrecognized payloads', () => {
    const error = errorOf(() => validateVerses(detectAndNormalize(42)));
    expect(error.message).toBe('Unrecognized verse payload');
  });
});
