import { describe, it, expect } from 'vitest';
import { extract, extractCommentary } from '../src/services/verse/FieldExtractor';

describe('extract', () => {
  it('prefers the current field over the legacy one', () => {
    expect(extract({ english: 'Current', en: 'Legacy' }, 'english')).toEqual({
      text: 'Current',
      provenance: 'direct',
      source: 'english',
    });
    expect(extract({ hindi: 'नया', hi: 'पुराना' }, 'hindi').text).toBe('नया');
  });

  it('falls back to the legacy short code', () => {
    expect(extract({ gu: 'ગુજરાતી' }, 'gujarati')).toEqual({
      text: 'ગુજરાતી',
      provenance: 'legacy_field',
      source: 'gu',
    });
  });

  it('skips blank and non-string values and trims the winner', () => {
    expect(extract({ english: '   ', en: ' Legacy ' }, 'english').text).toBe('Legacy');
    expect(extract({ english: 42, en: 'x' }, 'english').source).toBe('en');
  });

  it('walks nested commentators in the documented order', () => {
    expect(extract({ siva: { et: 'Siva' }, prabhu: { et: 'Prabhu' } }, 'english')).toEqual({
      text: 'Prabhu',
      provenance: 'commentary_nested',
      source: 'prabhu.et',
    });
    expect(extract({ prabhu: { ht: 'P' }, rams: { ht: 'R' } }, 'hindi').source).toBe('rams.ht');
    expect(extract({ tej: { et: 'T' }, gambir: { et: 'G' } }, 'english').source).toBe('gambir.et');
  });

  it('resolves romanized and Devanagari Sanskrit separately', () => {
    const record = { transliteration: 'dharma-kshetre', slok: 'धर्मक्षेत्रे' };
    expect(extract(record, 'sanskrit').text).toBe('dharma-kshetre');
    expect(extract(record, 'sanskrit_devanagari').text).toBe('धर्मक्षेत्रे');
  });

  it('uses the sa field and nested st for romanized Sanskrit', () => {
    expect(extract({ sa: 'yoga' }, 'sanskrit').source).toBe('sa');
    expect(extract({ sankar: { st: 'st-text' } }, 'sanskrit').source).toBe('sankar.st');
    expect(extract({ sankar: { st: 'st-text' } }, 'sanskrit_devanagari').text).toBeNull();
  });

  it('ignores commentators outside a chain', () => {
    expect(extract({ sankar: { gt: 'S' } }, 'gujarati')).toEqual({ text: null, provenance: 'none' });
  });

  it('returns absent when no sanskrit-bearing field exists', () => {
    expect(extract({ english: 'E', hindi: 'H' }, 'sanskrit')).toEqual({ text: null, provenance: 'none' });
  });

  it('reports unsupported text types instead of reading English', () => {
    expect(extract({ english: 'E' }, 'french')).toEqual({ text: null, provenance: 'none', unsupported: true });
  });
});

describe('extractCommentary', () => {
  it('reads translation, then Hindi, then commentary', () => {
    expect(extractCommentary({ purohit: { et: 'E', ht: 'H' } }, 'purohit')).toBe('E');
    expect(extractCommentary({ purohit: { et: '', ht: 'H', sc: 'C' } }, 'purohit')).toBe('H');
    expect(extractCommentary({ purohit: { sc: 'C' } }, 'purohit')).toBe('C');
  });

  it('returns null for a missing author', () => {
    expect(extractCommentary({ purohit: { et: 'E' } }, 'tej')).toBeNull();
  });
});
