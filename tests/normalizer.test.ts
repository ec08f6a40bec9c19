/**
 * Normalizer Tests
 */

import { describe, it, expect } from 'vitest';
import { identityKey, isIdentityEquivalent, normalize, wordSet } from '../src/reconciler/normalizer.js';

describe('normalize', () => {
  it('lowercases and replaces punctuation with single spaces', () => {
    expect(normalize("Harry Potter & the Philosopher's Stone")).toBe('harry potter the philosopher s stone');
    expect(normalize('  Dune:  Messiah ')).toBe('dune messiah');
  });

  it('treats tabs and newlines as separators', () => {
    expect(normalize('The\tFinal\nEmpire')).toBe('the final empire');
  });

  it('does not fold accented letters', () => {
    expect(normalize('Café Society')).toBe('caf society');
  });

  it('returns an empty string for empty, null or symbol-only input', () => {
    expect(normalize('')).toBe('');
    expect(normalize(null)).toBe('');
    expect(normalize(undefined)).toBe('');
    expect(normalize('!!! ---')).toBe('');
  });

  it('is idempotent', () => {
    const samples = [
      'Mistborn: The Final Empire',
      "Ender's Game",
      '  spaced   out  ',
      'UPPER lower 123',
      'Ünïcödé — dashes',
      '',
    ];
    for (const sample of samples) {
      const once = normalize(sample);
      expect(normalize(once)).toBe(once);
    }
  });
});

describe('identityKey', () => {
  it('joins normalized title and author with a pipe', () => {
    expect(identityKey('Dune', 'Frank Herbert')).toBe('dune|frank herbert');
  });

  it('is "|" when both sides are empty', () => {
    expect(identityKey('', '')).toBe('|');
    expect(identityKey(null, null)).toBe('|');
  });

  it('treats differently punctuated entries as the same identity', () => {
    expect(isIdentityEquivalent(
      { title: 'The Hobbit, or There and Back Again', author: 'J.R.R. Tolkien' },
      { title: 'the hobbit or there and back again', author: 'J R R Tolkien' },
    )).toBe(true);
    expect(isIdentityEquivalent(
      { title: 'Dune', author: 'Frank Herbert' },
      { title: 'Dune', author: 'Brian Herbert' },
    )).toBe(false);
  });
});

describe('wordSet', () => {
  it('splits the normalized text into words', () => {
    expect([...wordSet('The Way of Kings')]).toEqual(['the', 'way', 'of', 'kings']);
  });

  it('is empty for empty text', () => {
    expect(wordSet('').size).toBe(0);
  });
});
