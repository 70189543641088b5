import { test, expect } from '@playwright/test';
import { DimensionMismatchError, UntrainedModelError } from '../src/errors';
import { assertCompatible, CountVectorizer, encode } from '../src/vectorizer';
import { vocabularyFromTerms } from '../src/vocabulary';
import type { DocumentTermVector } from '../src/types';

const vocab = vocabularyFromTerms(['bird', 'cat', 'dog', 'fish']);

test.describe('encode', () => {
  test('counts in-vocabulary tokens and skips OOV ones', () => {
    const v = encode(['cat', 'dog', 'cat', 'zebra'], vocab);
    expect(v.dimension).toBe(4);
    expect(v.vocabularyId).toBe(vocab.id);
    expect(v.counts.get(1)).toBe(2);
    expect(v.counts.get(2)).toBe(1);
    expect(v.counts.size).toBe(2);
  });

  test('an all-OOV document is an empty vector of full dimension', () => {
    const v = encode(['zebra', 'lion'], vocab);
    expect(v.dimension).toBe(4);
    expect(v.counts.size).toBe(0);
  });
});

test.describe('assertCompatible', () => {
  test('accepts a vector encoded against the same vocabulary', () => {
    expect(() => assertCompatible(encode(['cat'], vocab), vocab)).not.toThrow();
  });

  test('rejects a vector from another vocabulary of the same size', () => {
    const other = vocabularyFromTerms(['ant', 'bee', 'cow', 'dog']);
    expect(() => assertCompatible(encode(['dog'], other), vocab)).toThrow(DimensionMismatchError);
  });

  test('rejects a vector of another dimension', () => {
    const small = vocabularyFromTerms(['cat']);
    expect(() => assertCompatible(encode(['cat'], small), vocab)).toThrow(DimensionMismatchError);
  });

  test('rejects an out-of-range index', () => {
    const forged: DocumentTermVector = { dimension: 4, vocabularyId: vocab.id, counts: new Map([[7, 1]]) };
    expect(() => assertCompatible(forged, vocab)).toThrow(DimensionMismatchError);
  });
});

test.describe('CountVectorizer', () => {
  const config = { stopwordSet: new Set(['the']), normalizationMode: 'stem-only' as const };

  test('fits a vocabulary and vectorizes new text against it', () => {
    const vectorizer = new CountVectorizer(config);
    const vectors = vectorizer.fit(['the cat', 'the dog dog'], 0);
    expect(vectorizer.vocabulary?.terms).toEqual(['cat', 'dog']);
    expect(vectors.map(v => [...v.counts])).toEqual([[[0, 1]], [[1, 2]]]);

    const v = vectorizer.vectorize('dog bird dog cat');
    expect(vectorizer.topTokens(v, 2)).toEqual(['dog', 'cat']);
  });

  test('vectorize before fit throws UntrainedModelError', () => {
    expect(() => new CountVectorizer(config).vectorize('cat')).toThrow(UntrainedModelError);
  });
});
