import { createHash } from 'crypto';
import { EmptyVocabularyError, InvalidConfigError } from './errors';
import type { Token, Vocabulary } from './types';

function fingerprint(terms: readonly string[]): string {
  const hash = createHash('sha1');
  terms.forEach((t) => hash.update(t).update('\n'));
  return hash.digest('hex');
}

/** Index an already ordered, distinct term list. Used when loading a saved model too. */
export function vocabularyFromTerms(terms: readonly string[]): Vocabulary {
  const index = new Map<string, number>();
  terms.forEach((t, i) => index.set(t, i));
  return { terms: [...terms], index, id: fingerprint(terms) };
}

/** Number of documents each term occurs in at least once. */
export function documentFrequencies(sequences: Iterable<readonly Token[]>): { df: Map<string, number>; documents: number } {
  const df = new Map<string, number>();
  let documents = 0;
  for (const seq of sequences) {
    documents++;
    for (const tok of new Set(seq)) df.set(tok, (df.get(tok) || 0) + 1);
  }
  return { df, documents };
}

/**
 * Fixed vocabulary from training token sequences.
 *
 * A term survives when it appears in at least `minDocFrequencyFraction` of
 * the documents. Survivors are indexed in lexicographic (code-unit) order.
 */
export function buildVocabulary(
  sequences: Iterable<readonly Token[]>,
  minDocFrequencyFraction = 0.01
): Vocabulary {
  if (!Number.isFinite(minDocFrequencyFraction) || minDocFrequencyFraction < 0 || minDocFrequencyFraction > 1) {
    throw new InvalidConfigError(`minDocFrequencyFraction must be in [0, 1], got ${minDocFrequencyFraction}`);
  }
  const { df, documents } = documentFrequencies(sequences);
  if (!documents) throw new EmptyVocabularyError('Cannot build a vocabulary from an empty corpus');

  const kept: string[] = [];
  for (const [term, count] of df) {
    if (count / documents >= minDocFrequencyFraction) kept.push(term);
  }
  if (!kept.length) {
    throw new EmptyVocabularyError(
      `No term reaches a document frequency of ${minDocFrequencyFraction} across ${documents} documents`
    );
  }
  kept.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  return vocabularyFromTerms(kept);
}
