import { DimensionMismatchError, UntrainedModelError } from './errors';
import { tokenize } from './tokenizer';
import { buildVocabulary } from './vocabulary';
import type { DocumentTermVector, Token, TokenizerConfig, Vocabulary } from './types';

/** Sparse term counts; OOV tokens are skipped. */
export function encode(tokens: readonly Token[], vocabulary: Vocabulary): DocumentTermVector {
  const counts = new Map<number, number>();
  tokens.forEach(tok => {
    const idx = vocabulary.index.get(tok);
    if (idx === undefined) return;
    counts.set(idx, (counts.get(idx) || 0) + 1);
  });
  return { dimension: vocabulary.terms.length, vocabularyId: vocabulary.id, counts };
}

export function assertCompatible(vector: DocumentTermVector, vocabulary: Vocabulary): void {
  const dim = vocabulary.terms.length;
  if (vector.dimension !== dim) {
    throw new DimensionMismatchError(`Vector has dimension ${vector.dimension}, vocabulary has ${dim} terms`);
  }
  if (vector.vocabularyId !== vocabulary.id) {
    throw new DimensionMismatchError('Vector was encoded against a different vocabulary');
  }
  for (const idx of vector.counts.keys()) {
    if (!Number.isInteger(idx) || idx < 0 || idx >= dim) {
      throw new DimensionMismatchError(`Vector index ${idx} is outside [0, ${dim})`);
    }
  }
}

/** Tokenizer + fixed vocabulary: fit once on the training texts, then vectorize anything. */
export class CountVectorizer {
  private vocab: Vocabulary | undefined;

  constructor(private readonly config: TokenizerConfig, vocabulary?: Vocabulary) {
    this.vocab = vocabulary;
  }

  get vocabulary(): Vocabulary | undefined {
    return this.vocab;
  }

  tokenize(text: string): Token[] {
    return tokenize(text, this.config);
  }

  /** Tokenizes every text, builds the vocabulary and returns the training vectors. */
  fit(texts: readonly string[], minDocFrequencyFraction?: number): DocumentTermVector[] {
    const docs = texts.map(t => this.tokenize(t));
    const vocab = buildVocabulary(docs, minDocFrequencyFraction);
    this.vocab = vocab;
    return docs.map(d => encode(d, vocab));
  }

  vectorize(text: string): DocumentTermVector {
    if (!this.vocab) throw new UntrainedModelError('Vectorizer has no vocabulary; call fit() first');
    return encode(this.tokenize(text), this.vocab);
  }

  // terms with the highest counts in a vector, for explanations
  topTokens(vector: DocumentTermVector, k = 6): string[] {
    const vocab = this.vocab;
    if (!vocab) return [];
    const pairs = [...vector.counts.entries()].sort((a, b) => b[1] - a[1] || a[0] - b[0]).slice(0, k);
    return pairs.map(([i]) => vocab.terms[i]).filter((t): t is string => t !== undefined);
  }
}
