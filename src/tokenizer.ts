import { PorterStemmer } from 'natural';
import * as lemmatizer from 'wink-lemmatizer';
import type { NormalizationMode, Token, TokenizerConfig } from './types';

// everything except letters (any script, with their combining marks) and whitespace
const NON_WORD = /[^\p{L}\p{M}\s]+/gu;
const APOSTROPHES = /['’]/g;

// lowercase + strip; apostrophes vanish so "don't" stays one word
function clean(text: string): string {
  return text
    .toLowerCase()
    .replace(APOSTROPHES, '')
    .replace(NON_WORD, ' ');
}

function split(cleaned: string): string[] {
  return cleaned.split(/\s+/).filter(Boolean);
}

/**
 * Dictionary lemma of a word. Verb forms are tried first, then noun and
 * adjective; the first lemma that differs from the word wins.
 */
export function lemmatize(word: string): string {
  for (const lemmaOf of [lemmatizer.verb, lemmatizer.noun, lemmatizer.adjective]) {
    const lemma = lemmaOf(word);
    if (lemma && lemma !== word) return lemma;
  }
  return word;
}

export function stem(word: string): string {
  return PorterStemmer.stem(word);
}

export function reduce(word: string, mode: NormalizationMode): string {
  switch (mode) {
    case 'stem-only':
      return stem(word);
    case 'lemmatize-only':
      return lemmatize(word);
    case 'lemmatize-then-stem':
      return stem(lemmatize(word));
  }
}

const cleanedStopwords = new WeakMap<ReadonlySet<string>, Set<string>>();

// stopwords are compared after cleaning, so "don't" in the list matches "dont"
function stopwordsFor(set: ReadonlySet<string>): Set<string> {
  const cached = cleanedStopwords.get(set);
  if (cached) return cached;
  const cleaned = new Set<string>();
  for (const word of set) {
    for (const w of split(clean(word))) cleaned.add(w);
  }
  cleanedStopwords.set(set, cleaned);
  return cleaned;
}

/**
 * Raw text -> normalized tokens, in document order with repeats kept.
 *
 * Lowercase, strip punctuation and digits, split on whitespace, drop
 * stopwords, then lemmatize and/or stem per `normalizationMode`. Tokens
 * that reduce to the empty string are dropped.
 */
export function tokenize(rawText: string, config: TokenizerConfig): Token[] {
  if (!rawText) return [];
  const stopwords = stopwordsFor(config.stopwordSet);
  const tokens: Token[] = [];
  for (const word of split(clean(rawText))) {
    if (stopwords.has(word)) continue;
    const reduced = reduce(word, config.normalizationMode);
    if (reduced) tokens.push(reduced);
  }
  return tokens;
}
