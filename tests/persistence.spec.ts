import fs from 'fs';
import { test, expect } from '@playwright/test';
import { ModelFormatError } from '../src/errors';
import { fit, predict } from '../src/naiveBayes';
import { deserializeModel, loadModel, saveModel, serializeModel } from '../src/persistence';
import { encode } from '../src/vectorizer';
import { vocabularyFromTerms } from '../src/vocabulary';
import type { TokenizerConfig } from '../src/types';

const vocab = vocabularyFromTerms(['bird', 'cat', 'dog', 'fish']);
const tokenizer: TokenizerConfig = { stopwordSet: new Set(['the', 'a']), normalizationMode: 'stem-only' };

test('saved model reloads with identical predictions', async ({}, testInfo) => {
  const model = fit(
    [encode(['cat', 'dog', 'cat'], vocab), encode(['fish', 'fish', 'bird'], vocab)],
    ['A', 'B'],
    vocab,
    { alpha: 0 }
  );
  const file = testInfo.outputPath('model.json');
  await saveModel(file, model, tokenizer);
  const loaded = await loadModel(file);

  expect(loaded.model.vocabulary.terms).toEqual(vocab.terms);
  expect(loaded.model.vocabulary.id).toBe(vocab.id);
  expect(loaded.model.logLikelihoods.get('A')?.[vocab.index.get('fish') ?? -1]).toBe(-Infinity);
  expect(loaded.tokenizer.normalizationMode).toBe('stem-only');
  expect([...loaded.tokenizer.stopwordSet].sort()).toEqual(['a', 'the']);

  const doc = encode(['cat', 'bird'], vocab);
  expect(predict(loaded.model, doc)).toEqual(predict(model, doc));
});

test('unseen terms under alpha = 0 are written as null', () => {
  const model = fit([encode(['cat'], vocab), encode(['dog'], vocab)], ['A', 'B'], vocab, { alpha: 0 });
  const saved = serializeModel(model, tokenizer);
  expect(saved.classes).toEqual(['A', 'B']);
  expect(saved.logLikelihoods[0]).toEqual([null, 0, null, null]);
});

test('any label string survives a save and reload', () => {
  const model = fit([encode(['cat'], vocab), encode(['dog'], vocab)], ['__proto__', 'constructor'], vocab, { alpha: 1 });
  const loaded = deserializeModel(JSON.parse(JSON.stringify(serializeModel(model, tokenizer))));

  expect(loaded.model.classes).toEqual(['__proto__', 'constructor']);
  expect(loaded.model.classDocumentCounts.get('__proto__')).toBe(1);
  const doc = encode(['cat'], vocab);
  expect(predict(loaded.model, doc).label).toBe('__proto__');
  expect(predict(loaded.model, doc).scoresByClass).toEqual(predict(model, doc).scoresByClass);
});

test('rejects malformed model files', async ({}, testInfo) => {
  const model = fit([encode(['cat'], vocab)], ['A'], vocab, { alpha: 1 });
  const saved = serializeModel(model, tokenizer);

  expect(() => deserializeModel({ ...saved, modelVersion: 99 })).toThrow(ModelFormatError);
  expect(() => deserializeModel({ ...saved, logLikelihoods: [[0, 0]] })).toThrow(ModelFormatError);
  expect(() => deserializeModel({ ...saved, logPriors: [] })).toThrow(ModelFormatError);
  expect(() => deserializeModel({ ...saved, classes: ['A', 'A'], logPriors: [0, 0] })).toThrow(ModelFormatError);
  expect(() => deserializeModel({ ...saved, vocabulary: ['cat', 'cat', 'dog', 'fish'] })).toThrow(ModelFormatError);

  const file = testInfo.outputPath('broken.json');
  await fs.promises.mkdir(testInfo.outputDir, { recursive: true });
  await fs.promises.writeFile(file, '{ not json', 'utf-8');
  await expect(loadModel(file)).rejects.toThrow(ModelFormatError);
});
