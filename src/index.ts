export * from './errors';
export * from './types';
export { resolveConfig, defaultStopwords, DEFAULTS, type ClassifierConfigInput } from './config';
export { tokenize, lemmatize, stem } from './tokenizer';
export { buildVocabulary, vocabularyFromTerms } from './vocabulary';
export { encode, assertCompatible, CountVectorizer } from './vectorizer';
export {
  fit,
  fromTotals,
  predict,
  predictBatch,
  likelihood,
  priorProbability,
  posteriors,
  topTerms,
  ClassTotals,
  UNTRAINED,
} from './naiveBayes';
export { trainModel, classifyOne, classifyBatch, explain, TextClassifier, type TrainedClassifier } from './classifier';
export { saveModel, loadModel, serializeModel, deserializeModel } from './persistence';
export { readDataset, readDatasets, writeJsonl, STATEMENT_COLUMNS } from './io';
export { trainTestSplit, shuffle } from './split';
export { evaluate, summarize, wilsonInterval, type EvaluationReport } from './evaluate';
export { runPipeline } from './run';
