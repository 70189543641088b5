import { resolveConfig, type ClassifierConfigInput } from './config';
import { DimensionMismatchError, UntrainedModelError } from './errors';
import { compareLabels, fit, predict, predictBatch, topTerms, UNTRAINED, validatePriorOverride } from './naiveBayes';
import { deserializeModel, serializeModel, type SavedModel } from './persistence';
import { tokenize } from './tokenizer';
import { encode } from './vectorizer';
import { buildVocabulary } from './vocabulary';
import type {
  ClassifierConfig,
  ClassLabel,
  Document,
  Model,
  ModelState,
  PredictionResult,
  TokenizerConfig,
} from './types';

export type TrainedClassifier = {
  model: Model;
  /** tokenizer settings the model was fit with; prediction must reuse them */
  tokenizer: TokenizerConfig;
};

export function documentText(document: Document): string {
  return document.join(' ');
}

/**
 * Tokenize the corpus, build the vocabulary from it, encode and fit.
 */
export function trainModel(
  corpus: readonly Document[],
  labels: readonly ClassLabel[],
  config: ClassifierConfig | ClassifierConfigInput = {}
): TrainedClassifier {
  const cfg = resolveConfig(config);
  if (corpus.length !== labels.length) {
    throw new DimensionMismatchError(`Got ${corpus.length} documents but ${labels.length} labels`);
  }
  if (!corpus.length) throw new DimensionMismatchError('Cannot fit on zero training documents');
  // checked before the corpus is tokenized
  if (cfg.priorOverride) validatePriorOverride(cfg.priorOverride, [...new Set(labels)].sort(compareLabels));

  const tokenizer: TokenizerConfig = { stopwordSet: cfg.stopwordSet, normalizationMode: cfg.normalizationMode };
  const sequences = corpus.map(doc => tokenize(documentText(doc), tokenizer));
  const vocabulary = buildVocabulary(sequences, cfg.minDocFrequencyFraction);
  const vectors = sequences.map(seq => encode(seq, vocabulary));
  const model = fit(vectors, labels, vocabulary, { alpha: cfg.laplaceAlpha, priorOverride: cfg.priorOverride });
  return { model, tokenizer };
}

export function classifyOne(trained: TrainedClassifier, document: Document): PredictionResult {
  const tokens = tokenize(documentText(document), trained.tokenizer);
  return predict(trained.model, encode(tokens, trained.model.vocabulary));
}

export function classifyBatch(trained: TrainedClassifier, documents: readonly Document[]): PredictionResult[] {
  const vectors = documents.map(doc => encode(tokenize(documentText(doc), trained.tokenizer), trained.model.vocabulary));
  return predictBatch(trained.model, vectors);
}

/** Short human-readable reason for a prediction. */
export function explain(trained: TrainedClassifier, document: Document, result: PredictionResult, k = 6): string {
  const tokens = new Set(tokenize(documentText(document), trained.tokenizer));
  const known = [...tokens].filter(t => trained.model.vocabulary.index.has(t));
  const reasons: string[] = [`Predicted ${result.label} (log score ${result.scoresByClass[result.label].toFixed(2)})`];
  if (!known.length) {
    reasons.push('No vocabulary terms; prior only');
  } else {
    const classTerms = new Set(topTerms(trained.model, result.label, 50).map(t => t.term));
    const strong = known.filter(t => classTerms.has(t)).slice(0, k);
    reasons.push(`Terms: ${known.slice(0, k).join(', ')}`);
    if (strong.length) reasons.push(`Typical of ${result.label}: ${strong.join(', ')}`);
  }
  return reasons.join(' | ');
}

/**
 * Stateful wrapper: Untrained until train() succeeds, then usable for
 * any number of predictions.
 */
export class TextClassifier {
  private state: ModelState = UNTRAINED;
  private tokenizer: TokenizerConfig;
  private readonly config: ClassifierConfig;

  constructor(config: ClassifierConfigInput = {}) {
    this.config = resolveConfig(config);
    this.tokenizer = { stopwordSet: this.config.stopwordSet, normalizationMode: this.config.normalizationMode };
  }

  get isTrained(): boolean {
    return this.state.status === 'trained';
  }

  /** The trained model; throws UntrainedModelError before train(). */
  get model(): Model {
    if (this.state.status !== 'trained') throw new UntrainedModelError();
    return this.state;
  }

  train(corpus: readonly Document[], labels: readonly ClassLabel[]): Model {
    const trained = trainModel(corpus, labels, this.config);
    this.state = trained.model;
    this.tokenizer = trained.tokenizer;
    return trained.model;
  }

  predict(document: Document): PredictionResult {
    return classifyOne({ model: this.model, tokenizer: this.tokenizer }, document);
  }

  predictBatch(documents: readonly Document[]): PredictionResult[] {
    return classifyBatch({ model: this.model, tokenizer: this.tokenizer }, documents);
  }

  toJSON(): SavedModel {
    return serializeModel(this.model, this.tokenizer);
  }

  static fromJSON(raw: unknown): TextClassifier {
    const { model, tokenizer } = deserializeModel(raw);
    const classifier = new TextClassifier({
      normalizationMode: tokenizer.normalizationMode,
      stopwordSet: tokenizer.stopwordSet,
      laplaceAlpha: model.alpha,
    });
    classifier.state = model;
    classifier.tokenizer = tokenizer;
    return classifier;
  }
}
