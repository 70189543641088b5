import { DimensionMismatchError, InvalidConfigError, UntrainedModelError } from './errors';
import { assertCompatible } from './vectorizer';
import type {
  ClassLabel,
  DocumentTermVector,
  FitOptions,
  Model,
  ModelState,
  PredictionResult,
  UntrainedModel,
  Vocabulary,
} from './types';

const PRIOR_TOLERANCE = 1e-9;

export const UNTRAINED: UntrainedModel = Object.freeze({ status: 'untrained' });

export function compareLabels(a: ClassLabel, b: ClassLabel): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Per-class term totals T_ct and document counts.
 *
 * Shards of a corpus can be accumulated independently and combined with
 * merge(); addition is associative and commutative so the result does not
 * depend on how the corpus was split.
 */
export class ClassTotals {
  private readonly terms = new Map<ClassLabel, Map<number, number>>();
  private readonly docs = new Map<ClassLabel, number>();

  constructor(readonly dimension: number) {}

  add(vector: DocumentTermVector, label: ClassLabel): this {
    if (vector.dimension !== this.dimension) {
      throw new DimensionMismatchError(`Vector has dimension ${vector.dimension}, expected ${this.dimension}`);
    }
    this.docs.set(label, (this.docs.get(label) || 0) + 1);
    const row = this.row(label);
    vector.counts.forEach((count, idx) => row.set(idx, (row.get(idx) || 0) + count));
    return this;
  }

  merge(other: ClassTotals): this {
    if (other.dimension !== this.dimension) {
      throw new DimensionMismatchError(`Cannot merge totals of dimension ${other.dimension} into ${this.dimension}`);
    }
    other.docs.forEach((n, label) => this.docs.set(label, (this.docs.get(label) || 0) + n));
    other.terms.forEach((counts, label) => {
      const row = this.row(label);
      counts.forEach((count, idx) => row.set(idx, (row.get(idx) || 0) + count));
    });
    return this;
  }

  labels(): ClassLabel[] {
    return [...this.docs.keys()].sort(compareLabels);
  }

  documentCount(label: ClassLabel): number {
    return this.docs.get(label) || 0;
  }

  termCount(label: ClassLabel, idx: number): number {
    return this.terms.get(label)?.get(idx) || 0;
  }

  termCounts(label: ClassLabel): ReadonlyMap<number, number> {
    return this.terms.get(label) ?? new Map<number, number>();
  }

  termTotal(label: ClassLabel): number {
    let total = 0;
    this.termCounts(label).forEach((c) => (total += c));
    return total;
  }

  private row(label: ClassLabel): Map<number, number> {
    let row = this.terms.get(label);
    if (!row) {
      row = new Map<number, number>();
      this.terms.set(label, row);
    }
    return row;
  }
}

function validateAlpha(alpha: number) {
  if (!Number.isFinite(alpha) || alpha < 0) {
    throw new InvalidConfigError(`Smoothing constant alpha must be a finite number >= 0, got ${alpha}`);
  }
}

function hasOwn(record: object, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}

/** An override must name exactly `classes`, each in [0, 1], summing to 1. */
export function validatePriorOverride(prior: Readonly<Record<ClassLabel, number>>, classes: readonly ClassLabel[]) {
  const keys = Object.keys(prior).sort(compareLabels);
  const missing = classes.filter((c) => !hasOwn(prior, c));
  const extra = keys.filter((k) => !classes.includes(k));
  if (missing.length || extra.length) {
    const parts: string[] = [];
    if (missing.length) parts.push(`missing ${missing.join(', ')}`);
    if (extra.length) parts.push(`unknown ${extra.join(', ')}`);
    throw new InvalidConfigError(`Prior override must cover exactly the training classes (${parts.join('; ')})`);
  }
  let sum = 0;
  for (const c of classes) {
    const p = hasOwn(prior, c) ? prior[c] : undefined;
    if (p === undefined || !Number.isFinite(p) || p < 0 || p > 1) {
      throw new InvalidConfigError(`Prior for class ${c} must be in [0, 1], got ${p}`);
    }
    sum += p;
  }
  if (Math.abs(sum - 1) > PRIOR_TOLERANCE) {
    throw new InvalidConfigError(`Prior override must sum to 1, got ${sum}`);
  }
}

/**
 * Smoothed log-likelihood row: log((T_ct + alpha) / (Σ T_c + alpha·|V|)).
 * With alpha = 0, unseen terms get -Infinity; a class with no term mass at
 * all gets -Infinity everywhere.
 */
function likelihoodRow(totals: ClassTotals, label: ClassLabel, alpha: number): Float64Array {
  const dim = totals.dimension;
  const row = new Float64Array(dim);
  const denom = totals.termTotal(label) + alpha * dim;
  if (denom === 0) return row.fill(-Infinity);
  row.fill(Math.log(alpha / denom));
  totals.termCounts(label).forEach((count, idx) => {
    row[idx] = Math.log((count + alpha) / denom);
  });
  return row;
}

/** Build a Model from accumulated totals. */
export function fromTotals(totals: ClassTotals, vocabulary: Vocabulary, options: FitOptions): Model {
  validateAlpha(options.alpha);
  if (totals.dimension !== vocabulary.terms.length) {
    throw new DimensionMismatchError(`Totals have dimension ${totals.dimension}, vocabulary has ${vocabulary.terms.length} terms`);
  }
  const classes = totals.labels();
  if (!classes.length) throw new DimensionMismatchError('Cannot fit on zero training documents');
  if (options.priorOverride) validatePriorOverride(options.priorOverride, classes);

  const documents = classes.reduce((n, c) => n + totals.documentCount(c), 0);
  const logPriors = new Map<ClassLabel, number>();
  const logLikelihoods = new Map<ClassLabel, Float64Array>();
  const classDocumentCounts = new Map<ClassLabel, number>();
  const classTermTotals = new Map<ClassLabel, number>();

  for (const c of classes) {
    const prior = options.priorOverride && hasOwn(options.priorOverride, c)
      ? options.priorOverride[c]
      : totals.documentCount(c) / documents;
    logPriors.set(c, Math.log(prior));
    logLikelihoods.set(c, likelihoodRow(totals, c, options.alpha));
    classDocumentCounts.set(c, totals.documentCount(c));
    classTermTotals.set(c, totals.termTotal(c));
  }

  return {
    status: 'trained',
    classes,
    vocabulary,
    alpha: options.alpha,
    logPriors,
    logLikelihoods,
    classDocumentCounts,
    classTermTotals,
  };
}

/**
 * Train a multinomial Naive Bayes model on encoded documents.
 *
 * Everything is validated before totals are accumulated, so a failure
 * leaves nothing half-built.
 */
export function fit(
  vectors: readonly DocumentTermVector[],
  labels: readonly ClassLabel[],
  vocabulary: Vocabulary,
  options: FitOptions = { alpha: 1 }
): Model {
  if (vectors.length !== labels.length) {
    throw new DimensionMismatchError(`Got ${vectors.length} vectors but ${labels.length} labels`);
  }
  if (!vectors.length) throw new DimensionMismatchError('Cannot fit on zero training documents');
  validateAlpha(options.alpha);
  vectors.forEach((v) => assertCompatible(v, vocabulary));
  if (options.priorOverride) {
    validatePriorOverride(options.priorOverride, [...new Set(labels)].sort(compareLabels));
  }

  const totals = new ClassTotals(vocabulary.terms.length);
  vectors.forEach((v, i) => totals.add(v, labels[i]));
  return fromTotals(totals, vocabulary, options);
}

function requireTrained(model: ModelState): Model {
  if (model.status !== 'trained') throw new UntrainedModelError();
  return model;
}

function logPrior(model: Model, label: ClassLabel): number {
  const lp = model.logPriors.get(label);
  if (lp === undefined) throw new InvalidConfigError(`Unknown class ${label}`);
  return lp;
}

function logLikelihoodRow(model: Model, label: ClassLabel): Readonly<Float64Array> {
  const row = model.logLikelihoods.get(label);
  if (!row) throw new InvalidConfigError(`Unknown class ${label}`);
  return row;
}

/**
 * Score a vector against every class and pick the arg-max.
 *
 * score(c) = log P(c) + Σ count(t) · log P(t|c) over the non-zero terms.
 * Ties go to the smallest label. A zero vector scores the priors alone.
 */
export function predict(model: ModelState, vector: DocumentTermVector): PredictionResult {
  const trained = requireTrained(model);
  assertCompatible(vector, trained.vocabulary);

  const scores: [ClassLabel, number][] = [];
  let label = trained.classes[0];
  let best = -Infinity;
  trained.classes.forEach((c, i) => {
    const row = logLikelihoodRow(trained, c);
    let score = logPrior(trained, c);
    vector.counts.forEach((count, idx) => {
      if (count > 0) score += count * row[idx];
    });
    scores.push([c, score]);
    if (i === 0 || score > best) {
      best = score;
      label = c;
    }
  });
  return { label, scoresByClass: Object.fromEntries(scores) };
}

export function predictBatch(model: ModelState, vectors: readonly DocumentTermVector[]): PredictionResult[] {
  const trained = requireTrained(model);
  return vectors.map((v) => predict(trained, v));
}

/** P(t|c) for a vocabulary term; 0 for OOV terms. */
export function likelihood(model: ModelState, term: string, label: ClassLabel): number {
  const trained = requireTrained(model);
  const idx = trained.vocabulary.index.get(term);
  if (idx === undefined) return 0;
  return Math.exp(logLikelihoodRow(trained, label)[idx]);
}

export function priorProbability(model: ModelState, label: ClassLabel): number {
  return Math.exp(logPrior(requireTrained(model), label));
}

/** Normalized class probabilities from log scores (softmax). */
export function posteriors(result: PredictionResult): Record<ClassLabel, number> {
  const entries = Object.entries(result.scoresByClass);
  const max = Math.max(...entries.map(([, s]) => s));
  if (max === -Infinity) {
    return Object.fromEntries(entries.map(([c]) => [c, 1 / entries.length]));
  }
  const exps = entries.map(([c, s]) => [c, Math.exp(s - max)] as const);
  const sum = exps.reduce((n, [, e]) => n + e, 0);
  return Object.fromEntries(exps.map(([c, e]) => [c, e / sum]));
}

/** The k most likely terms of a class, by P(t|c). */
export function topTerms(model: ModelState, label: ClassLabel, k = 10): { term: string; probability: number }[] {
  const trained = requireTrained(model);
  const row = logLikelihoodRow(trained, label);
  return trained.vocabulary.terms
    .map((term, idx) => ({ term, idx, logp: row[idx] }))
    .sort((a, b) => b.logp - a.logp || a.idx - b.idx)
    .slice(0, k)
    .map(({ term, logp }) => ({ term, probability: Math.exp(logp) }));
}
