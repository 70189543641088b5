export type NormalizationMode = 'lemmatize-then-stem' | 'stem-only' | 'lemmatize-only';

/** Raw text fields of one statement, joined with a space before tokenizing. */
export type Document = readonly string[];

export type Token = string;

export type ClassLabel = string;

export type LabeledDocument = {
  id: string;
  fields: string[];
  label: ClassLabel;
};

export type Vocabulary = {
  /** terms[i] is the term with index i; sorted ascending */
  readonly terms: readonly string[];
  readonly index: ReadonlyMap<string, number>;
  /** fingerprint of the ordered term list */
  readonly id: string;
};

export type DocumentTermVector = {
  readonly dimension: number;
  readonly vocabularyId: string;
  /** vocabulary index -> count, non-zero entries only */
  readonly counts: ReadonlyMap<number, number>;
};

export type TokenizerConfig = {
  stopwordSet: ReadonlySet<string>;
  normalizationMode: NormalizationMode;
};

export type ClassifierConfig = TokenizerConfig & {
  minDocFrequencyFraction: number;
  laplaceAlpha: number;
  priorOverride?: Readonly<Record<ClassLabel, number>>;
};

export type FitOptions = {
  alpha: number;
  priorOverride?: Readonly<Record<ClassLabel, number>>;
};

export type Model = {
  readonly status: 'trained';
  /** sorted ascending; the order breaks score ties */
  readonly classes: readonly ClassLabel[];
  readonly vocabulary: Vocabulary;
  readonly alpha: number;
  readonly logPriors: ReadonlyMap<ClassLabel, number>;
  /** one row per class, one column per vocabulary index */
  readonly logLikelihoods: ReadonlyMap<ClassLabel, Readonly<Float64Array>>;
  readonly classDocumentCounts: ReadonlyMap<ClassLabel, number>;
  readonly classTermTotals: ReadonlyMap<ClassLabel, number>;
};

export type UntrainedModel = { readonly status: 'untrained' };

export type ModelState = Model | UntrainedModel;

export type PredictionResult = {
  label: ClassLabel;
  scoresByClass: Record<ClassLabel, number>;
};
