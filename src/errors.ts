// Error taxonomy for the classifier and its I/O collaborators.
// Every error is raised eagerly, before any training state is built.

export type ClassifierErrorCode =
  | 'EMPTY_VOCABULARY'
  | 'INVALID_CONFIG'
  | 'DIMENSION_MISMATCH'
  | 'UNTRAINED_MODEL'
  | 'DATASET'
  | 'MODEL_FORMAT';

export class ClassifierError extends Error {
  readonly code: ClassifierErrorCode;

  constructor(code: ClassifierErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Vocabulary pruning removed every term (or the corpus was empty). */
export class EmptyVocabularyError extends ClassifierError {
  constructor(message = 'Vocabulary is empty after pruning') {
    super('EMPTY_VOCABULARY', message);
  }
}

export class InvalidConfigError extends ClassifierError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
  }
}

/**
 * Label/vector counts disagree, or a vector was encoded against a
 * different vocabulary than the one it is used with.
 */
export class DimensionMismatchError extends ClassifierError {
  constructor(message: string) {
    super('DIMENSION_MISMATCH', message);
  }
}

export class UntrainedModelError extends ClassifierError {
  constructor(message = 'Model has not been trained; call fit() first') {
    super('UNTRAINED_MODEL', message);
  }
}

export class DatasetError extends ClassifierError {
  constructor(message: string) {
    super('DATASET', message);
  }
}

export class ModelFormatError extends ClassifierError {
  constructor(message: string) {
    super('MODEL_FORMAT', message);
  }
}
