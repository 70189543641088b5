import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { formatIssues, NORMALIZATION_MODES } from './config';
import { ModelFormatError } from './errors';
import { compareLabels } from './naiveBayes';
import { vocabularyFromTerms } from './vocabulary';
import type { ClassLabel, Model, TokenizerConfig } from './types';

export const MODEL_VERSION = 2;

// JSON has no -Infinity (alpha = 0 models), so it is written as null
const LogValue = z.number().nullable().transform((v) => (v === null ? -Infinity : v));

const SavedModel = z.object({
  modelVersion: z.literal(MODEL_VERSION),
  vocabulary: z.array(z.string()),
  classes: z.array(z.string()).min(1),
  alpha: z.number().finite().min(0),
  // per-class fields are arrays aligned with `classes`, so any label string survives
  logPriors: z.array(LogValue),
  logLikelihoods: z.array(z.array(LogValue)),
  classDocumentCounts: z.array(z.number().int().min(0)),
  classTermTotals: z.array(z.number().min(0)),
  tokenizer: z.object({
    normalizationMode: z.enum(NORMALIZATION_MODES),
    stopwords: z.array(z.string()),
  }),
});

export type SavedModel = z.input<typeof SavedModel>;

function writeLog(v: number): number | null {
  return v === -Infinity ? null : v;
}

function byClass<V, R>(classes: readonly ClassLabel[], map: ReadonlyMap<ClassLabel, V>, f: (v: V) => R): R[] {
  return classes.map((c) => {
    const v = map.get(c);
    if (v === undefined) throw new ModelFormatError(`Model has no entry for class ${c}`);
    return f(v);
  });
}

export function serializeModel(model: Model, tokenizer: TokenizerConfig): SavedModel {
  return {
    modelVersion: MODEL_VERSION,
    vocabulary: [...model.vocabulary.terms],
    classes: [...model.classes],
    alpha: model.alpha,
    logPriors: byClass(model.classes, model.logPriors, writeLog),
    logLikelihoods: byClass(model.classes, model.logLikelihoods, (row) => Array.from(row, writeLog)),
    classDocumentCounts: byClass(model.classes, model.classDocumentCounts, (n) => n),
    classTermTotals: byClass(model.classes, model.classTermTotals, (n) => n),
    tokenizer: {
      normalizationMode: tokenizer.normalizationMode,
      stopwords: [...tokenizer.stopwordSet].sort(),
    },
  };
}

function checkLength(values: readonly unknown[], classes: readonly ClassLabel[], field: string) {
  if (values.length !== classes.length) {
    throw new ModelFormatError(`Saved model has ${values.length} ${field} entries for ${classes.length} classes`);
  }
}

/** Rebuild a model (and the tokenizer settings it was trained with) from its JSON form. */
export function deserializeModel(raw: unknown): { model: Model; tokenizer: TokenizerConfig } {
  const parsed = SavedModel.safeParse(raw);
  if (!parsed.success) throw new ModelFormatError(`Invalid saved model: ${formatIssues(parsed.error)}`);
  const saved = parsed.data;

  const vocabulary = vocabularyFromTerms(saved.vocabulary);
  if (vocabulary.index.size !== saved.vocabulary.length) {
    throw new ModelFormatError('Saved vocabulary contains duplicate terms');
  }
  if (new Set(saved.classes).size !== saved.classes.length) {
    throw new ModelFormatError('Saved classes contain duplicates');
  }
  checkLength(saved.logPriors, saved.classes, 'logPriors');
  checkLength(saved.logLikelihoods, saved.classes, 'logLikelihoods');
  checkLength(saved.classDocumentCounts, saved.classes, 'classDocumentCounts');
  checkLength(saved.classTermTotals, saved.classes, 'classTermTotals');

  const order = saved.classes.map((c, i) => ({ c, i })).sort((a, b) => compareLabels(a.c, b.c));
  const classes = order.map(({ c }) => c);
  const logPriors = new Map<ClassLabel, number>();
  const logLikelihoods = new Map<ClassLabel, Float64Array>();
  const classDocumentCounts = new Map<ClassLabel, number>();
  const classTermTotals = new Map<ClassLabel, number>();
  for (const { c, i } of order) {
    const row = saved.logLikelihoods[i];
    if (row.length !== vocabulary.terms.length) {
      throw new ModelFormatError(`Likelihood row for class ${c} has ${row.length} entries, vocabulary has ${vocabulary.terms.length}`);
    }
    logPriors.set(c, saved.logPriors[i]);
    logLikelihoods.set(c, Float64Array.from(row));
    classDocumentCounts.set(c, saved.classDocumentCounts[i]);
    classTermTotals.set(c, saved.classTermTotals[i]);
  }

  return {
    model: {
      status: 'trained',
      classes,
      vocabulary,
      alpha: saved.alpha,
      logPriors,
      logLikelihoods,
      classDocumentCounts,
      classTermTotals,
    },
    tokenizer: {
      normalizationMode: saved.tokenizer.normalizationMode,
      stopwordSet: new Set(saved.tokenizer.stopwords),
    },
  };
}

export async function saveModel(file: string, model: Model, tokenizer: TokenizerConfig): Promise<void> {
  await fs.promises.mkdir(path.dirname(file), { recursive: true });
  await fs.promises.writeFile(file, JSON.stringify(serializeModel(model, tokenizer)), 'utf-8');
}

export async function loadModel(file: string): Promise<{ model: Model; tokenizer: TokenizerConfig }> {
  const raw = await fs.promises.readFile(file, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    throw new ModelFormatError(`${path.basename(file)} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return deserializeModel(json);
}
