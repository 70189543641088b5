import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { InvalidConfigError } from './errors';
import type { ClassifierConfig, NormalizationMode } from './types';

export const NORMALIZATION_MODES = ['lemmatize-then-stem', 'stem-only', 'lemmatize-only'] as const satisfies readonly NormalizationMode[];

export const DEFAULTS = {
  minDocFrequencyFraction: 0.01,
  laplaceAlpha: 1,
  normalizationMode: 'lemmatize-then-stem',
} as const;

const STOPWORDS_FILE = path.join(__dirname, '..', 'data', 'stopwords-en.json');

let englishStopwords: ReadonlySet<string> | undefined;

/** English stopword list shipped in data/stopwords-en.json. */
export function defaultStopwords(): ReadonlySet<string> {
  if (!englishStopwords) {
    const words = z.array(z.string()).parse(JSON.parse(fs.readFileSync(STOPWORDS_FILE, 'utf-8')));
    englishStopwords = new Set(words);
  }
  return englishStopwords;
}

const StopwordSet = z.union([
  z.array(z.string()),
  z.custom<ReadonlySet<string>>(
    (v) => v instanceof Set && [...v].every((w) => typeof w === 'string'),
    { message: 'Expected a Set of strings' }
  ),
]);

export const ClassifierConfigSchema = z.object({
  stopwordSet: StopwordSet.optional(),
  minDocFrequencyFraction: z.number().finite().min(0).max(1).default(DEFAULTS.minDocFrequencyFraction),
  laplaceAlpha: z.number().finite().min(0).default(DEFAULTS.laplaceAlpha),
  priorOverride: z.record(z.number().finite().min(0).max(1)).optional(),
  normalizationMode: z.enum(NORMALIZATION_MODES).default(DEFAULTS.normalizationMode),
}).strict();

export type ClassifierConfigInput = z.input<typeof ClassifierConfigSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    .join('; ');
}

/** Fill defaults and validate; failures surface as InvalidConfigError. */
export function resolveConfig(input: ClassifierConfigInput = {}): ClassifierConfig {
  const parsed = ClassifierConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigError(`Invalid classifier config: ${formatIssues(parsed.error)}`);
  }
  const { stopwordSet, priorOverride, ...rest } = parsed.data;
  const config: ClassifierConfig = {
    ...rest,
    stopwordSet: stopwordSet === undefined
      ? defaultStopwords()
      : Array.isArray(stopwordSet) ? new Set(stopwordSet) : stopwordSet,
  };
  if (priorOverride) config.priorOverride = priorOverride;
  return config;
}

const numberFromEnv = z.coerce.number().finite();

/** Environment read by the command-line runner. */
export const Env = z.object({
  TRAIN_TSV: z.string().min(1),
  TEST_TSV: z.string().optional(),
  VALID_TSV: z.string().optional(),
  MODEL_PATH: z.string().default('out/model.json'),
  REPORT_DIR: z.string().default('out/report'),
  PREDICTIONS_PATH: z.string().default('out/predictions.jsonl'),
  TEXT_COLUMNS: z.string().optional(),
  LABEL_COLUMN: z.string().optional(),
  DELIMITER: z.string().default('\t'),
  HEADER: z.enum(['0', '1']).default('0'),
  MIN_DF: numberFromEnv.optional(),
  ALPHA: numberFromEnv.optional(),
  NORMALIZATION: z.enum(NORMALIZATION_MODES).optional(),
  SPLIT_SEED: z.coerce.number().int().default(42),
  SPLIT_FRACTION: numberFromEnv.min(0).max(1).default(0.8),
  VERBOSE: z.enum(['0', '1']).default('1'),
  SLACK_BOT_TOKEN: z.string().optional(),
  SLACK_CHANNEL: z.string().optional(),
});

export type EnvConfig = z.infer<typeof Env>;
