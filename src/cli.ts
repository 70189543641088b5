#!/usr/bin/env node
import { Env, formatIssues } from './config';
import { STATEMENT_COLUMNS, type Column, type DatasetOptions } from './io';
import { runPipeline } from './run';

function column(value: string): Column {
  return /^\d+$/.test(value) ? Number(value) : value;
}

async function main() {
  const parsed = Env.safeParse(process.env);
  if (!parsed.success) {
    console.error('Invalid environment:', formatIssues(parsed.error));
    process.exitCode = 2;
    return;
  }
  const env = parsed.data;

  const dataset: DatasetOptions = {
    ...STATEMENT_COLUMNS,
    delimiter: env.DELIMITER,
    header: env.HEADER === '1',
  };
  if (env.TEXT_COLUMNS) dataset.textColumns = env.TEXT_COLUMNS.split(',').map(s => column(s.trim()));
  if (env.LABEL_COLUMN) dataset.labelColumn = column(env.LABEL_COLUMN);

  const result = await runPipeline({
    files: { train: env.TRAIN_TSV, test: env.TEST_TSV, valid: env.VALID_TSV },
    dataset,
    classifier: {
      minDocFrequencyFraction: env.MIN_DF,
      laplaceAlpha: env.ALPHA,
      normalizationMode: env.NORMALIZATION,
    },
    modelPath: env.MODEL_PATH,
    reportDir: env.REPORT_DIR,
    predictionsPath: env.PREDICTIONS_PATH,
    splitSeed: env.SPLIT_SEED,
    splitFraction: env.SPLIT_FRACTION,
    verbose: env.VERBOSE === '1',
  });
  console.log(result.summary);
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? `${err.name}: ${err.message}` : err);
  process.exitCode = 1;
});
