import path from 'path';
import { classifyBatch, documentText, explain, trainModel, type TrainedClassifier } from './classifier';
import type { ClassifierConfigInput } from './config';
import { renderDashboard, type PredictionRow } from './dashboard';
import { evaluate, summarize, type EvaluationReport } from './evaluate';
import { readDatasets, STATEMENT_COLUMNS, writeJsonl, type DatasetFiles, type DatasetOptions } from './io';
import { posteriors, topTerms } from './naiveBayes';
import { saveModel } from './persistence';
import { postSlack } from './slack';
import { trainTestSplit } from './split';
import type { LabeledDocument } from './types';

export type PipelineOptions = {
  files: DatasetFiles;
  dataset?: DatasetOptions;
  classifier?: ClassifierConfigInput;
  outDir?: string;
  modelPath?: string;
  reportDir?: string;
  predictionsPath?: string;
  /** used only when no test file is given */
  splitSeed?: number;
  splitFraction?: number;
  topTermCount?: number;
  verbose?: boolean;
  env?: NodeJS.ProcessEnv;
};

export type PipelineResult = {
  evaluation: EvaluationReport;
  validation?: EvaluationReport;
  summary: string;
  modelPath: string;
  reportPath: string;
  predictionsPath: string;
  notified: boolean;
};

export function predictRows(trained: TrainedClassifier, docs: readonly LabeledDocument[]): PredictionRow[] {
  const results = classifyBatch(trained, docs.map(d => d.fields));
  return results.map((r, i) => {
    const doc = docs[i];
    return {
      id: doc.id,
      text: documentText(doc.fields),
      actual: doc.label,
      predicted: r.label,
      confidence: posteriors(r)[r.label],
      reasoning: explain(trained, doc.fields, r),
    };
  });
}

function evaluateRows(rows: readonly PredictionRow[], trained: TrainedClassifier) {
  return evaluate(rows.map(r => r.actual), rows.map(r => r.predicted), trained.model.classes);
}

/**
 * Load, train, save, predict, evaluate, report.
 * Without a test file the training file is split with the given seed.
 */
export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const outDir = options.outDir ?? 'out';
  const modelPath = options.modelPath ?? path.join(outDir, 'model.json');
  const reportDir = options.reportDir ?? path.join(outDir, 'report');
  const predictionsPath = options.predictionsPath ?? path.join(outDir, 'predictions.jsonl');
  const log = options.verbose ? (...args: unknown[]) => console.log('LOG:', ...args) : () => {};

  log('Loading datasets...');
  const data = await readDatasets(options.files, options.dataset ?? STATEMENT_COLUMNS);
  let train = data.train;
  let test = data.test;
  if (!test) {
    const split = trainTestSplit(train, options.splitFraction ?? 0.8, options.splitSeed ?? 42);
    train = split.train;
    test = split.test;
    log(`No test file; split training data ${train.length}/${test.length} with seed ${options.splitSeed ?? 42}`);
  }
  log(`Training documents: ${train.length}, test documents: ${test.length}`);

  if (options.verbose) console.time('train');
  const trained = trainModel(train.map(d => d.fields), train.map(d => d.label), options.classifier);
  if (options.verbose) console.timeEnd('train');
  log('Vocabulary size:', trained.model.vocabulary.terms.length, 'Classes:', trained.model.classes.join(', '));

  await saveModel(modelPath, trained.model, trained.tokenizer);
  log('Model saved to', modelPath);

  const rows = predictRows(trained, test);
  const evaluation = evaluateRows(rows, trained);
  const summary = summarize(evaluation);
  log(summary);

  let validation: EvaluationReport | undefined;
  if (data.valid?.length) {
    validation = evaluateRows(predictRows(trained, data.valid), trained);
    log('Validation:', summarize(validation));
  }

  await writeJsonl(predictionsPath, rows);

  const classDistribution = Object.fromEntries(trained.model.classDocumentCounts);
  const termsByClass = Object.fromEntries(
    trained.model.classes.map(c => [c, topTerms(trained.model, c, options.topTermCount ?? 15)])
  );
  const reportPath = await renderDashboard({
    evaluation,
    classDistribution,
    topTerms: termsByClass,
    vocabularySize: trained.model.vocabulary.terms.length,
    alpha: trained.model.alpha,
    samples: rows,
  }, reportDir);
  log('Report written to', reportPath);

  const notified = await postSlack(`Statement classifier: ${summary}`, options.env);
  return { evaluation, validation, summary, modelPath, reportPath, predictionsPath, notified };
}
