import { DimensionMismatchError } from './errors';
import { compareLabels } from './naiveBayes';
import type { ClassLabel } from './types';

// two-sided 95%
const Z_95 = 1.959963984540054;

export type ClassMetrics = {
  label: ClassLabel;
  precision: number;
  recall: number;
  f1: number;
  support: number;
};

export type EvaluationReport = {
  total: number;
  correct: number;
  accuracy: number;
  /** Wilson score interval for the accuracy */
  confidenceInterval: [number, number];
  classes: ClassLabel[];
  /** confusion[i][j]: actual classes[i] predicted as classes[j] */
  confusion: number[][];
  perClass: ClassMetrics[];
  macroF1: number;
};

export function wilsonInterval(successes: number, trials: number, z = Z_95): [number, number] {
  if (trials <= 0) return [0, 1];
  const p = successes / trials;
  const z2 = z * z;
  const denom = 1 + z2 / trials;
  const center = (p + z2 / (2 * trials)) / denom;
  const half = (z * Math.sqrt((p * (1 - p)) / trials + z2 / (4 * trials * trials))) / denom;
  return [Math.max(0, center - half), Math.min(1, center + half)];
}

function ratio(num: number, den: number) {
  return den ? num / den : 0;
}

/**
 * Accuracy, confusion matrix and per-class metrics. Labels that occur only
 * in the actual or predicted lists are added to `classes`.
 */
export function evaluate(
  actual: readonly ClassLabel[],
  predicted: readonly ClassLabel[],
  classes: readonly ClassLabel[] = []
): EvaluationReport {
  if (actual.length !== predicted.length) {
    throw new DimensionMismatchError(`Got ${actual.length} actual labels but ${predicted.length} predictions`);
  }
  if (!actual.length) throw new DimensionMismatchError('Cannot evaluate zero predictions');

  const labels = [...new Set([...classes, ...actual, ...predicted])].sort(compareLabels);
  const pos = new Map(labels.map((l, i) => [l, i]));
  const confusion = labels.map(() => labels.map(() => 0));
  let correct = 0;
  actual.forEach((a, k) => {
    const p = predicted[k];
    const i = pos.get(a);
    const j = pos.get(p);
    if (i === undefined || j === undefined) return;
    confusion[i][j]++;
    if (a === p) correct++;
  });

  const perClass = labels.map((label, i) => {
    const tp = confusion[i][i];
    const support = confusion[i].reduce((n, v) => n + v, 0);
    const predictedAs = confusion.reduce((n, row) => n + row[i], 0);
    const precision = ratio(tp, predictedAs);
    const recall = ratio(tp, support);
    const f1 = ratio(2 * precision * recall, precision + recall);
    return { label, precision, recall, f1, support };
  });

  return {
    total: actual.length,
    correct,
    accuracy: correct / actual.length,
    confidenceInterval: wilsonInterval(correct, actual.length),
    classes: labels,
    confusion,
    perClass,
    macroF1: perClass.reduce((n, m) => n + m.f1, 0) / perClass.length,
  };
}

const pct = (v: number) => `${(v * 100).toFixed(1)}%`;

export function summarize(report: EvaluationReport): string {
  const [lo, hi] = report.confidenceInterval;
  return `Accuracy ${pct(report.accuracy)} (95% CI ${pct(lo)}-${pct(hi)}) on ${report.total} documents | ` +
    `macro-F1 ${report.macroF1.toFixed(3)} | ` +
    report.perClass.map(m => `${m.label}:${m.support}`).join(', ');
}
