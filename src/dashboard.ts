import fs from 'fs';
import path from 'path';
import ejs from 'ejs';
import type { EvaluationReport } from './evaluate';
import type { ClassLabel } from './types';

const TEMPLATES = path.join(__dirname, '..', 'templates');

export type PredictionRow = {
  id: string;
  text: string;
  actual: ClassLabel;
  predicted: ClassLabel;
  confidence: number;
  reasoning: string;
};

export type DashboardData = {
  evaluation: EvaluationReport;
  /** training documents per class */
  classDistribution: Record<ClassLabel, number>;
  topTerms: Record<ClassLabel, { term: string; probability: number }[]>;
  vocabularySize: number;
  alpha: number;
  samples: PredictionRow[];
};

// heat-table shading: share of the row, 0..1
export function rowShares(confusion: number[][]): number[][] {
  return confusion.map(row => {
    const total = row.reduce((n, v) => n + v, 0);
    return row.map(v => (total ? v / total : 0));
  });
}

export async function renderDashboard(data: DashboardData, outDir = 'out/report', sampleLimit = 50) {
  const tpl = await fs.promises.readFile(path.join(TEMPLATES, 'report.ejs'), 'utf-8');
  const maxCount = Math.max(1, ...Object.values(data.classDistribution));
  const html = ejs.render(tpl, {
    generatedAt: new Date().toISOString(),
    ...data,
    maxCount,
    shares: rowShares(data.evaluation.confusion),
    samples: data.samples.slice(0, sampleLimit),
  });

  await fs.promises.mkdir(outDir, { recursive: true });
  const outFile = path.join(outDir, 'report.html');
  await fs.promises.writeFile(outFile, html, 'utf-8');
  await fs.promises.copyFile(path.join(TEMPLATES, 'report.css'), path.join(outDir, 'report.css'));
  return outFile;
}
