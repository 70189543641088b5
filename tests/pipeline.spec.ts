import fs from 'fs';
import path from 'path';
import { test, expect } from '@playwright/test';
import { DatasetError } from '../src/errors';
import { readDataset, readJsonl } from '../src/io';
import { runPipeline } from '../src/run';

const SHARED = ['economy', 'smith', 'senator', 'texas', 'republican', '1', '2', '0', '3', '4', 'a speech'];

// statement layout: id, label, statement, subject, speaker, job, state, party, 5 counts, context
function row(id: string, label: string, statement: string) {
  const [subject, speaker, job, state, party, ...rest] = SHARED;
  return [id, label, statement, subject, speaker, job, state, party, ...rest].join('\t');
}

const TRAIN = [
  row('1.json', 'true', 'Cats purr.'),
  row('2.json', 'false', 'Fish swim!'),
  row('3.json', 'true', 'Cats meow'),
  row('4.json', 'false', 'Fish splash'),
  row('5.json', 'true', '"Cats" purr, 2 times'),
  row('6.json', 'false', 'Fish swim fast'),
  row('7.json', 'true', 'Cats meow loudly'),
  row('8.json', 'false', 'Fish splash around'),
  row('9.json', 'true', 'Cats purr'),
  row('10.json', 'false', 'Fish swim'),
];

const TEST = [
  row('t1.json', 'true', 'cats purr'),
  row('t2.json', 'false', 'fish swim'),
];

const classifier = { normalizationMode: 'stem-only' as const, stopwordSet: [], minDocFrequencyFraction: 0 };

async function writeFile(file: string, lines: string[]) {
  await fs.promises.mkdir(path.dirname(file), { recursive: true });
  await fs.promises.writeFile(file, lines.join('\n') + '\n', 'utf-8');
}

test.describe('readDataset', () => {
  test('reads the statement layout, keeping bare quotes', async ({}, testInfo) => {
    const file = testInfo.outputPath('train.tsv');
    await writeFile(file, TRAIN);
    const docs = await readDataset(file);
    expect(docs).toHaveLength(10);
    expect(docs[4]).toEqual({
      id: '5.json',
      label: 'true',
      fields: ['"Cats" purr, 2 times', 'economy', 'smith', 'senator', 'texas', 'republican', 'a speech'],
    });
  });

  test('reads named columns from a CSV with a header and skips unlabeled rows', async ({}, testInfo) => {
    const file = testInfo.outputPath('data.csv');
    await writeFile(file, ['id,label,text', '1,yes,"hello, world"', '2,,skip me', '3,no,bye']);
    const docs = await readDataset(file, { textColumns: ['text'], labelColumn: 'label', idColumn: 'id', delimiter: ',', header: true });
    expect(docs).toEqual([
      { id: '1', label: 'yes', fields: ['hello, world'] },
      { id: '3', label: 'no', fields: ['bye'] },
    ]);
  });

  test('reports missing files and columns', async ({}, testInfo) => {
    await expect(readDataset(testInfo.outputPath('missing.tsv'))).rejects.toThrow(DatasetError);

    const file = testInfo.outputPath('short.tsv');
    await writeFile(file, ['1\ttrue\tonly three columns']);
    await expect(readDataset(file)).rejects.toThrow(DatasetError);

    const csv = testInfo.outputPath('named.csv');
    await writeFile(csv, ['id,label,text', '1,yes,hi']);
    await expect(readDataset(csv, { textColumns: ['body'], labelColumn: 'label', delimiter: ',', header: true }))
      .rejects.toThrow(DatasetError);
  });
});

test.describe('runPipeline', () => {
  test('trains, predicts, evaluates and reports', async ({}, testInfo) => {
    const trainFile = testInfo.outputPath('train.tsv');
    const testFile = testInfo.outputPath('test.tsv');
    await writeFile(trainFile, TRAIN);
    await writeFile(testFile, TEST);
    const outDir = testInfo.outputPath('out');

    const result = await test.step('run', () => runPipeline({
      files: { train: trainFile, test: testFile, valid: testFile },
      classifier,
      outDir,
      env: {},
    }));

    await test.step('evaluation', async () => {
      expect(result.evaluation.total).toBe(2);
      expect(result.evaluation.accuracy).toBe(1);
      expect(result.evaluation.classes).toEqual(['false', 'true']);
      expect(result.validation?.accuracy).toBe(1);
      expect(result.notified).toBe(false);
    });

    await test.step('artifacts', async () => {
      expect(result.modelPath).toBe(path.join(outDir, 'model.json'));
      expect(fs.existsSync(result.modelPath)).toBe(true);

      const rows = await readJsonl(result.predictionsPath, r => r);
      expect(rows).toHaveLength(2);
      expect(rows[0]).toMatchObject({ id: 't1.json', actual: 'true', predicted: 'true' });

      const html = await fs.promises.readFile(result.reportPath, 'utf-8');
      expect(html).toContain('<h2>Confusion matrix</h2>');
      expect(fs.existsSync(path.join(outDir, 'report', 'report.css'))).toBe(true);
    });
  });

  test('splits the training file with a seed when no test file is given', async ({}, testInfo) => {
    const trainFile = testInfo.outputPath('train.tsv');
    await writeFile(trainFile, TRAIN);
    const result = await runPipeline({
      files: { train: trainFile },
      classifier,
      outDir: testInfo.outputPath('out'),
      splitSeed: 7,
      splitFraction: 0.8,
      env: {},
    });
    expect(result.evaluation.total).toBe(2);
    expect(result.validation).toBeUndefined();
  });
});
