import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse';
import { DatasetError } from './errors';
import type { LabeledDocument } from './types';

export type Column = number | string;

export type DatasetOptions = {
  /** text fields joined into the document, in this order */
  textColumns: Column[];
  labelColumn: Column;
  idColumn?: Column;
  delimiter?: string;
  /** first row holds column names; columns may then be given by name */
  header?: boolean;
};

/**
 * Statement-dataset layout: id, label, statement, subject, speaker,
 * speaker job, state, party, five credit-history counts, context.
 */
export const STATEMENT_COLUMNS: DatasetOptions = {
  idColumn: 0,
  labelColumn: 1,
  textColumns: [2, 3, 4, 5, 6, 7, 13],
  delimiter: '\t',
  header: false,
};

function isRow(record: unknown): record is string[] {
  return Array.isArray(record) && record.every(v => typeof v === 'string');
}

function resolveColumn(col: Column, names: string[] | undefined, file: string): number {
  if (typeof col === 'number') return col;
  if (/^\d+$/.test(col)) return Number(col);
  const idx = names ? names.indexOf(col) : -1;
  if (idx < 0) throw new DatasetError(`${path.basename(file)} has no column named "${col}"`);
  return idx;
}

/**
 * Stream a delimited file into labeled documents.
 *
 * TSV is read without quote handling, since statements carry bare quotes.
 * Rows with an empty label are skipped.
 */
export async function readDataset(file: string, options: DatasetOptions = STATEMENT_COLUMNS): Promise<LabeledDocument[]> {
  if (!fs.existsSync(file)) throw new DatasetError(`Dataset file not found: ${file}`);
  const delimiter = options.delimiter ?? '\t';
  const parser = fs.createReadStream(file).pipe(parse({
    delimiter,
    quote: delimiter === '\t' ? false : '"',
    bom: true,
    relax_column_count: true,
    skip_empty_lines: true,
  }));

  const out: LabeledDocument[] = [];
  let names: string[] | undefined;
  let cols: { text: number[]; label: number; id?: number } | undefined;
  let line = 0;
  let skipped = 0;

  for await (const record of parser) {
    line++;
    if (!isRow(record)) throw new DatasetError(`${path.basename(file)} row ${line} is not a list of fields`);
    if (options.header && !names) {
      names = record;
      continue;
    }
    if (!cols) {
      cols = {
        text: options.textColumns.map(c => resolveColumn(c, names, file)),
        label: resolveColumn(options.labelColumn, names, file),
        id: options.idColumn === undefined ? undefined : resolveColumn(options.idColumn, names, file),
      };
    }
    const needed = Math.max(cols.label, cols.id ?? 0, ...cols.text);
    if (record.length <= needed) {
      throw new DatasetError(`${path.basename(file)} row ${line} has ${record.length} columns, need at least ${needed + 1}`);
    }
    const label = record[cols.label].trim();
    if (!label) {
      skipped++;
      continue;
    }
    out.push({
      id: cols.id === undefined ? String(out.length + skipped) : record[cols.id].trim(),
      fields: cols.text.map(i => record[i].trim()),
      label,
    });
  }

  if (skipped) console.warn('LOG:', `Skipped ${skipped} unlabeled rows in ${path.basename(file)}`);
  return out;
}

export type DatasetFiles = { train: string; test?: string; valid?: string };

export async function readDatasets(files: DatasetFiles, options?: DatasetOptions) {
  const [train, test, valid] = await Promise.all([
    readDataset(files.train, options),
    files.test ? readDataset(files.test, options) : undefined,
    files.valid ? readDataset(files.valid, options) : undefined,
  ]);
  return { train, test, valid };
}

export async function writeJsonl(file: string, rows: unknown[]) {
  await fs.promises.mkdir(path.dirname(file), { recursive: true });
  const out = rows.map((r) => JSON.stringify(r)).join('\n') + '\n';
  await fs.promises.writeFile(file, out, 'utf-8');
}

export async function readJsonl<T>(file: string, parseRow: (row: unknown) => T): Promise<T[]> {
  const raw = await fs.promises.readFile(file, 'utf-8');
  return raw
    .replace(/^\uFEFF/, '')
    .split(/\r?\n/)
    .filter(l => l.trim())
    .map((l, i) => {
      try {
        return parseRow(JSON.parse(l));
      } catch (e) {
        throw new DatasetError(`Invalid record ${i + 1} in ${path.basename(file)}: ${e instanceof Error ? e.message : String(e)}`);
      }
    });
}
