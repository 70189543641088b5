import { test, expect } from '@playwright/test';
import { DimensionMismatchError, InvalidConfigError } from '../src/errors';
import { evaluate, summarize, wilsonInterval } from '../src/evaluate';
import { shuffle, trainTestSplit } from '../src/split';

test.describe('evaluate', () => {
  const report = evaluate(['a', 'a', 'b', 'b'], ['a', 'b', 'b', 'b']);

  test('accuracy and confusion matrix', () => {
    expect(report.correct).toBe(3);
    expect(report.accuracy).toBe(0.75);
    expect(report.classes).toEqual(['a', 'b']);
    expect(report.confusion).toEqual([[1, 1], [0, 2]]);
  });

  test('per-class metrics', () => {
    const [a, b] = report.perClass;
    expect(a).toEqual({ label: 'a', precision: 1, recall: 0.5, f1: expect.any(Number), support: 2 });
    expect(a.f1).toBeCloseTo(2 / 3, 12);
    expect(b.precision).toBeCloseTo(2 / 3, 12);
    expect(b.recall).toBe(1);
    expect(b.f1).toBeCloseTo(0.8, 12);
    expect(report.macroF1).toBeCloseTo((2 / 3 + 0.8) / 2, 12);
  });

  test('wilson interval', () => {
    const [lo, hi] = wilsonInterval(3, 4);
    expect(lo).toBeCloseTo(0.300642, 5);
    expect(hi).toBeCloseTo(0.954413, 5);
    expect(wilsonInterval(0, 0)).toEqual([0, 1]);
  });

  test('summary line', () => {
    expect(summarize(report)).toBe('Accuracy 75.0% (95% CI 30.1%-95.4%) on 4 documents | macro-F1 0.733 | a:2, b:2');
  });

  test('classes with no rows get zero metrics', () => {
    const r = evaluate(['a'], ['a'], ['a', 'c']);
    expect(r.confusion).toEqual([[1, 0], [0, 0]]);
    expect(r.perClass[1]).toEqual({ label: 'c', precision: 0, recall: 0, f1: 0, support: 0 });
  });

  test('length mismatch and empty input throw', () => {
    expect(() => evaluate(['a'], [])).toThrow(DimensionMismatchError);
    expect(() => evaluate([], [])).toThrow(DimensionMismatchError);
  });
});

test.describe('split', () => {
  const items = Array.from({ length: 10 }, (_, i) => i);

  test('shuffle is reproducible for a seed and leaves the input alone', () => {
    expect(shuffle(items, 7)).toEqual([6, 5, 8, 1, 2, 3, 4, 7, 9, 0]);
    expect(shuffle(items, 7)).toEqual(shuffle(items, 7));
    expect(shuffle(items, 8)).toEqual([6, 9, 0, 8, 7, 3, 4, 2, 5, 1]);
    expect(items).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  test('trainTestSplit partitions by fraction', () => {
    const { train, test: held } = trainTestSplit(items, 0.8, 7);
    expect(train).toEqual([6, 5, 8, 1, 2, 3, 4, 7]);
    expect(held).toEqual([9, 0]);
    expect(() => trainTestSplit(items, 1.2, 7)).toThrow(InvalidConfigError);
  });
});
