import { InvalidConfigError } from './errors';

/** mulberry32: small seeded PRNG returning floats in [0, 1). */
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Fisher-Yates on a copy; the same seed always gives the same order. */
export function shuffle<T>(items: readonly T[], seed: number): T[] {
  const rand = seededRandom(seed);
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(rand() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

export function trainTestSplit<T>(items: readonly T[], trainFraction: number, seed: number): { train: T[]; test: T[] } {
  if (!Number.isFinite(trainFraction) || trainFraction < 0 || trainFraction > 1) {
    throw new InvalidConfigError(`Train fraction must be in [0, 1], got ${trainFraction}`);
  }
  const shuffled = shuffle(items, seed);
  const cut = Math.round(trainFraction * shuffled.length);
  return { train: shuffled.slice(0, cut), test: shuffled.slice(cut) };
}
