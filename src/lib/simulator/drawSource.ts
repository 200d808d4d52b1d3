/**
 * Seeded draw source. Each value is a pure function of (seed, draw index):
 * a Weyl step over the index fed through a 32-bit avalanche mixer.
 */

const GOLDEN_GAMMA = 0x9e3779b9;

/** 32-bit finalizer (lowbias32). Returns an unsigned 32-bit integer. */
export function mix32(x: number): number {
  let h = x | 0;
  h ^= h >>> 16;
  h = Math.imul(h, 0x21f0aaad);
  h ^= h >>> 15;
  h = Math.imul(h, 0x735a2d97);
  h ^= h >>> 15;
  return h >>> 0;
}

/** Value of the draw at `index` for `seed`, without any state. */
export function drawAt(seed: number, index: number): number {
  const base = mix32(seed ^ 0x5bd1e995);
  return mix32((base + Math.imul(index + 1, GOLDEN_GAMMA)) | 0);
}

export interface DrawSource {
  /** Next unsigned 32-bit value; advances the counter by one. */
  next(): number;
  /** Number of draws taken so far. */
  readonly count: number;
}

export class SeededDrawSource implements DrawSource {
  private counter = 0;
  private readonly seed32: number;

  constructor(readonly seed: number) {
    // Seeds wider than 32 bits keep their low 32 bits.
    this.seed32 = Number(BigInt.asIntN(32, BigInt(Math.trunc(seed))));
  }

  next(): number {
    const value = drawAt(this.seed32, this.counter);
    this.counter += 1;
    return value;
  }

  get count(): number {
    return this.counter;
  }
}
