/**
 * Seeded PRNG for reproducible projections. Generators are passed into the projectors as values.
 */

export type RandomSource = {
  /** Uniform in [0, 1). */
  next: () => number;
  /** Normal(mean, sd). */
  normal: (mean: number, sd: number) => number;
};

/** mulberry32: 32-bit state, returns 0–1. */
function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return function next() {
    let t = (state = (state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Creates a generator; normal draws use Box–Muller and cache the second variate.
 */
export function createSeededRandom(seed: number): RandomSource {
  const next = mulberry32(seed);
  let spare: number | null = null;

  const standardNormal = (): number => {
    if (spare !== null) {
      const z = spare;
      spare = null;
      return z;
    }
    let u = 0;
    while (u === 0) u = next();
    const v = next();
    const r = Math.sqrt(-2 * Math.log(u));
    spare = r * Math.sin(2 * Math.PI * v);
    return r * Math.cos(2 * Math.PI * v);
  };

  return {
    next,
    normal: (mean, sd) => mean + sd * standardNormal(),
  };
}
