/**
 * Seedable random source shared by the health-status sampler, the
 * rule-based answer provider and the lab value generator.
 */

export type RandomFn = () => number;

export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
  /** Uniform integer in [min, max], inclusive */
  int(min: number, max: number): number;
  pick<T>(values: readonly T[]): T;
  weightedPick<T>(entries: ReadonlyArray<{ value: T; weight: number }>): T;
  /** Normally distributed float (Box-Muller) */
  normal(mean: number, stdDev: number): number;
  /** `count` distinct items, kept in their original order */
  sample<T>(values: readonly T[], count: number): T[];
}

// mulberry32
export const createSeededRandom = (seed: number): RandomFn => {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
};

export const randomSeed = (): number => Math.floor(Math.random() * 0x100000000);

export function createRandomSource(seedOrFn: number | RandomFn): RandomSource {
  const rnd = typeof seedOrFn === 'number' ? createSeededRandom(seedOrFn) : seedOrFn;

  const int = (min: number, max: number): number => {
    if (max < min) {
      throw new RangeError(`Invalid integer range [${min}, ${max}]`);
    }
    return min + Math.floor(rnd() * (max - min + 1));
  };

  return {
    next: rnd,
    int,
    pick<T>(values: readonly T[]): T {
      if (values.length === 0) {
        throw new RangeError('Cannot pick from an empty list');
      }
      return values[int(0, values.length - 1)];
    },
    weightedPick<T>(entries: ReadonlyArray<{ value: T; weight: number }>): T {
      const usable = entries.filter((entry) => entry.weight > 0);
      if (usable.length === 0) {
        throw new RangeError('Cannot pick from entries without positive weight');
      }
      const total = usable.reduce((sum, entry) => sum + entry.weight, 0);
      const target = rnd() * total;
      let cumulative = 0;
      for (const entry of usable) {
        cumulative += entry.weight;
        if (target < cumulative) {
          return entry.value;
        }
      }
      return usable[usable.length - 1].value;
    },
    normal(mean: number, stdDev: number): number {
      // 1 - u keeps the log argument in (0, 1]
      const u1 = 1 - rnd();
      const u2 = rnd();
      const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
      return mean + z * stdDev;
    },
    sample<T>(values: readonly T[], count: number): T[] {
      if (count >= values.length) {
        return [...values];
      }
      const indices = values.map((_, index) => index);
      // Partial Fisher-Yates over the index list
      for (let i = 0; i < count; i++) {
        const j = int(i, indices.length - 1);
        [indices[i], indices[j]] = [indices[j], indices[i]];
      }
      return indices
        .slice(0, Math.max(0, count))
        .sort((a, b) => a - b)
        .map((index) => values[index]);
    },
  };
}
