export interface Rng {
  /** Uniform float in [0, 1). */
  next(): number;
  /** Uniform integer in [0, maxExclusive). */
  nextInt(maxExclusive: number): number;
  pick<T>(items: readonly T[]): T;
}

/** mulberry32; the same seed gives the same stream on every platform. */
export function createRng(seed: number = Date.now()): Rng {
  let state = seed >>> 0;

  const next = (): number => {
    state |= 0;
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  const nextInt = (maxExclusive: number): number => Math.floor(next() * maxExclusive);

  return {
    next,
    nextInt,
    pick<T>(items: readonly T[]): T {
      if (items.length === 0) {
        throw new RangeError("Cannot pick from an empty list.");
      }
      const item = items[nextInt(items.length)];
      if (item === undefined) {
        throw new RangeError("Picked index fell outside the list.");
      }
      return item;
    },
  };
}
