import { EconomyError } from "../utils/errors";

/** Returns a uniformly distributed number in [0, 1). */
export type RandomSource = () => number;

export interface Weighted {
  weight: number;
}

/**
 * Deterministic source (mulberry32) for reproducible draws in tests and
 * simulations. Not suitable where outcomes must be unpredictable.
 */
export const createSeededRandom = (seed: number): RandomSource => {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

export class WeightedSelector {
  constructor(private readonly random: RandomSource = Math.random) {}

  /**
   * Picks one candidate with probability weight / total weight.
   * Weights are relative: [1, 3] and [0.1, 0.3] behave the same.
   */
  select<T extends Weighted>(candidates: readonly T[]): T {
    if (candidates.length === 0) {
      throw new EconomyError("EmptyPool", "Cannot draw from an empty pool");
    }

    let total = 0;
    for (const candidate of candidates) {
      if (!Number.isFinite(candidate.weight) || candidate.weight <= 0) {
        throw new RangeError(`Invalid weight ${candidate.weight}`);
      }
      total += candidate.weight;
    }

    const point = this.random() * total;
    let cumulative = 0;
    for (const candidate of candidates) {
      cumulative += candidate.weight;
      if (point < cumulative) return candidate;
    }

    // Floating point sums can leave point == total
    return candidates[candidates.length - 1];
  }
}
