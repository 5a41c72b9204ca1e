/**
 * Source of the bounded synthetic draws used wherever real evidence is missing
 */
export interface SyntheticEstimator {
  /**
   * Draw a value in [min, max)
   */
  uniform(min: number, max: number): number
}

/**
 * Mulberry32 - fast deterministic PRNG
 */
function mulberry32(seed: number): () => number {
  let state = seed >>> 0
  return function () {
    let t = (state = (state + 0x6d2b79f5) >>> 0)
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/**
 * Seeded estimator: the same seed yields the same sequence of draws
 */
export class SeededEstimator implements SyntheticEstimator {
  private readonly next: () => number

  constructor(seed: number) {
    this.next = mulberry32(seed)
  }

  uniform(min: number, max: number): number {
    return min + (max - min) * this.next()
  }
}

/**
 * Estimator returning fixed fractions of each range, cycling through them.
 * `new FixedEstimator(0.5)` always answers the midpoint.
 */
export class FixedEstimator implements SyntheticEstimator {
  private readonly fractions: readonly number[]
  private index = 0

  constructor(fractions: number | readonly number[] = 0.5) {
    this.fractions = typeof fractions === 'number' ? [fractions] : fractions
    if (this.fractions.length === 0 || this.fractions.some(f => f < 0 || f > 1)) {
      throw new Error('Fractions must be a non-empty list of values in [0, 1]')
    }
  }

  uniform(min: number, max: number): number {
    const fraction = this.fractions[this.index % this.fractions.length]
    this.index++
    return min + (max - min) * fraction
  }
}
