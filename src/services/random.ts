// ─────────────────────────────────────────────────────────────────────────────
// Random: Injectable uniform random sources
// ─────────────────────────────────────────────────────────────────────────────

/** Returns a number in [0, 1), like Math.random */
export type RandomSource = () => number

const LCG_MODULUS = 0x80000000

/**
 * Create a deterministic random source (31-bit linear congruential generator).
 * The same seed always yields the same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = Math.floor(Math.abs(seed)) % LCG_MODULUS
  return () => {
    state = (Math.imul(state, 1103515245) + 12345) & 0x7fffffff
    return state / LCG_MODULUS
  }
}

/**
 * Draw uniformly from [min, max).
 */
export function uniform(random: RandomSource, min: number, max: number): number {
  return min + (max - min) * random()
}
