/**
 * Mulberry32 seeded PRNG producing values in [0, 1).
 * Drives the demo feed and the randomized buffer tests.
 */
export function makePrng(seed: number): () => number {
  let s = seed >>> 0
  return () => {
    s += 0x6d2b79f5
    let z = s
    z = Math.imul(z ^ (z >>> 15), z | 1)
    z ^= z + Math.imul(z ^ (z >>> 7), z | 61)
    return ((z ^ (z >>> 14)) >>> 0) / 0x100000000
  }
}

/** Uniform value in [lo, hi). */
export function between(rand: () => number, lo: number, hi: number): number {
  return lo + rand() * (hi - lo)
}
