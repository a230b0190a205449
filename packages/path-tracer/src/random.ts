/**
 * Uniform random sources.
 *
 * The integrator never touches a global generator: every call receives a
 * PRNG explicitly, so independent units of work can each own a stream.
 */

/** Uniform random source */
export interface PRNG {
  /** Returns a uniform random number in [0, 1) */
  random(): number
}

/** Simple mulberry32 PRNG for reproducible runs */
export function createPRNG(seed: number): PRNG {
  let s = seed | 0
  return {
    random() {
      s = (s + 0x6d2b79f5) | 0
      let t = Math.imul(s ^ (s >>> 15), 1 | s)
      t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296
    },
  }
}

/** Process-wide, unseeded stream. Output differs on every run. */
export const mathRandom: PRNG = {
  random: () => Math.random(),
}

/** Per-pixel generator factory */
export type PixelRandomFactory = (x: number, y: number) => PRNG

/**
 * Derive a 32-bit seed for pixel (x, y) of a frame seeded with `seed`.
 * Neighbouring pixels land on unrelated streams.
 */
export function pixelSeed(seed: number, x: number, y: number): number {
  let h = (seed ^ 0x9e3779b9) | 0
  h = Math.imul(h ^ (x + 0x7f4a7c15), 0x85ebca6b)
  h = Math.imul(h ^ (h >>> 13) ^ (y + 0x165667b1), 0xc2b2ae35)
  return (h ^ (h >>> 16)) | 0
}

/** One independent, reproducible generator per pixel. */
export function pixelStreams(seed: number): PixelRandomFactory {
  return (x, y) => createPRNG(pixelSeed(seed, x, y))
}
