/**
 * Counter-based deterministic RNG for the simulator.
 * The same seed always yields the same sequence.
 */

export interface RngState {
  seed: string
  counter: number
}

export function createRng(seed: string): RngState {
  return {
    seed,
    counter: 0,
  }
}

// Simple deterministic hash function (cyrb53)
function hash(str: string): number {
  let h1 = 0xdeadbeef
  let h2 = 0x41c6ce57
  for (let i = 0; i < str.length; i++) {
    const ch = str.charCodeAt(i)
    h1 = Math.imul(h1 ^ ch, 2654435761)
    h2 = Math.imul(h2 ^ ch, 1597334677)
  }
  h1 = Math.imul(h1 ^ (h1 >>> 16), 2246822507)
  h1 ^= Math.imul(h2 ^ (h2 >>> 13), 3266489909)
  h2 = Math.imul(h2 ^ (h2 >>> 16), 2246822507)
  h2 ^= Math.imul(h1 ^ (h1 >>> 13), 3266489909)
  return 4294967296 * (2097151 & h2) + (h1 >>> 0)
}

/**
 * Next value in [0, 1).
 */
export function nextFloat(rng: RngState): number {
  const value = (hash(`${rng.seed}:${rng.counter}`) % 1000000) / 1000000
  rng.counter++
  return value
}

/**
 * Integer in [min, max], both inclusive.
 */
export function rollInt(rng: RngState, min: number, max: number): number {
  return min + Math.floor(nextFloat(rng) * (max - min + 1))
}

export function rollChance(rng: RngState, probability: number): boolean {
  return nextFloat(rng) < probability
}

/**
 * Pick one element, or undefined from an empty list.
 */
export function pick<T>(rng: RngState, values: readonly T[]): T | undefined {
  if (values.length === 0) return undefined
  return values[rollInt(rng, 0, values.length - 1)]
}
