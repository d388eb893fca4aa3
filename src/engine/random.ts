export type RandomSource = () => number;

/**
 * Deterministic generator (mulberry32) for reproducible weight initialisation.
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRandom(seed?: number): RandomSource {
  return seed === undefined ? Math.random : seededRandom(seed);
}

// Box-Muller transform
export function gaussian(random: RandomSource, mean: number, stdDev: number): number {
  const u1 = 1 - random(); // (0, 1], keeps log finite
  const u2 = random();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return mean + z * stdDev;
}
