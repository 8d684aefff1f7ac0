/**
 * Deterministic random source for reproducible vocabularies
 */

export type Rng = () => number;

export function mulberry32(seed: number): Rng {
  let t = seed >>> 0;
  return () => {
    t += 0x6D2B79F5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

/** Seeded source when a seed is given, Math.random otherwise */
export function createRng(seed?: number): Rng {
  return seed === undefined ? Math.random : mulberry32(seed);
}

/** Standard normal sample (Box-Muller) */
export function gaussian(rng: Rng): number {
  let u = 0;
  while (u === 0) {
    u = rng();
  }
  return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * rng());
}
