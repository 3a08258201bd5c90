export type Rng = () => number;

export function mulberry32(seed: number): Rng {
  let t = seed >>> 0;
  return function () {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), t | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/** Seeded generator when a seed is given, otherwise Math.random. */
export function createRng(seed?: number): Rng {
  if (seed === undefined) {
    return Math.random;
  }
  return mulberry32(seed);
}
