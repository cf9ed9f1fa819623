export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

const hashSeed = (seed: string | number): number => {
  if (typeof seed === 'number') {
    return seed >>> 0;
  }

  let h = 1779033703 ^ seed.length;
  for (let i = 0; i < seed.length; i += 1) {
    h = Math.imul(h ^ seed.charCodeAt(i), 3432918353);
    h = (h << 13) | (h >>> 19);
  }
  return (h >>> 0) + 0x9e3779b9;
};

const mulberry32 = (seed: number): RandomSource => {
  let t = seed;
  return () => {
    t += 0x6d2b79f5;
    let x = Math.imul(t ^ (t >>> 15), 1 | t);
    x ^= x + Math.imul(x ^ (x >>> 7), 61 | x);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
};

/** Deterministic source for reproducible shuffles; the same seed always yields the same sequence. */
export const createSeededRandom = (seed: string | number): RandomSource => mulberry32(hashSeed(seed));

export const randomIndex = (length: number, random: RandomSource): number => Math.floor(random() * length);
