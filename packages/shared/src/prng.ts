/** A source of uniform draws in [0, 1). `Math.random` qualifies. */
export type RandomSource = () => number;

/** Tiny mulberry32 PRNG for reproducible mazes without deps. */
export function prng(seed: number): RandomSource {
  let t = seed >>> 0;
  return () => {
    t += 0x6D2B79F5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

export function seedFromHex(hex: string) {
  // first 8 hex chars
  return parseInt(hex.slice(0, 8), 16) >>> 0;
}

/** Uniform index into a list of `n` candidates. */
export function pickIndex(rnd: RandomSource, n: number) {
  return Math.min(n - 1, Math.floor(rnd() * n));
}
