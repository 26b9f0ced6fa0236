export type RandomSource = {
  /** Uniform draw in [0, 1). */
  next(): number;
  /** Standard normal draw; Box–Muller pairs are cached so every other call is free. */
  normal(): number;
};

const toUint32 = (value: number): number => Math.trunc(value) >>> 0;

export const hash32 = (value: number): number => {
  let x = toUint32(value);
  x ^= x >>> 16;
  x = Math.imul(x, 0x7feb352d);
  x ^= x >>> 15;
  x = Math.imul(x, 0x846ca68b);
  x ^= x >>> 16;
  return x >>> 0;
};

/** Seed of the independent sub-stream used by shard `index` of a run seeded with `seed`. */
export const deriveSeed = (seed: number, index: number): number =>
  hash32(hash32(seed) ^ Math.imul(toUint32(index) + 1, 0x9e3779b9));

const mulberry32 = (seed: number) => {
  let t = toUint32(seed);
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
};

export const createRandomSource = (seed: number): RandomSource => {
  const uniform = mulberry32(seed);
  let spare: number | null = null;
  return {
    next: uniform,
    normal: () => {
      if (spare != null) {
        const value = spare;
        spare = null;
        return value;
      }
      let u = 0;
      let v = 0;
      while (u === 0) u = uniform();
      while (v === 0) v = uniform();
      const mag = Math.sqrt(-2.0 * Math.log(u));
      spare = mag * Math.sin(2 * Math.PI * v);
      return mag * Math.cos(2 * Math.PI * v);
    },
  };
};
