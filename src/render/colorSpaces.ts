const clamp01 = (value: number): number => (value < 0 ? 0 : value > 1 ? 1 : value);

// D65 reference white.
const WHITE_X = 0.95047;
const WHITE_Y = 1.0;
const WHITE_Z = 1.08883;

const LAB_EPSILON = 6 / 29;

export type Lab = { L: number; a: number; b: number };

export const linearToSrgb = (value: number): number => {
  const clamped = clamp01(value);
  if (clamped <= 0.0031308) {
    return clamped * 12.92;
  }
  return 1.055 * Math.pow(clamped, 1 / 2.4) - 0.055;
};

const labInverse = (t: number): number =>
  t > LAB_EPSILON ? t * t * t : 3 * LAB_EPSILON * LAB_EPSILON * (t - 4 / 29);

export const labToXyz = ({ L, a, b }: Lab): [number, number, number] => {
  const fy = (L + 16) / 116;
  const fx = fy + a / 500;
  const fz = fy - b / 200;
  return [WHITE_X * labInverse(fx), WHITE_Y * labInverse(fy), WHITE_Z * labInverse(fz)];
};

export const xyzToLinearSrgb = (x: number, y: number, z: number): [number, number, number] => [
  3.2404542 * x - 1.5371385 * y - 0.4985314 * z,
  -0.969266 * x + 1.8760108 * y + 0.041556 * z,
  0.0556434 * x - 0.2040259 * y + 1.0572252 * z,
];

/** CIELAB to gamma-encoded sRGB, each channel clamped to [0, 1]. */
export const labToSrgb = (lab: Lab): [number, number, number] => {
  const [x, y, z] = labToXyz(lab);
  const [r, g, b] = xyzToLinearSrgb(x, y, z);
  return [linearToSrgb(r), linearToSrgb(g), linearToSrgb(b)];
};
