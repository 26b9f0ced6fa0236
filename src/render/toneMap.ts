import { CHANNELS, type Grid } from '../canvas/accumulator.js';
import type { Color3 } from '../geometry/vec.js';
import { labToSrgb, type Lab } from './colorSpaces.js';

/** Maps any real value into (0, 1), 0 landing on 0.5. */
export const softSaturate = (value: number): number => 0.5 * (value / (1 + Math.abs(value))) + 0.5;

/**
 * Reads an accumulated color sum as a CIELAB offset from mid-grey: the sum is
 * first shrunk so its length is at most `colorCap`, then each channel is
 * squashed and spread over the L, a and b ranges.
 */
export const sumToLab = (sum: Color3, colorCap: number): Lab => {
  const length = Math.hypot(sum.r, sum.g, sum.b);
  const ratio = length > colorCap ? colorCap / length : 1;
  return {
    L: softSaturate(sum.r * ratio) * 100,
    a: softSaturate(sum.g * ratio) * 255 - 128,
    b: softSaturate(sum.b * ratio) * 255 - 128,
  };
};

export const toneMapPixel = (sum: Color3, colorCap: number): [number, number, number] => {
  const [r, g, b] = labToSrgb(sumToLab(sum, colorCap));
  return [Math.round(r * 255), Math.round(g * 255), Math.round(b * 255)];
};

/** RGBA8 image of the grid, alpha fully opaque. */
export const toneMapGrid = (grid: Grid, colorCap: number): Uint8ClampedArray => {
  const pixelCount = grid.size * grid.size;
  const out = new Uint8ClampedArray(pixelCount * 4);
  for (let pixel = 0; pixel < pixelCount; pixel++) {
    const src = pixel * CHANNELS;
    const [r, g, b] = toneMapPixel(
      { r: grid.data[src], g: grid.data[src + 1], b: grid.data[src + 2] },
      colorCap,
    );
    const dst = pixel * 4;
    out[dst] = r;
    out[dst + 1] = g;
    out[dst + 2] = b;
    out[dst + 3] = 255;
  }
  return out;
};
