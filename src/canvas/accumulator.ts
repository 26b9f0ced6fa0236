import type { Color3 } from '../geometry/vec.js';

export const CHANNELS = 3;

/** Row-major per-pixel channel sums: index `(y * size + x) * 3 + channel`. */
export type Grid = {
  readonly size: number;
  readonly data: Float64Array;
};

export class CanvasAccumulator {
  readonly size: number;
  private readonly data: Float64Array;
  private deposits = 0;

  constructor(size: number) {
    if (!Number.isSafeInteger(size) || size < 1) {
      throw new RangeError(`Canvas size must be a positive integer (received ${size})`);
    }
    this.size = size;
    this.data = new Float64Array(size * size * CHANNELS);
  }

  /** Adds `color` into pixel (x, y); pixels outside the canvas are ignored. */
  add(x: number, y: number, color: Color3): boolean {
    if (!Number.isInteger(x) || !Number.isInteger(y)) return false;
    if (x < 0 || y < 0 || x >= this.size || y >= this.size) return false;
    const idx = (y * this.size + x) * CHANNELS;
    this.data[idx] += color.r;
    this.data[idx + 1] += color.g;
    this.data[idx + 2] += color.b;
    this.deposits += 1;
    return true;
  }

  /** Sum at pixel (x, y), or null outside the canvas. */
  get(x: number, y: number): Color3 | null {
    if (!Number.isInteger(x) || !Number.isInteger(y)) return null;
    if (x < 0 || y < 0 || x >= this.size || y >= this.size) return null;
    const idx = (y * this.size + x) * CHANNELS;
    return { r: this.data[idx], g: this.data[idx + 1], b: this.data[idx + 2] };
  }

  get depositCount(): number {
    return this.deposits;
  }

  merge(other: CanvasAccumulator): void {
    if (other.size !== this.size) {
      throw new RangeError(`Cannot merge a ${other.size}px canvas into a ${this.size}px canvas`);
    }
    const source = other.data;
    for (let i = 0; i < this.data.length; i++) {
      this.data[i] += source[i];
    }
    this.deposits += other.deposits;
  }

  finalize(): Grid {
    return { size: this.size, data: this.data.slice() };
  }
}

export const gridPixel = (grid: Grid, x: number, y: number): Color3 => {
  const idx = (y * grid.size + x) * CHANNELS;
  return { r: grid.data[idx], g: grid.data[idx + 1], b: grid.data[idx + 2] };
};

export const countNonZeroPixels = (grid: Grid): number => {
  let count = 0;
  for (let idx = 0; idx < grid.data.length; idx += CHANNELS) {
    if (grid.data[idx] !== 0 || grid.data[idx + 1] !== 0 || grid.data[idx + 2] !== 0) {
      count += 1;
    }
  }
  return count;
};
