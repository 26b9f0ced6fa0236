import { countNonZeroPixels, type Grid } from '../canvas/accumulator.js';
import type { StreamfallConfig } from '../config/types.js';
import { hashBytes, hashCanonicalJson, writeCanonicalJson } from '../serialization/canonicalJson.js';
import type { RunResult, RunStats } from './orchestrator.js';

export type RunReport = {
  config: StreamfallConfig;
  stats: RunStats;
  canvas: {
    size: number;
    /** Componentwise extremes of the accumulated sums. */
    min: number;
    max: number;
    nonZeroPixels: number;
  };
  digests: {
    /** BLAKE3-256 of the canonical JSON of the configuration. */
    config: string;
    /** BLAKE3-256 of the grid as little-endian float64 values. */
    grid: string;
  };
};

export const gridBytes = (grid: Grid): Uint8Array => {
  const bytes = new Uint8Array(grid.data.length * 8);
  const view = new DataView(bytes.buffer);
  for (let i = 0; i < grid.data.length; i++) {
    view.setFloat64(i * 8, grid.data[i], true);
  }
  return bytes;
};

export const gridDigest = (grid: Grid): string => hashBytes(gridBytes(grid));

export const configDigest = (config: StreamfallConfig): string => hashCanonicalJson(config).hash;

const summarizeGrid = (grid: Grid): RunReport['canvas'] => {
  let min = 0;
  let max = 0;
  for (const value of grid.data) {
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return { size: grid.size, min, max, nonZeroPixels: countNonZeroPixels(grid) };
};

export const createRunReport = (config: StreamfallConfig, result: RunResult): RunReport => ({
  config,
  stats: result.stats,
  canvas: summarizeGrid(result.grid),
  digests: {
    config: configDigest(config),
    grid: gridDigest(result.grid),
  },
});

export const writeRunReport = (report: RunReport): string =>
  writeCanonicalJson(report, { indent: 2 });
