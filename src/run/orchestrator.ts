import { CanvasAccumulator, type Grid } from '../canvas/accumulator.js';
import { assertValidConfig } from '../config/schema.js';
import type { StreamfallConfig } from '../config/types.js';
import {
  createFaucetSet,
  faucetIndexForStream,
  type FaucetSet,
} from '../faucets/faucetSet.js';
import { createForceField, type ForceField } from '../field/forceField.js';
import { createRandomSource, deriveSeed } from '../random/prng.js';
import { initStream, integrateStream, type TerminationReason } from '../stream/integrator.js';

export type ShardRange = {
  readonly index: number;
  /** First stream index, inclusive. */
  readonly start: number;
  /** Last stream index, exclusive. */
  readonly end: number;
};

export type RunProgress = {
  readonly completed: number;
  readonly total: number;
  readonly shard: number;
};

export type RunOptions = {
  onProgress?: (progress: RunProgress) => void;
  /** Streams between progress callbacks (default: one tenth of the run). */
  progressInterval?: number;
};

export type RunStats = {
  streams: number;
  steps: number;
  maxSteps: number;
  deposits: number;
  terminations: Record<TerminationReason, number>;
  streamsPerFaucet: number[];
  shards: number;
};

export type RunResult = {
  readonly grid: Grid;
  readonly field: ForceField;
  readonly faucetSet: FaucetSet;
  readonly stats: RunStats;
};

export type ShardResult = {
  readonly canvas: CanvasAccumulator;
  readonly stats: RunStats;
};

/** Contiguous stream ranges whose lengths differ by at most one. */
export const partitionStreams = (numStreams: number, shards: number): ShardRange[] => {
  const count = Math.max(1, Math.floor(shards));
  const base = Math.floor(numStreams / count);
  const remainder = numStreams % count;
  const ranges: ShardRange[] = [];
  let start = 0;
  for (let index = 0; index < count; index++) {
    const end = start + base + (index < remainder ? 1 : 0);
    ranges.push({ index, start, end });
    start = end;
  }
  return ranges;
};

const createStats = (numFaucets: number, shards: number): RunStats => ({
  streams: 0,
  steps: 0,
  maxSteps: 0,
  deposits: 0,
  terminations: { outOfBounds: 0, decayed: 0 },
  streamsPerFaucet: new Array<number>(numFaucets).fill(0),
  shards,
});

const mergeStats = (target: RunStats, source: RunStats) => {
  target.streams += source.streams;
  target.steps += source.steps;
  target.maxSteps = Math.max(target.maxSteps, source.maxSteps);
  target.deposits += source.deposits;
  target.terminations.outOfBounds += source.terminations.outOfBounds;
  target.terminations.decayed += source.terminations.decayed;
  source.streamsPerFaucet.forEach((count, index) => {
    target.streamsPerFaucet[index] += count;
  });
};

/**
 * Integrates the streams of one shard on its own canvas and random sub-stream,
 * so shards can run in any order (or on separate workers) and still merge to
 * the same grid.
 */
export const runShard = (
  config: StreamfallConfig,
  field: ForceField,
  faucetSet: FaucetSet,
  range: ShardRange,
  options: RunOptions = {},
): ShardResult => {
  const rng = createRandomSource(deriveSeed(config.seed, range.index));
  const canvas = new CanvasAccumulator(config.size);
  const stats = createStats(faucetSet.faucets.length, 1);
  const total = range.end - range.start;
  const interval = Math.max(1, Math.floor(options.progressInterval ?? total / 10));

  for (let streamIndex = range.start; streamIndex < range.end; streamIndex++) {
    const faucetIndex = faucetIndexForStream(streamIndex, faucetSet.faucets.length);
    const state = initStream(faucetSet.faucets[faucetIndex], config, rng);
    const outcome = integrateStream(state, field, canvas, config);
    stats.streams += 1;
    stats.steps += outcome.steps;
    stats.maxSteps = Math.max(stats.maxSteps, outcome.steps);
    stats.deposits += outcome.deposits;
    stats.terminations[outcome.reason] += 1;
    stats.streamsPerFaucet[faucetIndex] += 1;

    const completed = streamIndex - range.start + 1;
    if (options.onProgress && (completed % interval === 0 || completed === total)) {
      options.onProgress({ completed, total, shard: range.index });
    }
  }
  return { canvas, stats };
};

export const runSimulation = (input: StreamfallConfig, options: RunOptions = {}): RunResult => {
  const config = assertValidConfig(input);
  const rng = createRandomSource(config.seed);
  const field = createForceField(config, rng);
  const faucetSet = createFaucetSet(config, rng);

  const ranges = partitionStreams(config.numStreams, config.shards);
  const canvas = new CanvasAccumulator(config.size);
  const stats = createStats(faucetSet.faucets.length, ranges.length);
  for (const range of ranges) {
    const shard = runShard(config, field, faucetSet, range, options);
    canvas.merge(shard.canvas);
    mergeStats(stats, shard.stats);
  }

  return { grid: canvas.finalize(), field, faucetSet, stats };
};
