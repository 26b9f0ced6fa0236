import type { StreamfallConfig } from '../config/types.js';
import { sampleDistribution } from '../random/distributions.js';
import type { RandomSource } from '../random/prng.js';
import { addVec, fromAngle, vec, type Color3, type Vec2 } from '../geometry/vec.js';

export type Faucet = {
  readonly position: Vec2;
  readonly velocity: Vec2;
  /** Signed color offset, not yet mapped to a display range. */
  readonly color: Color3;
  /** Standard deviation of each stream's start position around the faucet. */
  readonly positionJitter: number;
  /** Standard deviation of each stream's start velocity around the faucet's. */
  readonly velocityJitter: number;
};

export type FaucetSet = {
  readonly colorCenter: Color3;
  readonly faucets: readonly Faucet[];
};

type FaucetConfig = Pick<
  StreamfallConfig,
  | 'size'
  | 'numFaucets'
  | 'faucetColorCenterDist'
  | 'faucetColorSpreadDist'
  | 'faucetPositionSpreadDist'
  | 'faucetVelocitySpreadDist'
>;

const jitterChannel = (center: number, config: FaucetConfig, rng: RandomSource) =>
  center + sampleDistribution(config.faucetColorSpreadDist, rng) * rng.normal();

export const createFaucetSet = (config: FaucetConfig, rng: RandomSource): FaucetSet => {
  const colorCenter: Color3 = Object.freeze({
    r: sampleDistribution(config.faucetColorCenterDist, rng),
    g: sampleDistribution(config.faucetColorCenterDist, rng),
    b: sampleDistribution(config.faucetColorCenterDist, rng),
  });
  const canvasCenter = vec(config.size / 2, config.size / 2);
  const faucets: Faucet[] = [];
  for (let i = 0; i < config.numFaucets; i++) {
    const color: Color3 = {
      r: jitterChannel(colorCenter.r, config, rng),
      g: jitterChannel(colorCenter.g, config, rng),
      b: jitterChannel(colorCenter.b, config, rng),
    };
    const radius = sampleDistribution(config.faucetPositionSpreadDist, rng);
    const position = addVec(canvasCenter, fromAngle(rng.next() * 2 * Math.PI, radius));
    const speed = sampleDistribution(config.faucetVelocitySpreadDist, rng);
    const velocity = fromAngle(rng.next() * 2 * Math.PI, speed);
    const positionJitter = Math.abs(sampleDistribution(config.faucetPositionSpreadDist, rng));
    const velocityJitter = Math.abs(sampleDistribution(config.faucetVelocitySpreadDist, rng));
    faucets.push(Object.freeze({ position, velocity, color, positionJitter, velocityJitter }));
  }
  return Object.freeze({ colorCenter, faucets: Object.freeze(faucets) });
};

/** Round-robin assignment: stream `i` is emitted by faucet `i mod numFaucets`. */
export const faucetIndexForStream = (streamIndex: number, numFaucets: number): number => {
  if (numFaucets <= 0) {
    throw new RangeError('Cannot assign a stream without any faucets');
  }
  return streamIndex % numFaucets;
};

/** Number of streams each faucet emits; entries differ by at most one. */
export const faucetStreamCounts = (numStreams: number, numFaucets: number): number[] => {
  if (numFaucets <= 0) {
    return [];
  }
  const base = Math.floor(numStreams / numFaucets);
  const remainder = numStreams % numFaucets;
  return Array.from({ length: numFaucets }, (_, index) => base + (index < remainder ? 1 : 0));
};
