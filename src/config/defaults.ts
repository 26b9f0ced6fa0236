import {
  exponential,
  logNormalFromMedian,
  normal,
} from '../random/distributions.js';
import { FORCE_KIND_NAMES, type StreamfallConfig } from './types.js';

const DEFAULT_SIZE = 1000;

export const DEFAULT_CONFIG: StreamfallConfig = Object.freeze({
  size: DEFAULT_SIZE,
  seed: 0,
  numForces: 200,
  forceStrengthDist: logNormalFromMedian(10, 2),
  forceSpreadDist: logNormalFromMedian(200, 2),
  numFaucets: 40,
  faucetColorCenterDist: normal(0, 0.03),
  faucetColorSpreadDist: exponential(0.03),
  faucetPositionSpreadDist: exponential(80),
  faucetVelocitySpreadDist: exponential(1),
  numStreams: 100_000,
  decayDist: exponential(DEFAULT_SIZE),
  maxDecayFactor: 10 * DEFAULT_SIZE,
  velocityCap: 40,
  colorCap: 2,
  forceKinds: FORCE_KIND_NAMES,
  decayCutoff: 10,
  escapeMargin: 0,
  shards: 1,
});
