import type { Distribution } from '../random/distributions.js';

export type ForceKindName = 'inward' | 'outward' | 'linear';

export const FORCE_KIND_NAMES: readonly ForceKindName[] = ['inward', 'outward', 'linear'] as const;

export type StreamfallConfig = {
  /** Canvas edge length in pixels; the canvas is square. */
  readonly size: number;
  /** 32-bit unsigned seed, 0 to 4294967295. */
  readonly seed: number;
  readonly numForces: number;
  readonly forceStrengthDist: Distribution;
  readonly forceSpreadDist: Distribution;
  readonly numFaucets: number;
  readonly faucetColorCenterDist: Distribution;
  readonly faucetColorSpreadDist: Distribution;
  readonly faucetPositionSpreadDist: Distribution;
  readonly faucetVelocitySpreadDist: Distribution;
  readonly numStreams: number;
  /** Per-stream e-folding length in pixels of travel, before clamping. */
  readonly decayDist: Distribution;
  readonly maxDecayFactor: number;
  readonly velocityCap: number;
  readonly colorCap: number;
  readonly forceKinds: readonly ForceKindName[];
  /** E-folds of decay after which a stream no longer contributes. */
  readonly decayCutoff: number;
  /** How far outside the canvas a stream may travel before it is dropped. */
  readonly escapeMargin: number;
  readonly shards: number;
};

/** Configuration as it appears in a JSON file: any subset of the fields. */
export type StreamfallConfigInput = {
  -readonly [K in keyof StreamfallConfig]?: StreamfallConfig[K];
};

export type ConfigIssue = {
  readonly code: string;
  readonly message: string;
  readonly path: readonly (string | number)[];
  readonly severity: 'error' | 'warning';
};
