import type { RandomSource } from './prng.js';

export type NormalDistribution = {
  kind: 'normal';
  mean: number;
  stdDev: number;
};

export type LogNormalDistribution = {
  kind: 'logNormal';
  /** Distribution of the logarithm. */
  norm: { mean: number; stdDev: number };
};

export type ExponentialDistribution = {
  kind: 'exp';
  /** Mean of the distribution; the rate is its reciprocal. */
  lambdaInverse: number;
};

export type ConstantDistribution = {
  kind: 'constant';
  value: number;
};

export type Distribution =
  | NormalDistribution
  | LogNormalDistribution
  | ExponentialDistribution
  | ConstantDistribution;

export type DistributionKind = Distribution['kind'];

export const DISTRIBUTION_KINDS: readonly DistributionKind[] = [
  'normal',
  'logNormal',
  'exp',
  'constant',
] as const;

export const normal = (mean: number, stdDev: number): NormalDistribution => ({
  kind: 'normal',
  mean,
  stdDev,
});

export const exponential = (mean: number): ExponentialDistribution => ({
  kind: 'exp',
  lambdaInverse: mean,
});

export const constant = (value: number): ConstantDistribution => ({ kind: 'constant', value });

/**
 * Log-normal distribution described by its median and multiplicative spread:
 * roughly 68% of draws fall within `[median / spread, median * spread]`.
 */
export const logNormalFromMedian = (
  median: number,
  multiplicativeSpread: number,
): LogNormalDistribution => ({
  kind: 'logNormal',
  norm: { mean: Math.log(median), stdDev: Math.log(multiplicativeSpread) },
});

export const sampleDistribution = (dist: Distribution, rng: RandomSource): number => {
  switch (dist.kind) {
    case 'normal':
      return dist.mean + dist.stdDev * rng.normal();
    case 'logNormal':
      return Math.exp(dist.norm.mean + dist.norm.stdDev * rng.normal());
    case 'exp': {
      // u in (0, 1) keeps the draw finite and strictly positive.
      let u = 0;
      while (u === 0) u = rng.next();
      return -dist.lambdaInverse * Math.log(u);
    }
    case 'constant':
      return dist.value;
  }
};

export const distributionMean = (dist: Distribution): number => {
  switch (dist.kind) {
    case 'normal':
      return dist.mean;
    case 'logNormal':
      return Math.exp(dist.norm.mean + (dist.norm.stdDev * dist.norm.stdDev) / 2);
    case 'exp':
      return dist.lambdaInverse;
    case 'constant':
      return dist.value;
  }
};

export const describeDistribution = (dist: Distribution): string => {
  switch (dist.kind) {
    case 'normal':
      return `Normal(mean=${dist.mean}, stdDev=${dist.stdDev})`;
    case 'logNormal':
      return `LogNormal(mean=${dist.norm.mean}, stdDev=${dist.norm.stdDev})`;
    case 'exp':
      return `Exp(mean=${dist.lambdaInverse})`;
    case 'constant':
      return `Constant(${dist.value})`;
  }
};
