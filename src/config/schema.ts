import {
  DISTRIBUTION_KINDS,
  type Distribution,
  type DistributionKind,
} from '../random/distributions.js';
import { DEFAULT_CONFIG } from './defaults.js';
import {
  FORCE_KIND_NAMES,
  type ConfigIssue,
  type ForceKindName,
  type StreamfallConfig,
} from './types.js';

export class ConfigurationError extends Error {
  readonly issues: readonly ConfigIssue[];

  constructor(message: string, issues: readonly ConfigIssue[]) {
    super(message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export type ConfigValidationResult = {
  readonly config: StreamfallConfig;
  readonly issues: readonly ConfigIssue[];
};

type Path = readonly (string | number)[];

const MAX_SEED = 0xffffffff;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isFiniteNumber = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value);

const pushIssue = (
  issues: ConfigIssue[],
  code: string,
  message: string,
  path: Path,
  severity: ConfigIssue['severity'] = 'error',
) => {
  issues.push({ code, message, path, severity });
};

const isDistributionKind = (value: unknown): value is DistributionKind =>
  DISTRIBUTION_KINDS.some((kind) => kind === value);

const isForceKindName = (value: unknown): value is ForceKindName =>
  FORCE_KIND_NAMES.some((kind) => kind === value);

const readFinite = (
  record: Record<string, unknown>,
  key: string,
  issues: ConfigIssue[],
  path: Path,
): number | null => {
  const value = record[key];
  if (!isFiniteNumber(value)) {
    pushIssue(issues, 'distribution/parameter', `${key} must be a finite number`, [...path, key]);
    return null;
  }
  return value;
};

const readScale = (
  record: Record<string, unknown>,
  key: string,
  issues: ConfigIssue[],
  path: Path,
): number | null => {
  const value = readFinite(record, key, issues, path);
  if (value === null) return null;
  if (value <= 0) {
    pushIssue(issues, 'distribution/scale', `${key} must be strictly positive`, [...path, key]);
    return null;
  }
  return value;
};

export const validateDistribution = (
  value: unknown,
  issues: ConfigIssue[],
  path: Path,
): Distribution | null => {
  if (!isRecord(value)) {
    pushIssue(issues, 'distribution/type', 'Distribution must be an object', path);
    return null;
  }
  const kind = value.kind;
  if (!isDistributionKind(kind)) {
    pushIssue(
      issues,
      'distribution/kind',
      `Distribution kind must be one of ${DISTRIBUTION_KINDS.join(', ')}`,
      [...path, 'kind'],
    );
    return null;
  }
  switch (kind) {
    case 'normal': {
      const mean = readFinite(value, 'mean', issues, path);
      const stdDev = readScale(value, 'stdDev', issues, path);
      return mean === null || stdDev === null ? null : { kind, mean, stdDev };
    }
    case 'logNormal': {
      const norm = value.norm;
      if (!isRecord(norm)) {
        pushIssue(issues, 'distribution/type', 'logNormal requires a norm object', [
          ...path,
          'norm',
        ]);
        return null;
      }
      const mean = readFinite(norm, 'mean', issues, [...path, 'norm']);
      const stdDev = readScale(norm, 'stdDev', issues, [...path, 'norm']);
      return mean === null || stdDev === null ? null : { kind, norm: { mean, stdDev } };
    }
    case 'exp': {
      const lambdaInverse = readScale(value, 'lambdaInverse', issues, path);
      return lambdaInverse === null ? null : { kind, lambdaInverse };
    }
    case 'constant': {
      const constantValue = readFinite(value, 'value', issues, path);
      return constantValue === null ? null : { kind, value: constantValue };
    }
  }
};

/** True when every draw of the distribution is strictly positive. */
const hasPositiveSupport = (dist: Distribution): boolean =>
  dist.kind === 'logNormal' || dist.kind === 'exp' || (dist.kind === 'constant' && dist.value > 0);

type NumberRule = {
  integer?: boolean;
  min?: number;
  exclusiveMin?: boolean;
  max?: number;
};

const validateNumber = (
  value: unknown,
  key: string,
  rule: NumberRule,
  issues: ConfigIssue[],
): number | null => {
  if (!isFiniteNumber(value)) {
    pushIssue(issues, 'config/number', `${key} must be a finite number`, [key]);
    return null;
  }
  if (rule.integer && !Number.isSafeInteger(value)) {
    pushIssue(issues, 'config/integer', `${key} must be an integer`, [key]);
    return null;
  }
  if (rule.min !== undefined) {
    const below = rule.exclusiveMin ? value <= rule.min : value < rule.min;
    if (below) {
      const bound = rule.exclusiveMin ? `greater than ${rule.min}` : `at least ${rule.min}`;
      pushIssue(issues, 'config/range', `${key} must be ${bound}`, [key]);
      return null;
    }
  }
  if (rule.max !== undefined && value > rule.max) {
    pushIssue(issues, 'config/range', `${key} must be at most ${rule.max}`, [key]);
    return null;
  }
  return value;
};

const NUMBER_RULES = {
  size: { integer: true, min: 1 },
  seed: { integer: true, min: 0, max: MAX_SEED },
  numForces: { integer: true, min: 0 },
  numFaucets: { integer: true, min: 0 },
  numStreams: { integer: true, min: 0 },
  maxDecayFactor: { min: 0 },
  velocityCap: { min: 0, exclusiveMin: true },
  colorCap: { min: 0, exclusiveMin: true },
  decayCutoff: { min: 0, exclusiveMin: true },
  escapeMargin: { min: 0 },
  shards: { integer: true, min: 1 },
} satisfies Record<string, NumberRule>;

type NumberKey = keyof typeof NUMBER_RULES;

const DISTRIBUTION_KEYS = [
  'forceStrengthDist',
  'forceSpreadDist',
  'faucetColorCenterDist',
  'faucetColorSpreadDist',
  'faucetPositionSpreadDist',
  'faucetVelocitySpreadDist',
  'decayDist',
] as const;

type DistributionKey = (typeof DISTRIBUTION_KEYS)[number];

const KNOWN_KEYS = new Set<string>([
  ...Object.keys(NUMBER_RULES),
  ...DISTRIBUTION_KEYS,
  'forceKinds',
]);

const validateForceKinds = (
  value: unknown,
  issues: ConfigIssue[],
): readonly ForceKindName[] | null => {
  if (!Array.isArray(value) || value.length === 0) {
    pushIssue(issues, 'config/forceKinds', 'forceKinds must be a non-empty array', ['forceKinds']);
    return null;
  }
  const kinds: ForceKindName[] = [];
  value.forEach((entry, index) => {
    if (isForceKindName(entry)) {
      kinds.push(entry);
    } else {
      pushIssue(
        issues,
        'config/forceKinds',
        `forceKinds entries must be one of ${FORCE_KIND_NAMES.join(', ')}`,
        ['forceKinds', index],
      );
    }
  });
  return kinds.length === value.length ? Object.freeze(kinds) : null;
};

/**
 * Merges `input` over `base` and validates every field. Issues of severity
 * "error" mean the returned config must not be used.
 */
export const resolveConfig = (
  input: unknown,
  base: StreamfallConfig = DEFAULT_CONFIG,
): ConfigValidationResult => {
  const issues: ConfigIssue[] = [];
  if (!isRecord(input)) {
    pushIssue(issues, 'config/type', 'Configuration must be an object', []);
    return { config: base, issues };
  }
  for (const key of Object.keys(input)) {
    if (!KNOWN_KEYS.has(key)) {
      pushIssue(issues, 'config/unknown-key', `Unknown configuration key "${key}"`, [key], 'warning');
    }
  }
  const merged: Record<string, unknown> = { ...base, ...input };

  const num = (key: NumberKey): number =>
    validateNumber(merged[key], key, NUMBER_RULES[key], issues) ?? base[key];
  const dist = (key: DistributionKey): Distribution =>
    validateDistribution(merged[key], issues, [key]) ?? base[key];

  const config: StreamfallConfig = Object.freeze({
    size: num('size'),
    seed: num('seed'),
    numForces: num('numForces'),
    forceStrengthDist: dist('forceStrengthDist'),
    forceSpreadDist: dist('forceSpreadDist'),
    numFaucets: num('numFaucets'),
    faucetColorCenterDist: dist('faucetColorCenterDist'),
    faucetColorSpreadDist: dist('faucetColorSpreadDist'),
    faucetPositionSpreadDist: dist('faucetPositionSpreadDist'),
    faucetVelocitySpreadDist: dist('faucetVelocitySpreadDist'),
    numStreams: num('numStreams'),
    decayDist: dist('decayDist'),
    maxDecayFactor: num('maxDecayFactor'),
    velocityCap: num('velocityCap'),
    colorCap: num('colorCap'),
    forceKinds: validateForceKinds(merged.forceKinds, issues) ?? base.forceKinds,
    decayCutoff: num('decayCutoff'),
    escapeMargin: num('escapeMargin'),
    shards: num('shards'),
  });

  if (!hasPositiveSupport(config.forceSpreadDist)) {
    pushIssue(
      issues,
      'distribution/support',
      'forceSpreadDist must only produce positive values (logNormal, exp, or a positive constant)',
      ['forceSpreadDist'],
    );
  }
  if (config.numStreams > 0 && config.numFaucets === 0) {
    pushIssue(issues, 'config/faucets', 'numFaucets must be positive when numStreams > 0', [
      'numFaucets',
    ]);
  }
  return { config, issues };
};

export const hasErrors = (issues: readonly ConfigIssue[]): boolean =>
  issues.some((issue) => issue.severity === 'error');

export const formatIssue = (issue: ConfigIssue): string =>
  `${issue.message} (${issue.code}${issue.path.length > 0 ? ` @ ${issue.path.join('.')}` : ''})`;

/** Throws a ConfigurationError carrying every error-severity issue, if there is one. */
export const throwOnErrors = (issues: readonly ConfigIssue[]): void => {
  const errors = issues.filter((issue) => issue.severity === 'error');
  if (errors.length > 0) {
    const detail = errors.map(formatIssue).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${detail}`, errors);
  }
};

/** Resolves `input` over `base` and throws unless the result is valid. */
export const validateConfig = (
  input: unknown,
  base: StreamfallConfig = DEFAULT_CONFIG,
): StreamfallConfig => {
  const { config, issues } = resolveConfig(input, base);
  throwOnErrors(issues);
  return config;
};

/** Checks an already-assembled configuration, e.g. one built in code rather than loaded. */
export const assertValidConfig = (config: StreamfallConfig): StreamfallConfig =>
  validateConfig(config, config);
