import assert from 'node:assert/strict';
import test from 'node:test';

import { DEFAULT_CONFIG } from '../src/config/defaults.js';
import {
  ConfigurationError,
  assertValidConfig,
  formatIssue,
  hasErrors,
  resolveConfig,
  validateConfig,
  validateDistribution,
} from '../src/config/schema.js';
import type { ConfigIssue } from '../src/config/types.js';

const codes = (issues: readonly ConfigIssue[]) => issues.map((issue) => issue.code);

test('default configuration is valid', () => {
  const { config, issues } = resolveConfig({});
  assert.deepEqual(issues, []);
  assert.deepEqual(config, DEFAULT_CONFIG);
  assert.deepEqual(assertValidConfig(DEFAULT_CONFIG), DEFAULT_CONFIG);
});

test('partial input is merged over the defaults', () => {
  const config = validateConfig({ size: 300, numStreams: 10, decayDist: { kind: 'constant', value: 5 } });
  assert.equal(config.size, 300);
  assert.equal(config.numStreams, 10);
  assert.deepEqual(config.decayDist, { kind: 'constant', value: 5 });
  assert.equal(config.numForces, DEFAULT_CONFIG.numForces);
  assert.deepEqual(config.forceKinds, DEFAULT_CONFIG.forceKinds);
});

test('numeric fields are range checked', () => {
  const { issues } = resolveConfig({
    size: 0,
    seed: -1,
    numStreams: 2.5,
    velocityCap: 0,
    colorCap: 'bright',
    shards: 0,
  });
  assert.deepEqual(
    issues.map((issue) => `${issue.code} ${issue.path.join('.')}`),
    [
      'config/range size',
      'config/range seed',
      'config/integer numStreams',
      'config/range velocityCap',
      'config/number colorCap',
      'config/range shards',
    ],
  );
  assert.ok(hasErrors(issues));
});

test('seeds above 32 bits are rejected', () => {
  const { issues } = resolveConfig({ seed: 0x100000000 });
  assert.deepEqual(codes(issues), ['config/range']);
  assert.equal(issues[0]?.message, 'seed must be at most 4294967295');
});

test('distribution parameters are validated with their paths', () => {
  const issues: ConfigIssue[] = [];
  assert.equal(validateDistribution({ kind: 'normal', mean: 0, stdDev: 0 }, issues, ['decayDist']), null);
  assert.equal(
    validateDistribution({ kind: 'logNormal', norm: { mean: 'x', stdDev: 1 } }, issues, ['forceSpreadDist']),
    null,
  );
  assert.equal(validateDistribution({ kind: 'cauchy' }, issues, ['decayDist']), null);
  assert.equal(validateDistribution(3, issues, ['decayDist']), null);
  assert.deepEqual(
    issues.map((issue) => `${issue.code} ${issue.path.join('.')}`),
    [
      'distribution/scale decayDist.stdDev',
      'distribution/parameter forceSpreadDist.norm.mean',
      'distribution/kind decayDist.kind',
      'distribution/type decayDist',
    ],
  );
});

test('valid distributions are returned unchanged', () => {
  const issues: ConfigIssue[] = [];
  assert.deepEqual(validateDistribution({ kind: 'exp', lambdaInverse: 2 }, issues, ['decayDist']), {
    kind: 'exp',
    lambdaInverse: 2,
  });
  assert.deepEqual(
    validateDistribution({ kind: 'logNormal', norm: { mean: 1, stdDev: 0.5 } }, issues, ['decayDist']),
    { kind: 'logNormal', norm: { mean: 1, stdDev: 0.5 } },
  );
  assert.deepEqual(issues, []);
});

test('force spread must have strictly positive support', () => {
  const { issues } = resolveConfig({ forceSpreadDist: { kind: 'normal', mean: 10, stdDev: 1 } });
  assert.deepEqual(codes(issues), ['distribution/support']);
  assert.deepEqual(codes(resolveConfig({ forceSpreadDist: { kind: 'constant', value: 0 } }).issues), [
    'distribution/support',
  ]);
  assert.deepEqual(resolveConfig({ forceSpreadDist: { kind: 'constant', value: 3 } }).issues, []);
});

test('streams need at least one faucet', () => {
  assert.deepEqual(codes(resolveConfig({ numFaucets: 0 }).issues), ['config/faucets']);
  assert.deepEqual(resolveConfig({ numFaucets: 0, numStreams: 0 }).issues, []);
});

test('force kinds must be a non-empty list of known kinds', () => {
  assert.deepEqual(codes(resolveConfig({ forceKinds: [] }).issues), ['config/forceKinds']);
  const { issues } = resolveConfig({ forceKinds: ['inward', 'spiral'] });
  assert.deepEqual(issues[0]?.path, ['forceKinds', 1]);
  assert.deepEqual(validateConfig({ forceKinds: ['outward'] }).forceKinds, ['outward']);
});

test('unknown keys produce warnings, not errors', () => {
  const { issues } = resolveConfig({ colour: 'blue' });
  assert.deepEqual(issues, [
    {
      code: 'config/unknown-key',
      message: 'Unknown configuration key "colour"',
      path: ['colour'],
      severity: 'warning',
    },
  ]);
  assert.equal(hasErrors(issues), false);
});

test('non-object input is rejected as a whole', () => {
  assert.deepEqual(codes(resolveConfig([1, 2]).issues), ['config/type']);
  assert.deepEqual(codes(resolveConfig(null).issues), ['config/type']);
});

test('validateConfig throws a ConfigurationError carrying the errors only', () => {
  assert.throws(
    () => validateConfig({ size: -5, extra: true }),
    (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.equal(
        error.message,
        'Invalid configuration: size must be at least 1 (config/range @ size)',
      );
      assert.deepEqual(codes(error.issues), ['config/range']);
      return true;
    },
  );
});

test('issues format with code and path', () => {
  assert.equal(
    formatIssue({ code: 'config/type', message: 'Configuration must be an object', path: [], severity: 'error' }),
    'Configuration must be an object (config/type)',
  );
  assert.equal(
    formatIssue({ code: 'distribution/scale', message: 'stdDev must be strictly positive', path: ['decayDist', 'stdDev'], severity: 'error' }),
    'stdDev must be strictly positive (distribution/scale @ decayDist.stdDev)',
  );
});
