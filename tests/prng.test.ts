import assert from 'node:assert/strict';
import test from 'node:test';

import { createRandomSource, deriveSeed, hash32 } from '../src/random/prng.js';

const draw = (seed: number, count: number) => {
  const rng = createRandomSource(seed);
  return Array.from({ length: count }, () => rng.next());
};

test('random source replays the same sequence for the same seed', () => {
  assert.deepEqual(draw(1337, 64), draw(1337, 64));
  assert.notDeepEqual(draw(1337, 64), draw(1338, 64));
});

test('uniform draws stay in [0, 1)', () => {
  for (const value of draw(42, 10_000)) {
    assert.ok(value >= 0 && value < 1, `uniform draw out of range: ${value}`);
  }
});

test('normal draws have zero mean and unit variance', () => {
  const rng = createRandomSource(7);
  const count = 20_000;
  let sum = 0;
  let sumSq = 0;
  for (let i = 0; i < count; i++) {
    const value = rng.normal();
    sum += value;
    sumSq += value * value;
  }
  const mean = sum / count;
  const variance = sumSq / count - mean * mean;
  assert.ok(Math.abs(mean) < 0.05, `mean ${mean}`);
  assert.ok(Math.abs(variance - 1) < 0.05, `variance ${variance}`);
});

test('hash32 maps zero to zero and mixes neighbouring inputs apart', () => {
  assert.equal(hash32(0), 0);
  assert.notEqual(hash32(1), hash32(2));
  assert.ok(hash32(123) >= 0 && hash32(123) <= 0xffffffff);
});

test('derived sub-stream seeds are stable and distinct per shard', () => {
  assert.equal(deriveSeed(99, 3), deriveSeed(99, 3));
  const seeds = new Set([0, 1, 2, 3, 4, 5, 6, 7].map((index) => deriveSeed(99, index)));
  assert.equal(seeds.size, 8);
  assert.notEqual(deriveSeed(99, 0), deriveSeed(100, 0));
});
