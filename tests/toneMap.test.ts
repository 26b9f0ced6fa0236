import assert from 'node:assert/strict';
import test from 'node:test';
import fc from 'fast-check';

import { labToSrgb } from '../src/render/colorSpaces.js';
import { encodePpm } from '../src/render/ppm.js';
import { softSaturate, sumToLab, toneMapGrid, toneMapPixel } from '../src/render/toneMap.js';

test('softSaturate maps zero to mid-range and stays inside (0, 1)', () => {
  assert.equal(softSaturate(0), 0.5);
  assert.equal(softSaturate(1), 0.75);
  assert.equal(softSaturate(-1), 0.25);
  fc.assert(
    fc.property(fc.double({ min: -1e6, max: 1e6, noNaN: true }), (value) => {
      const squashed = softSaturate(value);
      return squashed > 0 && squashed < 1;
    }),
  );
});

test('sums longer than the color cap are shrunk before squashing', () => {
  const capped = sumToLab({ r: 3, g: 4, b: 0 }, 1);
  assert.ok(Math.abs(capped.L - softSaturate(0.6) * 100) < 1e-12);
  assert.ok(Math.abs(capped.a - (softSaturate(0.8) * 255 - 128)) < 1e-12);
  assert.equal(capped.b, 0.5 * 255 - 128);
});

test('Lab extremes map to sRGB white and black', () => {
  const white = labToSrgb({ L: 100, a: 0, b: 0 });
  white.forEach((channel) => assert.ok(Math.abs(channel - 1) < 1e-3, `channel ${channel}`));
  assert.deepEqual(labToSrgb({ L: 0, a: 0, b: 0 }), [0, 0, 0]);
});

test('an empty pixel renders as mid grey', () => {
  assert.deepEqual(toneMapPixel({ r: 0, g: 0, b: 0 }, 2), [118, 119, 120]);
});

test('any sum along one axis beyond the cap renders the same color', () => {
  assert.deepEqual(toneMapPixel({ r: 2, g: 0, b: 0 }, 2), [206, 208, 208]);
  assert.deepEqual(toneMapPixel({ r: 1000, g: 0, b: 0 }, 2), [206, 208, 208]);
});

test('toneMapGrid writes opaque RGBA pixels in grid order', () => {
  const data = new Float64Array(2 * 2 * 3);
  data[3] = 2;
  const rgba = toneMapGrid({ size: 2, data }, 2);
  assert.equal(rgba.length, 16);
  assert.deepEqual(Array.from(rgba.slice(0, 8)), [118, 119, 120, 255, 206, 208, 208, 255]);
  assert.deepEqual(Array.from(rgba.slice(12, 16)), [118, 119, 120, 255]);
});

test('encodePpm writes a P6 header followed by RGB triples', () => {
  const rgba = new Uint8ClampedArray([1, 2, 3, 255, 4, 5, 6, 255]);
  const bytes = encodePpm(rgba, 2, 1);
  const header = 'P6\n2 1\n255\n';
  assert.equal(new TextDecoder().decode(bytes.slice(0, header.length)), header);
  assert.deepEqual(Array.from(bytes.slice(header.length)), [1, 2, 3, 4, 5, 6]);
  assert.throws(() => encodePpm(rgba, 2, 2), RangeError);
});
