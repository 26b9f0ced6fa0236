import test from 'node:test';
import assert from 'node:assert/strict';

import {
  hashBytes,
  hashCanonicalJson,
  hashCanonicalJsonString,
  writeCanonicalJson,
} from '../src/serialization/canonicalJson.js';

test('canonical JSON sorts keys, drops undefined fields and normalizes -0', () => {
  const input = {
    beta: 2,
    alpha: {
      gamma: -0,
      skipped: undefined,
      delta: [1, undefined, -0],
    },
  };
  assert.equal(writeCanonicalJson(input), '{"alpha":{"delta":[1,null,0],"gamma":0},"beta":2}');
});

test('canonical JSON indents nested values when asked', () => {
  assert.equal(
    writeCanonicalJson({ b: 1, a: [1, 2] }, { indent: 2 }),
    '{\n  "a": [\n    1,\n    2\n  ],\n  "b": 1\n}',
  );
  assert.equal(writeCanonicalJson({ empty: [], none: {} }, { indent: 2 }), '{\n  "empty": [],\n  "none": {}\n}');
});

test('canonical JSON writes typed arrays as plain arrays', () => {
  assert.equal(
    writeCanonicalJson({ f: new Float64Array([0.5, -0]), u: new Uint8Array([7, 255]) }),
    '{"f":[0.5,0],"u":[7,255]}',
  );
});

test('canonical JSON rejects values JSON cannot carry', () => {
  assert.throws(() => writeCanonicalJson({ invalid: Number.POSITIVE_INFINITY }), /non-finite numbers/i);
  assert.throws(() => writeCanonicalJson({ invalid: Number.NaN }), /non-finite numbers/i);
  assert.throws(() => writeCanonicalJson({ when: new Date(0) }), TypeError);
  assert.throws(() => writeCanonicalJson({ call: () => 1 }), TypeError);
});

test('canonical JSON hashing is independent of key order', () => {
  const a = hashCanonicalJson({ x: 1, y: [1, 2, 3] });
  const b = hashCanonicalJson({ y: [1, 2, 3], x: 1 });
  assert.equal(a.json, b.json);
  assert.equal(a.hash, b.hash);
  assert.equal(hashCanonicalJsonString(a.json), a.hash);
  assert.notEqual(hashCanonicalJson({ x: 2, y: [1, 2, 3] }).hash, a.hash);
});

test('hashes are BLAKE3-256 hex digests', () => {
  assert.equal(
    hashBytes(new Uint8Array(0)),
    'af1349b9f5f9a1a6a0404dea36dcc9499bcb25c9adc112b7cc9a93cae41f3262',
  );
  const { hash } = hashCanonicalJson({ foo: 'bar' });
  assert.match(hash, /^[0-9a-f]{64}$/);
});
