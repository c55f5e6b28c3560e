import { describe, it, expect } from 'vitest';
import { createHash } from 'node:crypto';
import { canonicalJson, sha256Hex, hashCanonical, digestOf } from './index.ts';

describe('canonicalJson', () => {
  it('sorts object keys recursively', () => {
    expect(canonicalJson({ b: 1, a: { d: true, c: 'x' } })).toBe('{"a":{"c":"x","d":true},"b":1}');
  });

  it('is independent of property insertion order', () => {
    const left = { scenarioId: 's', policy: { onIndeterminate: 'block' }, evidence: [] };
    const right = { evidence: [], policy: { onIndeterminate: 'block' }, scenarioId: 's' };
    expect(canonicalJson(left)).toBe(canonicalJson(right));
  });

  it('keeps array order', () => {
    expect(canonicalJson([3, 1, 2])).toBe('[3,1,2]');
  });

  it('sorts integer-like keys as strings', () => {
    expect(canonicalJson({ b: 1, '10': 2, '9': 3 })).toBe('{"10":2,"9":3,"b":1}');
    expect(canonicalJson({ z: { '2': true, a: null, '1': 'x' } })).toBe('{"z":{"1":"x","2":true,"a":null}}');
  });

  it('drops undefined object fields', () => {
    expect(canonicalJson({ a: 1, b: undefined })).toBe('{"a":1}');
  });

  it('rejects non-finite numbers', () => {
    expect(() => canonicalJson({ n: Number.NaN })).toThrow('Non-finite number at $.n');
    expect(() => canonicalJson([Infinity])).toThrow(TypeError);
  });

  it('rejects undefined array items and functions', () => {
    expect(() => canonicalJson([undefined])).toThrow('Undefined array item at $[0]');
    expect(() => canonicalJson({ f: () => 1 })).toThrow('Unsupported function at $.f');
  });
});

describe('hashing', () => {
  it('sha256Hex matches node crypto', () => {
    const expected = createHash('sha256').update('gate', 'utf-8').digest('hex');
    expect(sha256Hex('gate')).toBe(expected);
  });

  it('hashCanonical hashes the canonical form', () => {
    expect(hashCanonical({ b: 2, a: 1 })).toBe(sha256Hex('{"a":1,"b":2}'));
  });

  it('digestOf tags the algorithm', () => {
    const digest = digestOf('x');
    expect(digest.algorithm).toBe('sha256');
    expect(digest.value).toHaveLength(64);
  });
});
