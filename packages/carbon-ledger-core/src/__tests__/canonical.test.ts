/**
 * Canonical serialization
 */

import {
  assertFieldMap,
  canonicalize,
  canonicalString,
  decodeStoredPayload,
  formatNumber,
  parseCanonical
} from '../canonical';
import { CanonicalizationError } from '../errors';

describe('canonicalString', () => {
  it('sorts keys and emits no whitespace', () => {
    expect(canonicalString({ b: 1, a: 'x' })).toBe('{"a":"x","b":1}');
  });

  it('is independent of key insertion order', () => {
    const first = canonicalString({ scope: 'scope1', emissions_kg: 100, supplier: 'Acme' });
    const second = canonicalString({ supplier: 'Acme', emissions_kg: 100, scope: 'scope1' });
    expect(first).toBe(second);
  });

  it('sorts nested objects and keeps array order', () => {
    const text = canonicalString({ z: { y: 2, x: [3, { b: null, a: true }] } });
    expect(text).toBe('{"z":{"x":[3,{"a":true,"b":null}],"y":2}}');
  });

  it('writes null explicitly', () => {
    expect(canonicalString({ supplier: null })).toBe('{"supplier":null}');
  });

  it('escapes strings the way JSON.stringify does', () => {
    const value = 'line\n"quoted" é';
    expect(canonicalString({ s: value })).toBe(`{"s":${JSON.stringify(value)}}`);
  });

  it('returns UTF-8 bytes from canonicalize', () => {
    const bytes = canonicalize({ city: 'Zürich' });
    expect(bytes.toString('utf8')).toBe('{"city":"Zürich"}');
    expect(bytes.length).toBe(Buffer.byteLength('{"city":"Zürich"}', 'utf8'));
  });

  it('rejects NaN and Infinity with the JSON path', () => {
    expect(() => canonicalString({ reading: { value: NaN } })).toThrow(CanonicalizationError);
    expect(() => canonicalString({ reading: { value: NaN } })).toThrow('Non-finite number NaN at $.reading.value');
    expect(() => canonicalString({ values: [1, Infinity] })).toThrow('at $.values[1]');
  });
});

describe('formatNumber', () => {
  it('writes -0 as 0', () => {
    expect(formatNumber(-0)).toBe('0');
    expect(canonicalString({ v: -0 })).toBe('{"v":0}');
  });

  it('keeps ordinary decimals', () => {
    expect(formatNumber(123.45)).toBe('123.45');
    expect(formatNumber(-7)).toBe('-7');
  });

  it('expands large exponents', () => {
    expect(formatNumber(1e21)).toBe('1000000000000000000000');
    expect(formatNumber(1.23e25)).toBe('12300000000000000000000000');
  });

  it('expands small exponents', () => {
    expect(formatNumber(1e-7)).toBe('0.0000001');
    expect(formatNumber(1.5e-7)).toBe('0.00000015');
    expect(formatNumber(-2.5e-8)).toBe('-0.000000025');
  });
});

describe('assertFieldMap', () => {
  it('rejects non-object payloads', () => {
    expect(() => assertFieldMap([1, 2])).toThrow('Payload must be a plain object at $');
    expect(() => assertFieldMap('text')).toThrow(CanonicalizationError);
  });

  it('rejects undefined instead of dropping it', () => {
    expect(() => assertFieldMap({ a: 1, b: undefined })).toThrow('Undefined values are not representable at $.b');
  });

  it('rejects bigint, functions and dates', () => {
    expect(() => assertFieldMap({ n: BigInt(1) })).toThrow('BigInt values are not representable at $.n');
    expect(() => assertFieldMap({ f: () => 1 })).toThrow('function values are not representable at $.f');
    expect(() => assertFieldMap({ when: new Date(0) })).toThrow('[object Date] is not representable at $.when');
  });

  it('rejects cycles', () => {
    const node: Record<string, unknown> = { name: 'loop' };
    node.self = node;
    expect(() => assertFieldMap(node)).toThrow('Cyclic structure at $.self');
  });

  it('allows the same object twice when it is not a cycle', () => {
    const shared = { unit: 'kg' };
    expect(() => assertFieldMap({ a: shared, b: shared })).not.toThrow();
  });
});

describe('parseCanonical', () => {
  it('parses canonical text back into an equal payload', () => {
    const payload = { emissions_kg: 0.0000001, tags: ['a', 'b'], meta: { ok: true } };
    const parsed = parseCanonical(canonicalString(payload));
    expect(parsed).toEqual(payload);
    expect(canonicalString(parsed)).toBe(canonicalString(payload));
  });

  it('rejects text that is not an object', () => {
    expect(() => parseCanonical('[1,2]')).toThrow(CanonicalizationError);
  });
});

describe('decodeStoredPayload', () => {
  it('decodes canonical text without an error', () => {
    expect(decodeStoredPayload('{"emissions_kg":100}')).toEqual({ payload: { emissions_kg: 100 } });
  });

  it('reports text that no longer decodes instead of throwing', () => {
    expect(decodeStoredPayload('{"emissions_kg":1e999}')).toEqual({
      payload: {},
      payloadError: 'Non-finite number Infinity at $.emissions_kg'
    });

    const broken = decodeStoredPayload('{"emissions_kg":');
    expect(broken.payload).toEqual({});
    expect(broken.payloadError).toEqual(expect.any(String));
  });
});
