/**
 * Canonical payload serialization
 *
 * Produces identical bytes for logically identical payloads:
 * - object keys sorted (UTF-16 code unit order), no whitespace
 * - strings escaped as JSON.stringify escapes them
 * - numbers finite only, -0 written as 0, always plain decimal notation
 * - null written explicitly; undefined is rejected rather than dropped
 *
 * Every stored record hash depends on this output. Do not change it.
 */

import { CanonicalizationError } from './errors';
import { FieldMap } from './types';

export function canonicalString(payload: FieldMap): string {
  if (!isPlainObject(payload)) {
    throw new CanonicalizationError('Payload must be a plain object', '$');
  }
  return encodeValue(payload, '$', new Set());
}

export function canonicalize(payload: FieldMap): Buffer {
  return Buffer.from(canonicalString(payload), 'utf8');
}

/**
 * Parse canonical text back into a payload. Used by stores that persist the
 * canonical form verbatim.
 */
export function parseCanonical(text: string): FieldMap {
  const parsed: unknown = JSON.parse(text);
  assertFieldMap(parsed);
  return parsed;
}

export interface DecodedPayload {
  payload: FieldMap;
  payloadError?: string;
}

/**
 * parseCanonical for stored rows: text that no longer decodes gives an empty
 * payload plus the reason, leaving the verdict to the verifier.
 */
export function decodeStoredPayload(text: string): DecodedPayload {
  try {
    return { payload: parseCanonical(text) };
  } catch (error) {
    return { payload: {}, payloadError: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Narrow an untrusted value (request body, stored JSON) to a FieldMap by
 * running it through the encoder.
 */
export function assertFieldMap(value: unknown): asserts value is FieldMap {
  if (!isPlainObject(value)) {
    throw new CanonicalizationError('Payload must be a plain object', '$');
  }
  encodeValue(value, '$', new Set());
}

function encodeValue(value: unknown, path: string, ancestors: Set<object>): string {
  if (value === null) return 'null';

  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
      return formatNumber(value, path);
    case 'undefined':
      throw new CanonicalizationError('Undefined values are not representable', path);
    case 'bigint':
      throw new CanonicalizationError('BigInt values are not representable', path);
    case 'function':
    case 'symbol':
      throw new CanonicalizationError(`${typeof value} values are not representable`, path);
  }

  if (typeof value !== 'object' || value === null) {
    throw new CanonicalizationError('Unsupported value', path);
  }

  if (ancestors.has(value)) {
    throw new CanonicalizationError('Cyclic structure', path);
  }

  if (Array.isArray(value)) {
    ancestors.add(value);
    const items = value.map((item, index) => encodeValue(item, `${path}[${index}]`, ancestors));
    ancestors.delete(value);
    return `[${items.join(',')}]`;
  }

  if (!isPlainObject(value)) {
    const kind = Object.prototype.toString.call(value);
    throw new CanonicalizationError(`${kind} is not representable`, path);
  }

  const fields: Record<string, unknown> = value;
  ancestors.add(fields);
  const members = Object.keys(fields)
    .sort()
    .map(key => `${JSON.stringify(key)}:${encodeValue(fields[key], `${path}.${key}`, ancestors)}`);
  ancestors.delete(fields);
  return `{${members.join(',')}}`;
}

/**
 * Plain decimal rendering of a finite number, built from the shortest
 * round-trip digits so the text is identical on every engine.
 */
export function formatNumber(value: number, path = '$'): string {
  if (!Number.isFinite(value)) {
    throw new CanonicalizationError(`Non-finite number ${String(value)}`, path);
  }
  if (value === 0) return '0';

  const text = String(value);
  const exponentAt = text.indexOf('e');
  if (exponentAt === -1) return text;

  const negative = text.startsWith('-');
  const mantissa = text.slice(negative ? 1 : 0, exponentAt);
  const exponent = parseInt(text.slice(exponentAt + 1), 10);

  const dot = mantissa.indexOf('.');
  const digits = dot === -1 ? mantissa : mantissa.slice(0, dot) + mantissa.slice(dot + 1);
  const pointAt = (dot === -1 ? mantissa.length : dot) + exponent;

  let plain: string;
  if (pointAt <= 0) {
    plain = `0.${'0'.repeat(-pointAt)}${digits}`;
  } else if (pointAt >= digits.length) {
    plain = digits + '0'.repeat(pointAt - digits.length);
  } else {
    plain = `${digits.slice(0, pointAt)}.${digits.slice(pointAt)}`;
  }

  return negative ? `-${plain}` : plain;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
