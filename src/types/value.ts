import { isSafeNumber, parse as parseLossless, stringify as stringifyLossless } from 'lossless-json';

/** Integers beyond 2^53 are kept as `bigint` so their digits survive. */
export type Scalar = string | number | bigint | boolean | null;

export type JsonValue = Scalar | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * A request or response body, classified once so call sites can switch on
 * `kind` instead of probing the value.
 */
export type BodyValue =
  | { kind: 'mapping'; value: JsonObject }
  | { kind: 'sequence'; value: JsonValue[] }
  | { kind: 'scalar'; value: Scalar }
  | { kind: 'text'; value: string };

export function isJsonObject(value: JsonValue): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function classifyValue(value: JsonValue): BodyValue {
  if (Array.isArray(value)) return { kind: 'sequence', value };
  if (isJsonObject(value)) return { kind: 'mapping', value };
  return { kind: 'scalar', value };
}

const INTEGER = /^-?\d+$/;

function parseNumber(text: string): number | bigint {
  if (!isSafeNumber(text) && INTEGER.test(text)) return BigInt(text);
  return Number(text);
}

/** `JSON.parse` that keeps unsafe integers exact. Throws a SyntaxError on bad input. */
export function parseJson(raw: string): JsonValue {
  return parseLossless(raw, null, parseNumber) as JsonValue;
}

/** `JSON.stringify` that writes `bigint` values as plain digits. */
export function toJson(value: unknown, space?: number): string {
  return stringifyLossless(value, undefined, space) ?? 'null';
}

/**
 * Parses a raw response body. Anything that is not valid JSON stays as text.
 */
export function parseBody(raw: string): BodyValue {
  let parsed: JsonValue;
  try {
    parsed = parseJson(raw);
  } catch {
    return { kind: 'text', value: raw };
  }
  return classifyValue(parsed);
}

/** Text form used for substitution, containment checks and messages. */
export function stringify(value: JsonValue): string {
  if (typeof value === 'string') return value;
  if (value === null) return 'null';
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') return String(value);
  return toJson(value);
}

export function bodyToString(body: BodyValue): string {
  switch (body.kind) {
    case 'text':
      return body.value;
    case 'scalar':
    case 'mapping':
    case 'sequence':
      return stringify(body.value);
  }
}

export function jsonEquals(a: JsonValue, b: JsonValue): boolean {
  if (a === b) return true;
  if (Array.isArray(a)) {
    return Array.isArray(b) && a.length === b.length && a.every((item, i) => jsonEquals(item, b[i]));
  }
  if (isJsonObject(a)) {
    if (!isJsonObject(b)) return false;
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every((key) => key in b && jsonEquals(a[key], b[key]));
  }
  return false;
}
