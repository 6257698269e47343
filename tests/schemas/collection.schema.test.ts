import { describe, it, expect } from 'vitest';
import {
  CollectionSchema,
  ExpectationSchema,
  MAX_TIMEOUT_SECONDS,
  StepSchema,
  formatSchemaError,
} from '../../src/schemas/collection.schema.js';

describe('ExpectationSchema', () => {
  it('defaults status to 200', () => {
    expect(ExpectationSchema.parse({})).toEqual({ status: 200 });
  });

  it('accepts body, headers and max_response_time', () => {
    const valid = {
      status: 201,
      body: { email: 'a@example.com' },
      headers: { 'Content-Type': 'application/json' },
      max_response_time: 0.5,
    };
    expect(ExpectationSchema.parse(valid)).toEqual(valid);
  });

  it('rejects a non-integer status', () => {
    expect(() => ExpectationSchema.parse({ status: 200.5 })).toThrow();
  });
});

describe('StepSchema', () => {
  it('fills defaults for a minimal step', () => {
    expect(StepSchema.parse({})).toEqual({
      method: 'GET',
      url: '',
      headers: {},
      expect: { status: 200 },
    });
  });

  it('turns numeric header values into text', () => {
    expect(StepSchema.parse({ headers: { 'X-Retry': 3 } }).headers).toEqual({ 'X-Retry': '3' });
  });

  it('keeps structured and scalar bodies', () => {
    expect(StepSchema.parse({ method: 'POST', body: { a: [1, 'x', null] } }).body).toEqual({ a: [1, 'x', null] });
    expect(StepSchema.parse({ method: 'PUT', body: 'raw' }).body).toBe('raw');
  });

  it('rejects a non-positive timeout', () => {
    expect(() => StepSchema.parse({ timeout: 0 })).toThrow();
  });

  it('caps the timeout at what a timer can wait for', () => {
    expect(StepSchema.parse({ timeout: MAX_TIMEOUT_SECONDS }).timeout).toBe(2_147_483);
    expect(() => StepSchema.parse({ timeout: 3_000_000 })).toThrow();
  });

  it('rejects a body on GET and HEAD', () => {
    const result = StepSchema.safeParse({ method: 'get', body: { q: 'x' } });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatSchemaError(result.error)).toBe('body: GET requests cannot carry a body');
    }
    expect(StepSchema.safeParse({ method: 'HEAD', body: 'x' }).success).toBe(false);
    expect(StepSchema.safeParse({ method: 'GET', body: null }).success).toBe(true);
  });

  it('accepts big integers in bodies', () => {
    expect(StepSchema.parse({ method: 'POST', body: { id: 1234567890123456789n } }).body).toEqual({
      id: 1234567890123456789n,
    });
  });

  it('rejects non-string extract paths', () => {
    expect(() => StepSchema.parse({ extract: { id: 1 } })).toThrow();
  });
});

describe('CollectionSchema', () => {
  it('fills collection defaults', () => {
    expect(CollectionSchema.parse({})).toEqual({
      name: 'Unnamed Flow',
      description: '',
      variables: {},
      steps: [],
    });
  });

  it('rejects steps that are not objects', () => {
    expect(() => CollectionSchema.parse({ steps: ['GET /health'] })).toThrow();
  });
});

describe('formatSchemaError', () => {
  it('names the failing path', () => {
    const parsed = CollectionSchema.safeParse({ steps: [{ method: 5 }] });
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(formatSchemaError(parsed.error)).toBe('steps.0.method: Expected string, received number');
    }
  });

  it('uses (root) for top-level problems', () => {
    const parsed = CollectionSchema.safeParse('not a collection');
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(formatSchemaError(parsed.error)).toBe('(root): Expected object, received string');
    }
  });
});
