import type { Expectation, HttpResponse } from '../types/index.js';
import type { JsonValue } from '../types/value.js';
import { bodyToString, classifyValue, jsonEquals, parseBody, stringify } from '../types/value.js';

export interface ObservedResponse extends HttpResponse {
  elapsedMs: number;
}

function checkStatus(response: ObservedResponse, expected: number): string[] {
  if (response.status === expected) return [];
  return [`Expected status ${expected}, got ${response.status}`];
}

/**
 * Mapping against mapping is a subset match, one message per key. Every
 * other combination falls back to substring containment of the text forms,
 * so an expected `42` is satisfied by an actual `420`.
 */
function checkBody(response: ObservedResponse, expected: JsonValue): string[] {
  const actual = parseBody(response.body);
  const want = classifyValue(expected);

  if (want.kind === 'mapping' && actual.kind === 'mapping') {
    const failures: string[] = [];
    for (const [key, expectedValue] of Object.entries(want.value)) {
      if (!Object.hasOwn(actual.value, key)) {
        failures.push(`Missing expected key '${key}' in response`);
      } else if (!jsonEquals(actual.value[key], expectedValue)) {
        failures.push(
          `Expected ${key}='${stringify(expectedValue)}', got '${stringify(actual.value[key])}'`,
        );
      }
    }
    return failures;
  }

  const expectedText = stringify(expected);
  if (bodyToString(actual).includes(expectedText)) return [];
  return [`Expected body content '${expectedText}' not found in response`];
}

function checkHeaders(response: ObservedResponse, expected: Record<string, string>): string[] {
  const failures: string[] = [];
  for (const [name, expectedValue] of Object.entries(expected)) {
    const actual = response.headers[name.toLowerCase()];
    if (actual === undefined) {
      failures.push(`Missing expected header '${name}'`);
    } else if (actual !== expectedValue) {
      failures.push(`Expected header ${name}='${expectedValue}', got '${actual}'`);
    }
  }
  return failures;
}

function checkLatency(response: ObservedResponse, maxSeconds: number): string[] {
  const elapsedSeconds = response.elapsedMs / 1000;
  if (elapsedSeconds <= maxSeconds) return [];
  return [`Response time ${elapsedSeconds.toFixed(2)}s exceeds limit ${maxSeconds}s`];
}

/**
 * Runs every declared check and returns all violations in check order:
 * status, body, headers, latency. An empty list means the response passed.
 */
export function validateResponse(response: ObservedResponse, expectation: Expectation): string[] {
  const failures = checkStatus(response, expectation.status);

  if (expectation.body !== undefined) {
    failures.push(...checkBody(response, expectation.body));
  }
  if (expectation.headers) {
    failures.push(...checkHeaders(response, expectation.headers));
  }
  if (expectation.max_response_time !== undefined) {
    failures.push(...checkLatency(response, expectation.max_response_time));
  }

  return failures;
}
