import type { JsonValue } from './value.js';

export interface Expectation {
  status: number;
  body?: JsonValue;
  headers?: Record<string, string>;
  /** Seconds. */
  max_response_time?: number;
}

export interface Step {
  name?: string;
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: JsonValue;
  /** Seconds. Falls back to the runner's default timeout. */
  timeout?: number;
  expect: Expectation;
  extract?: Record<string, string>;
}

export interface Collection {
  name: string;
  description: string;
  variables: Record<string, JsonValue>;
  steps: Step[];
}
