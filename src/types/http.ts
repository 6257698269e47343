import type { JsonValue } from './value.js';

export type RequestErrorKind = 'timeout' | 'connection' | 'malformed_response';

export interface RequestError {
  kind: RequestErrorKind;
  message: string;
}

export type RequestBody =
  | { kind: 'none' }
  | { kind: 'json'; value: JsonValue }
  | { kind: 'raw'; value: string };

export interface HttpRequestSpec {
  method: string;
  url: string;
  baseUrl: string;
  headers: Record<string, string>;
  body: RequestBody;
  timeoutSeconds: number;
}

export interface HttpResponse {
  status: number;
  /** Header names are lower-cased. */
  headers: Record<string, string>;
  body: string;
}

export type ExecuteResult =
  | { ok: true; response: HttpResponse; elapsedMs: number }
  | { ok: false; error: RequestError; elapsedMs: number };

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;
