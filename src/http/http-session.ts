import type {
  ExecuteResult,
  FetchFn,
  HttpRequestSpec,
  HttpResponse,
  RequestBody,
  RequestError,
} from '../types/http.js';
import { CookieJar } from 'tough-cookie';
import type { JsonValue } from '../types/value.js';
import { classifyValue, stringify, toJson } from '../types/value.js';
import { classifyRequestError, describeError } from '../exception/classifier.js';

export interface HttpSessionOptions {
  fetch?: FetchFn;
}

const ABSOLUTE_URL = /^https?:\/\//i;

// setTimeout takes a signed 32-bit delay; anything larger fires immediately.
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

export function resolveUrl(url: string, baseUrl: string): string {
  if (ABSOLUTE_URL.test(url)) return url;
  const base = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
  const path = url.startsWith('/') ? url.slice(1) : url;
  return `${base}/${path}`;
}

export function toRequestBody(body: JsonValue | undefined): RequestBody {
  if (body === undefined || body === null) return { kind: 'none' };

  const value = classifyValue(body);
  switch (value.kind) {
    case 'mapping':
    case 'sequence':
      return { kind: 'json', value: value.value };
    case 'scalar':
    case 'text':
      return { kind: 'raw', value: stringify(value.value) };
  }
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  const wanted = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === wanted);
}

function requestError(kind: RequestError['kind'], error: unknown, timeoutSeconds: number): RequestError {
  switch (kind) {
    case 'timeout':
      return { kind, message: `Request timed out after ${timeoutSeconds}s` };
    case 'connection':
      return { kind, message: `Request failed: ${describeError(error)}` };
    case 'malformed_response':
      return { kind, message: `Malformed response: ${describeError(error)}` };
  }
}

/**
 * Sends the requests of one flow run. Connections are pooled by fetch; the
 * session adds a cookie jar so cookies set by one step reach the next, scoped
 * by their Domain, Path, Secure and expiry attributes.
 */
export class HttpSession {
  private fetchFn: FetchFn;
  private jar = new CookieJar();

  constructor(options: HttpSessionOptions = {}) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async execute(spec: HttpRequestSpec): Promise<ExecuteResult> {
    const url = resolveUrl(spec.url, spec.baseUrl);
    const headers = await this.buildHeaders(spec, url);
    const body = this.serializeBody(spec.body);

    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, Math.min(spec.timeoutSeconds * 1000, MAX_TIMER_DELAY_MS));

    const start = performance.now();
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: spec.method.toUpperCase(),
        headers,
        body,
        signal: controller.signal,
      });
    } catch (error) {
      clearTimeout(timeout);
      const kind = classifyRequestError(error, { timedOut });
      return { ok: false, error: requestError(kind, error, spec.timeoutSeconds), elapsedMs: performance.now() - start };
    }

    try {
      const text = await response.text();
      const elapsedMs = performance.now() - start;
      await this.storeCookies(response.headers, url);
      return { ok: true, response: this.toHttpResponse(response, text), elapsedMs };
    } catch (error) {
      const kind = classifyRequestError(error, { timedOut, readingBody: true });
      return { ok: false, error: requestError(kind, error, spec.timeoutSeconds), elapsedMs: performance.now() - start };
    } finally {
      clearTimeout(timeout);
    }
  }

  /** Cookies the jar would send to `url`, by name. */
  async getCookies(url: string): Promise<Record<string, string>> {
    const cookies = await this.jar.getCookies(url);
    return Object.fromEntries(cookies.map((cookie) => [cookie.key, cookie.value]));
  }

  private async buildHeaders(spec: HttpRequestSpec, url: string): Promise<Record<string, string>> {
    const headers: Record<string, string> = { ...spec.headers };

    if (spec.body.kind === 'json' && !hasHeader(headers, 'content-type')) {
      headers['Content-Type'] = 'application/json';
    }

    if (!hasHeader(headers, 'cookie') && URL.canParse(url)) {
      const cookie = await this.jar.getCookieString(url);
      if (cookie) headers['Cookie'] = cookie;
    }

    return headers;
  }

  private serializeBody(body: RequestBody): string | undefined {
    switch (body.kind) {
      case 'none':
        return undefined;
      case 'json':
        return toJson(body.value);
      case 'raw':
        return body.value;
    }
  }

  // Cookies the jar refuses for this url (foreign Domain, bad syntax) are dropped.
  private async storeCookies(headers: Headers, url: string): Promise<void> {
    for (const cookie of headers.getSetCookie()) {
      await this.jar.setCookie(cookie, url, { ignoreError: true });
    }
  }

  private toHttpResponse(response: Response, body: string): HttpResponse {
    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });
    return { status: response.status, headers, body };
  }
}
