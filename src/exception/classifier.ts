import type { RequestErrorKind } from '../types/http.js';

interface ClassifyContext {
  /** Set when our own timeout fired before the error surfaced. */
  timedOut?: boolean;
  /** Set when the failure happened while reading the response body. */
  readingBody?: boolean;
}

export function classifyRequestError(error: unknown, context: ClassifyContext = {}): RequestErrorKind {
  if (context.timedOut || isTimeout(error)) {
    return 'timeout';
  }

  if (context.readingBody) {
    return 'malformed_response';
  }

  return 'connection';
}

/**
 * Message of the error and of its `cause` chain. fetch() reports most network
 * failures as a bare "fetch failed" with the useful part in `cause`.
 */
export function describeError(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;

  while (current !== undefined && parts.length < 5) {
    if (current instanceof Error) {
      parts.push(current.message);
      current = current.cause;
    } else {
      parts.push(String(current));
      break;
    }
  }

  return parts.filter((part) => part.length > 0).join(': ');
}

function isTimeout(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (error.name === 'TimeoutError') return true;

  const code = 'code' in error ? error.code : undefined;
  const patterns = ['UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT', 'ETIMEDOUT'];
  if (typeof code === 'string' && patterns.includes(code)) return true;

  return error.cause !== undefined && isTimeout(error.cause);
}
