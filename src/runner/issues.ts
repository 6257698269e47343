import type { Issue } from '../types/flow-result.js';
import type { HttpResponse } from '../types/http.js';

/** Limits a body preview to `limit` code points, so no character is split. */
export function truncateBody(body: string, limit: number): string {
  const chars = Array.from(body);
  return chars.length > limit ? chars.slice(0, limit).join('') + '...' : body;
}

export function makeIssue(location: string, step: string, message: string): Issue {
  return { type: 'flow', location, message, step };
}

export function responseIssue(
  location: string,
  step: string,
  message: string,
  response: HttpResponse,
  previewChars: number,
): Issue {
  return {
    ...makeIssue(location, step, message),
    response_status: response.status,
    response_body: truncateBody(response.body, previewChars),
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
