import type { FetchFn, Issue, SingleStepResult } from '../types/index.js';
import type { JsonValue } from '../types/value.js';
import type { ResultSink } from '../logging/result-log.js';
import type { RunnerSettings } from '../config/settings.js';
import { DEFAULT_SETTINGS } from '../config/settings.js';
import { HttpSession, toRequestBody } from '../http/http-session.js';
import { bodyNotAllowed } from '../schemas/index.js';
import { validateResponse } from '../engine/validator.js';
import { extractVariables } from '../engine/path-extractor.js';
import { errorMessage, makeIssue, responseIssue } from './issues.js';

export const AD_HOC_LOCATION = 'cli';

export interface SingleStepOptions {
  method: string;
  url: string;
  baseUrl: string;
  headers?: Record<string, string>;
  body?: JsonValue;
  extract?: Record<string, string>;
  expectedStatus?: number;
  timeoutSeconds?: number;
}

export interface SingleStepDeps {
  sink: ResultSink;
  fetch?: FetchFn;
  settings?: Partial<Pick<RunnerSettings, 'defaultTimeoutSeconds' | 'responsePreviewChars'>>;
}

async function executeSingleStep(options: SingleStepOptions, deps: SingleStepDeps): Promise<SingleStepResult> {
  const stepName = `${options.method} ${options.url}`;
  const previewChars = deps.settings?.responsePreviewChars ?? DEFAULT_SETTINGS.responsePreviewChars;
  if (bodyNotAllowed(options.method, options.body)) {
    const message = `${options.method.toUpperCase()} requests cannot carry a body`;
    return { success: false, issues: [makeIssue(AD_HOC_LOCATION, stepName, message)] };
  }

  const session = new HttpSession({ fetch: deps.fetch });

  const executed = await session.execute({
    method: options.method,
    url: options.url,
    baseUrl: options.baseUrl,
    headers: options.headers ?? {},
    body: toRequestBody(options.body),
    timeoutSeconds: options.timeoutSeconds ?? deps.settings?.defaultTimeoutSeconds ?? DEFAULT_SETTINGS.defaultTimeoutSeconds,
  });

  if (!executed.ok) {
    return { success: false, issues: [makeIssue(AD_HOC_LOCATION, stepName, executed.error.message)] };
  }

  const { response, elapsedMs } = executed;
  const issues: Issue[] = validateResponse(
    { ...response, elapsedMs },
    { status: options.expectedStatus ?? 200 },
  ).map((message) => responseIssue(AD_HOC_LOCATION, stepName, message, response, previewChars));

  if (issues.length > 0) {
    return { success: false, issues };
  }

  const result: SingleStepResult = { success: true, issues };
  if (options.extract) {
    result.extracted = extractVariables(response.body, options.extract);
  }
  return result;
}

/**
 * Sends one request outside any collection, checks only its status and
 * optionally extracts values from the response.
 */
export async function runSingleStep(options: SingleStepOptions, deps: SingleStepDeps): Promise<SingleStepResult> {
  let result: SingleStepResult;
  try {
    result = await executeSingleStep(options, deps);
  } catch (error) {
    result = {
      success: false,
      issues: [makeIssue(AD_HOC_LOCATION, `${options.method} ${options.url}`, `Unexpected error: ${errorMessage(error)}`)],
    };
  }

  await deps.sink.record(result);
  return result;
}
