import type { Collection, FetchFn, FlowEvent, FlowResult, Issue, Step } from '../types/index.js';
import type { JsonValue } from '../types/value.js';
import type { ResultSink } from '../logging/result-log.js';
import type { RunnerSettings } from '../config/settings.js';
import { DEFAULT_SETTINGS } from '../config/settings.js';
import { CollectionSchema, bodyNotAllowed, formatSchemaError } from '../schemas/index.js';
import { CollectionLoadError, loadCollectionFile } from '../collection/loader.js';
import { VariableStore } from '../collection/variable-store.js';
import { interpolateStep } from '../collection/template.js';
import { HttpSession, resolveUrl, toRequestBody } from '../http/http-session.js';
import { validateResponse } from '../engine/validator.js';
import { extractVariables } from '../engine/path-extractor.js';
import { errorMessage, makeIssue, responseIssue } from './issues.js';

export interface FlowRunnerOptions {
  sink: ResultSink;
  settings?: Partial<Pick<RunnerSettings, 'defaultTimeoutSeconds' | 'responsePreviewChars'>>;
  fetch?: FetchFn;
  onEvent?: (event: FlowEvent) => void;
}

export interface RunFlowOptions {
  baseUrl: string;
  /** Label used in issue locations, usually the collection file path. */
  location: string;
}

interface StepContext {
  session: HttpSession;
  store: VariableStore;
  baseUrl: string;
  index: number;
  name: string;
  location: string;
}

type StepOutcome = { ok: true } | { ok: false; issues: Issue[] };

function setupFailure(location: string, message: string): FlowResult {
  return { success: false, issues: [makeIssue(location, 'setup', message)] };
}

/**
 * Runs a collection's steps in order against one HTTP session. The first step
 * with a request error or a failed expectation ends the run; its issues are
 * the last ones recorded.
 */
export class FlowRunner {
  private sink: ResultSink;
  private defaultTimeoutSeconds: number;
  private responsePreviewChars: number;
  private fetchFn?: FetchFn;
  private onEvent?: (event: FlowEvent) => void;

  constructor(options: FlowRunnerOptions) {
    this.sink = options.sink;
    this.defaultTimeoutSeconds = options.settings?.defaultTimeoutSeconds ?? DEFAULT_SETTINGS.defaultTimeoutSeconds;
    this.responsePreviewChars = options.settings?.responsePreviewChars ?? DEFAULT_SETTINGS.responsePreviewChars;
    this.fetchFn = options.fetch;
    this.onEvent = options.onEvent;
  }

  async runFile(path: string, baseUrl: string): Promise<FlowResult> {
    let raw: unknown;
    try {
      raw = await loadCollectionFile(path);
    } catch (error) {
      const message =
        error instanceof CollectionLoadError ? error.message : `Unexpected error: ${errorMessage(error)}`;
      const result = setupFailure(path, message);
      await this.sink.record(result);
      return result;
    }

    return this.run(raw, { baseUrl, location: path });
  }

  async run(raw: unknown, options: RunFlowOptions): Promise<FlowResult> {
    const result = await this.execute(raw, options);
    await this.sink.record(result);
    return result;
  }

  private async execute(raw: unknown, { baseUrl, location }: RunFlowOptions): Promise<FlowResult> {
    try {
      const parsed = CollectionSchema.safeParse(raw);
      if (!parsed.success) {
        return setupFailure(location, `Invalid collection: ${formatSchemaError(parsed.error)}`);
      }

      const collection: Collection = parsed.data;
      if (collection.steps.length === 0) {
        return setupFailure(location, 'No test steps found in collection');
      }

      return await this.runSteps(collection, baseUrl, location);
    } catch (error) {
      return setupFailure(location, `Unexpected error: ${errorMessage(error)}`);
    }
  }

  private async runSteps(collection: Collection, baseUrl: string, location: string): Promise<FlowResult> {
    const store = VariableStore.forFlow(collection.variables, baseUrl);
    const session = new HttpSession({ fetch: this.fetchFn });
    const issues: Issue[] = [];
    const steps = collection.steps;

    this.emit({ type: 'flow_start', flow: collection.name, totalSteps: steps.length });

    for (let i = 0; i < steps.length; i++) {
      const step = steps[i];
      const context: StepContext = {
        session,
        store,
        baseUrl,
        index: i,
        name: step.name ?? `Step ${i + 1}`,
        location: `${location}:${i + 1}`,
      };

      const outcome = await this.runStepSafely(step, context);
      if (!outcome.ok) {
        issues.push(...outcome.issues);
        break;
      }
    }

    try {
      this.emit({ type: 'flow_complete', success: issues.length === 0, issueCount: issues.length });
    } catch (error) {
      issues.push(makeIssue(location, 'flow_complete', `Unexpected error: ${errorMessage(error)}`));
    }

    const success = issues.length === 0;
    const result: FlowResult = { success, issues };
    if (success) {
      result.summary = `Successfully executed ${steps.length} steps in flow '${collection.name}'`;
    }
    result.variables = store.snapshot();
    return result;
  }

  private async runStepSafely(step: Step, context: StepContext): Promise<StepOutcome> {
    try {
      return await this.runStep(step, context);
    } catch (error) {
      return {
        ok: false,
        issues: [makeIssue(context.location, context.name, `Step execution failed: ${errorMessage(error)}`)],
      };
    }
  }

  private async runStep(step: Step, context: StepContext): Promise<StepOutcome> {
    const { session, store, baseUrl, index, name, location } = context;
    const resolved = interpolateStep(step, store.snapshot());
    const method = resolved.method.toUpperCase();

    this.emit({
      type: 'step_start',
      step: name,
      stepIndex: index,
      method,
      url: resolveUrl(resolved.url, baseUrl),
    });

    // A method taken from a variable can only be checked once it is resolved.
    if (bodyNotAllowed(method, resolved.body)) {
      this.emit({ type: 'step_end', step: name, stepIndex: index, ok: false, elapsedMs: 0 });
      return { ok: false, issues: [makeIssue(location, name, `${method} requests cannot carry a body`)] };
    }

    const executed = await session.execute({
      method: resolved.method,
      url: resolved.url,
      baseUrl,
      headers: resolved.headers,
      body: toRequestBody(resolved.body),
      timeoutSeconds: step.timeout ?? this.defaultTimeoutSeconds,
    });

    if (!executed.ok) {
      this.emit({ type: 'step_end', step: name, stepIndex: index, ok: false, elapsedMs: executed.elapsedMs });
      return { ok: false, issues: [makeIssue(location, name, executed.error.message)] };
    }

    const { response, elapsedMs } = executed;
    const violations = validateResponse({ ...response, elapsedMs }, step.expect);

    if (violations.length > 0) {
      this.emit({ type: 'step_end', step: name, stepIndex: index, ok: false, status: response.status, elapsedMs });
      return {
        ok: false,
        issues: violations.map((message) =>
          responseIssue(location, name, message, response, this.responsePreviewChars),
        ),
      };
    }

    let extracted: Record<string, JsonValue> | undefined;
    if (step.extract) {
      extracted = extractVariables(response.body, step.extract);
      store.merge(extracted);
    }

    this.emit({ type: 'step_end', step: name, stepIndex: index, ok: true, status: response.status, elapsedMs, extracted });
    return { ok: true };
  }

  private emit(event: FlowEvent): void {
    this.onEvent?.(event);
  }
}
