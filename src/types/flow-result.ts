import type { JsonValue } from './value.js';

export interface Issue {
  type: 'flow';
  location: string;
  message: string;
  step: string;
  response_status?: number;
  response_body?: string;
}

export interface FlowResult {
  success: boolean;
  issues: Issue[];
  summary?: string;
  variables?: Record<string, JsonValue>;
}

export interface SingleStepResult extends FlowResult {
  extracted?: Record<string, JsonValue>;
}

export type FlowEvent =
  | { type: 'flow_start'; flow: string; totalSteps: number }
  | { type: 'step_start'; step: string; stepIndex: number; method: string; url: string }
  | {
      type: 'step_end';
      step: string;
      stepIndex: number;
      ok: boolean;
      status?: number;
      elapsedMs: number;
      extracted?: Record<string, JsonValue>;
    }
  | { type: 'flow_complete'; success: boolean; issueCount: number };
