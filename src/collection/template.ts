import type { Step } from '../types/index.js';
import type { JsonValue } from '../types/value.js';
import { classifyValue, stringify } from '../types/value.js';

const PLACEHOLDER = /\{\{([^{}]+)\}\}/g;

export type Variables = Readonly<Record<string, JsonValue>>;

/**
 * Replaces `{{name}}` placeholders with the string form of known variables.
 * Unknown placeholders are kept verbatim and replaced text is not rescanned.
 */
export function substitute<T>(text: T, vars: Variables): T | string {
  if (typeof text !== 'string') return text;

  return text.replace(PLACEHOLDER, (match, key: string) =>
    Object.hasOwn(vars, key) ? stringify(vars[key]) : match,
  );
}

/**
 * Applies substitution to the templated parts of a step: method, url and a
 * scalar body. Structured bodies are sent as declared.
 */
export function interpolateStep(step: Step, vars: Variables): Step {
  const resolved: Step = {
    ...step,
    method: substitute(step.method, vars),
    url: substitute(step.url, vars),
  };

  if (step.body === undefined || step.body === null) return resolved;

  const body = classifyValue(step.body);
  switch (body.kind) {
    case 'mapping':
    case 'sequence':
      return resolved;
    case 'scalar':
    case 'text':
      return { ...resolved, body: substitute(stringify(body.value), vars) };
  }
}
