import type { JsonValue } from '../types/value.js';
import { classifyValue, parseBody } from '../types/value.js';

export type PathLookup = { found: true; value: JsonValue } | { found: false };

const INDEX_SEGMENT = /^\d+$/;

/**
 * Resolves a dot-separated path such as `user.roles.0.name`. Digit-only
 * segments index sequences; every other segment is a mapping key. Any miss
 * along the way yields `{ found: false }`.
 */
export function extractPath(value: JsonValue, path: string): PathLookup {
  let current: JsonValue = value;

  for (const segment of path.split('.')) {
    const node = classifyValue(current);

    if (INDEX_SEGMENT.test(segment)) {
      if (node.kind !== 'sequence') return { found: false };
      const index = Number(segment);
      if (index >= node.value.length) return { found: false };
      current = node.value[index];
      continue;
    }

    if (node.kind !== 'mapping' || !Object.hasOwn(node.value, segment)) {
      return { found: false };
    }
    current = node.value[segment];
  }

  return { found: true, value: current };
}

/**
 * Binds each variable of an `extract` map to the value at its path in the
 * response body, or to null when the path does not resolve. A body that is
 * not JSON is addressed as `{ text: <raw body> }`.
 */
export function extractVariables(
  rawBody: string,
  extract: Record<string, string>,
): Record<string, JsonValue> {
  const body = parseBody(rawBody);
  const root: JsonValue = body.kind === 'text' ? { text: body.value } : body.value;

  const extracted: Record<string, JsonValue> = {};
  for (const [name, path] of Object.entries(extract)) {
    const lookup = extractPath(root, path);
    extracted[name] = lookup.found ? lookup.value : null;
  }
  return extracted;
}
