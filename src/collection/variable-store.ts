import type { JsonValue } from '../types/value.js';

/**
 * Variables visible to the steps of one flow run. Entries are added or
 * overwritten, never removed.
 */
export class VariableStore {
  private values = new Map<string, JsonValue>();

  constructor(seed: Record<string, JsonValue> = {}) {
    this.merge(seed);
  }

  static forFlow(variables: Record<string, JsonValue>, baseUrl: string): VariableStore {
    return new VariableStore({ ...variables, base_url: baseUrl });
  }

  get(name: string): JsonValue | undefined {
    return this.values.get(name);
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  set(name: string, value: JsonValue): void {
    this.values.set(name, value);
  }

  merge(entries: Record<string, JsonValue>): void {
    for (const [name, value] of Object.entries(entries)) {
      this.values.set(name, value);
    }
  }

  get size(): number {
    return this.values.size;
  }

  snapshot(): Record<string, JsonValue> {
    return Object.fromEntries(this.values);
  }
}
