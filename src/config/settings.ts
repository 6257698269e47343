import { z } from 'zod';
import { MAX_TIMEOUT_SECONDS } from '../schemas/index.js';

export interface RunnerSettings {
  /** Step timeout in seconds when a step declares none. */
  defaultTimeoutSeconds: number;
  /** Characters of a failing response body kept on an issue. */
  responsePreviewChars: number;
  resultLogPath: string;
  tool: string;
}

export const DEFAULT_SETTINGS: RunnerSettings = {
  defaultTimeoutSeconds: 30,
  responsePreviewChars: 500,
  resultLogPath: 'logs/qa_results.ndjson',
  tool: 'integration-flow',
};

export const SettingsSchema = z.object({
  defaultTimeoutSeconds: z.coerce.number().positive().max(MAX_TIMEOUT_SECONDS),
  responsePreviewChars: z.coerce.number().int().positive(),
  resultLogPath: z.string().min(1),
  tool: z.string().min(1),
});

export class SettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SettingsError';
  }
}

const ENV_KEYS = {
  defaultTimeoutSeconds: 'FLOWPROBE_TIMEOUT',
  responsePreviewChars: 'FLOWPROBE_PREVIEW_CHARS',
  resultLogPath: 'FLOWPROBE_RESULT_LOG',
} as const;

function envKeyFor(field: string): string {
  const entry = Object.entries(ENV_KEYS).find(([name]) => name === field);
  return entry ? entry[1] : field;
}

/**
 * Defaults overlaid with `FLOWPROBE_*` environment variables.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): RunnerSettings {
  const candidate: Record<string, unknown> = { ...DEFAULT_SETTINGS };
  for (const [field, key] of Object.entries(ENV_KEYS)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') {
      candidate[field] = value.trim();
    }
  }

  const parsed = SettingsSchema.safeParse(candidate);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${envKeyFor(issue.path.join('.'))}: ${issue.message}`)
      .join('; ');
    throw new SettingsError(`Invalid settings: ${detail}`);
  }
  return parsed.data;
}
