import { z } from 'zod';
import type { JsonValue } from '../types/value.js';

const ScalarSchema = z.union([z.string(), z.number(), z.bigint(), z.boolean(), z.null()]);

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([ScalarSchema, z.array(JsonValueSchema), z.record(JsonValueSchema)]),
);

// YAML turns `X-Retry: 3` into a number; headers travel as text.
const HeaderValueSchema = z
  .union([z.string(), z.number(), z.bigint(), z.boolean()])
  .transform((value) => String(value));

export const ExpectationSchema = z.object({
  status: z.number().int().default(200),
  body: JsonValueSchema.optional(),
  headers: z.record(HeaderValueSchema).optional(),
  max_response_time: z.number().nonnegative().optional(),
});

/** Largest timeout a Node timer can wait for, in whole seconds. */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

const BODYLESS_METHODS = new Set(['GET', 'HEAD']);

export function bodyNotAllowed(method: string, body: JsonValue | undefined): boolean {
  return body !== undefined && body !== null && BODYLESS_METHODS.has(method.toUpperCase());
}

export const StepSchema = z
  .object({
    name: z.string().optional(),
    method: z.string().default('GET'),
    url: z.string().default(''),
    headers: z.record(HeaderValueSchema).default({}),
    body: JsonValueSchema.optional(),
    timeout: z.number().positive().max(MAX_TIMEOUT_SECONDS).optional(),
    expect: ExpectationSchema.default({}),
    extract: z.record(z.string()).optional(),
  })
  .superRefine((step, ctx) => {
    if (bodyNotAllowed(step.method, step.body)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['body'],
        message: `${step.method.toUpperCase()} requests cannot carry a body`,
      });
    }
  });

export const CollectionSchema = z.object({
  name: z.string().default('Unnamed Flow'),
  description: z.string().default(''),
  variables: z.record(JsonValueSchema).default({}),
  steps: z.array(StepSchema).default([]),
});

export function formatSchemaError(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
