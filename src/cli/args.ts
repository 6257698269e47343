import { parseArgs } from 'node:util';
import { z } from 'zod';
import type { SingleStepResult } from '../types/flow-result.js';
import type { JsonValue } from '../types/value.js';
import { parseJson } from '../types/value.js';
import type { SingleStepOptions } from '../runner/single-step.js';
import { AD_HOC_LOCATION } from '../runner/single-step.js';
import { MAX_TIMEOUT_SECONDS, formatSchemaError } from '../schemas/index.js';
import { makeIssue } from '../runner/issues.js';

export const USAGE = `Usage:
  flowprobe <collection> <base-url>
  flowprobe --file <collection> --base-url <url>
  flowprobe --method <METHOD> --url <path> --base-url <url> [--status 200]
            [--body <json|text>] [--headers <json>] [--extract <json>] [--timeout <seconds>]

Options:
  -f, --file <path>        YAML or JSON collection file
  -b, --base-url <url>     Base URL that relative step URLs are joined to
  -m, --method <method>    HTTP method for a single ad hoc request
  -u, --url <url>          URL path or absolute URL for the ad hoc request
  -s, --status <code>      Expected status of the ad hoc request (default 200)
      --body <value>       Request body; JSON is sent as JSON, anything else as text
      --headers <json>     Request headers as a JSON object
      --extract <json>     Variables to extract, as {"name": "dot.path"}
      --timeout <seconds>  Request timeout (default 30)
      --json-output        Print the result as JSON
      --stream             Print progress events and the result as JSON lines
  -v, --verbose            Include response bodies and extracted variables
  -h, --help               Show this help
`;

export interface OutputOptions {
  json: boolean;
  stream: boolean;
  verbose: boolean;
}

export type CliCommand =
  | { mode: 'help' }
  | { mode: 'flow'; file: string; baseUrl: string; timeoutSeconds?: number; output: OutputOptions }
  | { mode: 'single'; request: SingleStepOptions; output: OutputOptions }
  | { mode: 'rejected'; result: SingleStepResult; output: OutputOptions };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const HeadersArgSchema = z.record(z.union([z.string(), z.number(), z.bigint(), z.boolean()]).transform((value) => String(value)));
const ExtractArgSchema = z.record(z.string());

type JsonArg<T> = { ok: true; value: T } | { ok: false; message: string };

function parseJsonArg<S extends z.ZodTypeAny>(raw: string, schema: S): JsonArg<z.output<S>> {
  let parsed: unknown;
  try {
    parsed = parseJson(raw);
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : String(error) };
  }
  const checked = schema.safeParse(parsed);
  return checked.success ? { ok: true, value: checked.data } : { ok: false, message: formatSchemaError(checked.error) };
}

/** JSON bodies are sent structured; anything that does not parse goes out as text. */
export function parseBodyArg(raw: string): JsonValue {
  try {
    return parseJson(raw);
  } catch {
    return raw;
  }
}

function parseInteger(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) throw new UsageError(`--${name} must be an integer, got '${raw}'`);
  return value;
}

function parseTimeout(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) throw new UsageError(`--timeout must be a positive number, got '${raw}'`);
  if (value > MAX_TIMEOUT_SECONDS) {
    throw new UsageError(`--timeout must be at most ${MAX_TIMEOUT_SECONDS} seconds, got '${raw}'`);
  }
  return value;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        file: { type: 'string', short: 'f' },
        'base-url': { type: 'string', short: 'b' },
        method: { type: 'string', short: 'm' },
        url: { type: 'string', short: 'u' },
        status: { type: 'string', short: 's' },
        body: { type: 'string' },
        headers: { type: 'string' },
        extract: { type: 'string' },
        timeout: { type: 'string' },
        'json-output': { type: 'boolean', default: false },
        stream: { type: 'boolean', default: false },
        verbose: { type: 'boolean', short: 'v', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = readArgs(argv);

  if (values.help) return { mode: 'help' };
  if (positionals.length > 2) {
    throw new UsageError(`Unexpected argument '${positionals[2]}'`);
  }

  const output: OutputOptions = {
    json: values['json-output'] ?? false,
    stream: values.stream ?? false,
    verbose: values.verbose ?? false,
  };

  const baseUrl = values['base-url'] ?? positionals[1];
  if (!baseUrl) {
    throw new UsageError('Base URL is required. Use --base-url or provide it as the second positional argument');
  }

  const timeoutSeconds = parseTimeout(values.timeout);
  const file = values.file ?? positionals[0];
  if (file) {
    return { mode: 'flow', file, baseUrl, timeoutSeconds, output };
  }

  const { method, url } = values;
  if (!method || !url) {
    throw new UsageError('Either provide a collection file or use --method and --url for an ad hoc request');
  }

  const request: SingleStepOptions = {
    method,
    url,
    baseUrl,
    expectedStatus: parseInteger('status', values.status, 200),
    timeoutSeconds,
  };

  if (values.headers !== undefined) {
    const headers = parseJsonArg(values.headers, HeadersArgSchema);
    if (!headers.ok) return reject(`Invalid headers JSON: ${headers.message}`, output);
    request.headers = headers.value;
  }

  if (values.extract !== undefined) {
    const extract = parseJsonArg(values.extract, ExtractArgSchema);
    if (!extract.ok) return reject(`Invalid extract JSON: ${extract.message}`, output);
    request.extract = extract.value;
  }

  if (values.body !== undefined) {
    request.body = parseBodyArg(values.body);
  }

  return { mode: 'single', request, output };
}

function reject(message: string, output: OutputOptions): CliCommand {
  return {
    mode: 'rejected',
    result: { success: false, issues: [makeIssue(AD_HOC_LOCATION, 'setup', message)] },
    output,
  };
}
