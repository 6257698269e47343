#!/usr/bin/env node
/**
 * CLI: run a collection file, or a single ad hoc request, against a base URL.
 *
 * Usage: flowprobe flows/users.yaml http://localhost:8000
 *        flowprobe -m GET -u /health -b http://localhost:8000
 *
 * Every run appends one line to the result log. The exit code is 0 when the
 * run passed, 1 when it failed and 2 on a usage error.
 */

import type { FlowEvent, FlowResult, SingleStepResult } from '../types/index.js';
import { toJson } from '../types/value.js';
import { loadSettings } from '../config/settings.js';
import { ResultLog } from '../logging/result-log.js';
import { buildJsonReport, buildReport } from '../logging/report.js';
import { FlowRunner } from '../runner/flow-runner.js';
import { runSingleStep } from '../runner/single-step.js';
import type { CliCommand, OutputOptions } from './args.js';
import { USAGE, UsageError, parseCliArgs } from './args.js';

// ── helpers ────────────────────────────────────────

function emit(event: Record<string, unknown>): void {
  process.stdout.write(toJson(event) + '\n');
}

function printResult(result: FlowResult | SingleStepResult, output: OutputOptions): void {
  if (output.stream) {
    emit({ type: 'run_result', ...result });
  } else if (output.json) {
    process.stdout.write(buildJsonReport(result));
  } else {
    process.stdout.write(buildReport(result, { verbose: output.verbose }));
  }
}

// ── main ───────────────────────────────────────────

async function main(): Promise<void> {
  let command: CliCommand;
  try {
    command = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    process.stderr.write(`${error.message}\n\n${USAGE}`);
    process.exitCode = 2;
    return;
  }

  if (command.mode === 'help') {
    process.stdout.write(USAGE);
    return;
  }

  const settings = loadSettings();
  const sink = new ResultLog(settings.resultLogPath, settings.tool);
  const onEvent = command.output.stream ? (event: FlowEvent) => emit(event) : undefined;

  let result: FlowResult | SingleStepResult;
  switch (command.mode) {
    case 'flow': {
      const runner = new FlowRunner({
        sink,
        settings: {
          defaultTimeoutSeconds: command.timeoutSeconds ?? settings.defaultTimeoutSeconds,
          responsePreviewChars: settings.responsePreviewChars,
        },
        onEvent,
      });
      result = await runner.runFile(command.file, command.baseUrl);
      break;
    }
    case 'single':
      result = await runSingleStep(command.request, { sink, settings });
      break;
    case 'rejected':
      result = command.result;
      await sink.record(result);
      break;
  }

  printResult(result, command.output);
  process.exitCode = result.success ? 0 : 1;
}

main().catch((error: unknown) => {
  process.stderr.write(`flowprobe: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
