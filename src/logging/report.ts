import type { FlowResult, SingleStepResult } from '../types/flow-result.js';
import { stringify, toJson } from '../types/value.js';

export interface ReportOptions {
  verbose?: boolean;
}

/**
 * Human-readable rendering of a run result for the terminal.
 */
export function buildReport(result: FlowResult | SingleStepResult, options: ReportOptions = {}): string {
  const lines: string[] = [];

  if (result.success) {
    lines.push('PASS Integration test passed');
    if (result.summary) {
      lines.push(`   ${result.summary}`);
    }
    if (options.verbose && 'extracted' in result && result.extracted) {
      lines.push('');
      lines.push('Extracted variables:');
      for (const [name, value] of Object.entries(result.extracted)) {
        lines.push(`   ${name}: ${stringify(value)}`);
      }
    }
    return lines.join('\n') + '\n';
  }

  lines.push('FAIL Integration test failed');
  lines.push('');
  lines.push(`Found ${result.issues.length} issue(s):`);

  for (const issue of result.issues) {
    lines.push('');
    lines.push(`   Location: ${issue.location}`);
    lines.push(`   Step: ${issue.step}`);
    lines.push(`   Message: ${issue.message}`);
    if (issue.response_status !== undefined) {
      lines.push(`   Response status: ${issue.response_status}`);
    }
    if (options.verbose && issue.response_body !== undefined) {
      lines.push(`   Response body: ${issue.response_body}`);
    }
  }

  return lines.join('\n') + '\n';
}

export function buildJsonReport(result: FlowResult | SingleStepResult): string {
  return toJson(result, 2) + '\n';
}
