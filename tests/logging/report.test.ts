import { describe, it, expect } from 'vitest';
import { buildJsonReport, buildReport } from '../../src/logging/report.js';
import type { FlowResult } from '../../src/types/index.js';

const failed: FlowResult = {
  success: false,
  issues: [
    {
      type: 'flow',
      location: 'flow.yaml:2',
      message: 'Expected status 200, got 500',
      step: 'Fetch User',
      response_status: 500,
      response_body: '{"error":"boom"}',
    },
    { type: 'flow', location: 'flow.yaml:2', message: "Missing expected header 'ETag'", step: 'Fetch User' },
  ],
};

describe('buildReport', () => {
  it('renders a passing flow with its summary', () => {
    expect(buildReport({ success: true, issues: [], summary: "Successfully executed 2 steps in flow 'Users'" })).toBe(
      "PASS Integration test passed\n   Successfully executed 2 steps in flow 'Users'\n",
    );
  });

  it('lists extracted variables only when verbose', () => {
    const result = { success: true, issues: [], extracted: { user_id: 123, tags: ['a'] } };
    expect(buildReport(result)).toBe('PASS Integration test passed\n');
    expect(buildReport(result, { verbose: true })).toBe(
      'PASS Integration test passed\n\nExtracted variables:\n   user_id: 123\n   tags: ["a"]\n',
    );
  });

  it('renders every issue of a failed run', () => {
    expect(buildReport(failed)).toBe(
      [
        'FAIL Integration test failed',
        '',
        'Found 2 issue(s):',
        '',
        '   Location: flow.yaml:2',
        '   Step: Fetch User',
        '   Message: Expected status 200, got 500',
        '   Response status: 500',
        '',
        '   Location: flow.yaml:2',
        '   Step: Fetch User',
        "   Message: Missing expected header 'ETag'",
        '',
      ].join('\n'),
    );
  });

  it('includes response bodies when verbose', () => {
    const lines = buildReport(failed, { verbose: true }).split('\n');
    expect(lines[8]).toBe('   Response body: {"error":"boom"}');
  });
});

describe('buildJsonReport', () => {
  it('pretty-prints the result', () => {
    expect(buildJsonReport({ success: true, issues: [] })).toBe('{\n  "success": true,\n  "issues": []\n}\n');
  });
});
