import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { FlowResult, SingleStepResult } from '../types/flow-result.js';
import { toJson } from '../types/value.js';

export interface ResultSink {
  record(result: FlowResult | SingleStepResult): Promise<void>;
}

export interface ResultLogEntry extends SingleStepResult {
  timestamp: string;
  tool: string;
}

/**
 * Append-only NDJSON log of run results, one line per invocation. The
 * directory is created on the first write.
 */
export class ResultLog implements ResultSink {
  private initialized = false;

  constructor(
    private logPath: string,
    private tool: string,
  ) {}

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(dirname(this.logPath), { recursive: true });
    this.initialized = true;
  }

  async record(result: FlowResult | SingleStepResult): Promise<void> {
    await this.ensureDir();
    const entry: ResultLogEntry = {
      timestamp: new Date().toISOString(),
      tool: this.tool,
      ...result,
    };
    await appendFile(this.logPath, toJson(entry) + '\n', 'utf-8');
  }

  getLogPath(): string {
    return this.logPath;
  }
}
