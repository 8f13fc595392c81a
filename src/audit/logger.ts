import fs from 'node:fs';
import path from 'node:path';
import type { AuditEvent, ModuleName } from '../types/index.js';

/**
 * JSONL event log for one run of one module, at
 * `agents/<module>_run_<n>.jsonl`. Each event is fsynced as it is written.
 */
export class ModuleLogger {
  readonly path: string;
  private fd: number | null = null;

  constructor(
    outputDir: string,
    private readonly moduleName: ModuleName,
    private readonly run: number
  ) {
    this.path = path.join(outputDir, 'agents', `${moduleName}_run_${run}.jsonl`);
  }

  open(): void {
    fs.mkdirSync(path.dirname(this.path), { recursive: true });
    this.fd = fs.openSync(this.path, 'a');
  }

  log(event: string, data: Record<string, unknown> = {}): void {
    if (this.fd === null) {
      throw new Error(`Event log ${this.path} is not open`);
    }

    const entry: AuditEvent = {
      timestamp: new Date().toISOString(),
      module: this.moduleName,
      run: this.run,
      event,
      data,
    };
    fs.writeSync(this.fd, `${JSON.stringify(entry)}\n`);
    fs.fsyncSync(this.fd);
  }

  close(): void {
    if (this.fd === null) return;
    fs.closeSync(this.fd);
    this.fd = null;
  }
}

/**
 * Raw framework console output in arrival order, sentinels included, so the
 * file reads like the terminal would have.
 */
export class TranscriptLogger {
  readonly path: string;
  private failed = false;

  constructor(outputDir: string) {
    this.path = path.join(outputDir, 'agents', 'framework-transcript.log');
    fs.mkdirSync(path.dirname(this.path), { recursive: true });
    fs.appendFileSync(this.path, `\n--- console attached ${new Date().toISOString()} ---\n`);
  }

  /** Called from the console's output handler, so a write error is reported, never thrown. */
  append(chunk: string): void {
    try {
      fs.appendFileSync(this.path, chunk);
      this.failed = false;
    } catch (error) {
      if (this.failed) return;
      this.failed = true;
      console.warn(`[audit] Could not write to ${this.path}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
