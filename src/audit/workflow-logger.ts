import fs from 'node:fs';
import path from 'node:path';
import type { AttemptRecord, ModuleName, ModuleStatus, OutcomeReport } from '../types/index.js';

type Level = 'INFO' | 'WARN' | 'ERROR';

/** `workflow.log`: one line per module transition, attempt and session outcome. */
export class WorkflowLogger {
  readonly path: string;

  constructor(outputDir: string) {
    this.path = path.join(outputDir, 'workflow.log');
  }

  /** Writes the header once; later activities append to the same file. */
  initialize(sessionId: string): void {
    if (fs.existsSync(this.path)) return;
    fs.mkdirSync(path.dirname(this.path), { recursive: true });
    fs.writeFileSync(this.path, `# netstrike run ${sessionId}\n# started ${new Date().toISOString()}\n\n`);
  }

  module(name: ModuleName, status: ModuleStatus, error?: string): void {
    this.write(status === 'failed' ? 'ERROR' : 'INFO', name, error ? `${status}: ${error}` : status);
  }

  attempt(attempt: AttemptRecord): void {
    const { candidate } = attempt;
    const level: Level = attempt.status === 'succeeded' || attempt.status === 'failed' ? 'INFO' : 'WARN';
    const error = attempt.error ? ` (${attempt.error.type}: ${attempt.error.message})` : '';
    this.write(
      level,
      'exploitation',
      `attempt ${attempt.index} ${candidate.moduleId} on ${candidate.service.port}/${candidate.service.protocol}: ${attempt.status}${error}`
    );
  }

  outcome(report: OutcomeReport): void {
    const via = report.successfulModule ? ` via ${report.successfulModule}` : '';
    const fault = report.fault ? ` (${report.fault.type}: ${report.fault.message})` : '';
    this.write(
      report.sessionOutcome === 'aborted' ? 'WARN' : 'INFO',
      'exploitation',
      `session ${report.sessionId} ${report.sessionOutcome}${via}${fault} after ${report.attempts.length} attempt(s)`
    );
  }

  message(text: string, level: Level = 'INFO'): void {
    this.write(level, 'run', text);
  }

  private write(level: Level, source: string, text: string): void {
    fs.appendFileSync(this.path, `${new Date().toISOString()} ${level.padEnd(5)} [${source}] ${text}\n`);
  }
}
