import fs from 'node:fs';
import path from 'node:path';
import type { AttemptRecord, ModuleName, OutcomeReport, RunSummary, SessionMetrics } from '../types/index.js';
import { ModuleLogger, TranscriptLogger } from './logger.js';
import { WorkflowLogger } from './workflow-logger.js';
import { MetricsTracker, countAttempt, endModule, finishRun, startModule } from './metrics-tracker.js';

export interface AuditSessionOptions {
  sessionId: string;
  outputDir: string;
}

/**
 * Everything written about one run: `session.json`, `workflow.log`, a JSONL
 * event log per module run and the framework transcript. Several activities
 * may hold an AuditSession on the same directory at once.
 */
export class AuditSession {
  readonly sessionId: string;
  readonly outputDir: string;
  private readonly metrics: MetricsTracker;
  private readonly timeline: WorkflowLogger;
  private events: ModuleLogger | null = null;
  private transcript: TranscriptLogger | null = null;

  constructor(options: AuditSessionOptions) {
    this.sessionId = options.sessionId;
    this.outputDir = options.outputDir;
    this.metrics = new MetricsTracker(options.outputDir, options.sessionId);
    this.timeline = new WorkflowLogger(options.outputDir);
  }

  async initialize(): Promise<void> {
    fs.mkdirSync(path.join(this.outputDir, 'deliverables'), { recursive: true });
    this.timeline.initialize(this.sessionId);
    await this.metrics.update(() => undefined);
  }

  /** Without `run`, numbers the run one past the last recorded for `name`. */
  async startModule(name: ModuleName, run?: number): Promise<number> {
    let assigned = run ?? 1;
    await this.metrics.update((metrics) => {
      assigned = run ?? (metrics.modules[name]?.run ?? 0) + 1;
      startModule(metrics, name, assigned);
    });

    this.events?.close();
    this.events = new ModuleLogger(this.outputDir, name, assigned);
    this.events.open();
    this.events.log('module_start');
    this.timeline.module(name, 'running');
    return assigned;
  }

  async endModule(name: ModuleName, success: boolean, error?: string): Promise<void> {
    if (this.events) {
      this.events.log('module_end', { success, ...(error ? { error } : {}) });
      this.events.close();
      this.events = null;
    }

    this.timeline.module(name, success ? 'completed' : 'failed', error);
    await this.metrics.update((metrics) => endModule(metrics, name, success, error));
  }

  async logAttempt(attempt: AttemptRecord): Promise<void> {
    this.events?.log('attempt_finished', {
      index: attempt.index,
      moduleId: attempt.candidate.moduleId,
      port: attempt.candidate.service.port,
      status: attempt.status,
      startedAt: attempt.startedAt,
      finishedAt: attempt.finishedAt ?? null,
      artifactPath: attempt.artifactPath ?? null,
      error: attempt.error ?? null,
    });
    this.timeline.attempt(attempt);
    await this.metrics.update((metrics) => countAttempt(metrics, attempt.status));
  }

  logOutcome(report: OutcomeReport): void {
    this.events?.log('session_concluded', {
      sessionId: report.sessionId,
      outcome: report.sessionOutcome,
      fault: report.fault,
      successfulModule: report.successfulModule,
      attempts: report.attempts.length,
    });
    this.timeline.outcome(report);
  }

  /** Listener for the framework adapter's raw output. */
  transcriptListener(): (chunk: string) => void {
    const transcript = this.transcript ?? new TranscriptLogger(this.outputDir);
    this.transcript = transcript;
    return (chunk) => transcript.append(chunk);
  }

  async finalize(summary: RunSummary): Promise<void> {
    this.timeline.message(`run completed: ${summary.sessionOutcome}`);
    await this.metrics.update((metrics) => finishRun(metrics, summary));
  }

  getMetrics(): SessionMetrics {
    return this.metrics.snapshot();
  }
}
