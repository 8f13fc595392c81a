import { randomUUID } from 'node:crypto';
import type {
  AttemptError,
  AttemptRecord,
  AttemptStatus,
  ExploitCandidate,
  SessionFault,
  SessionOutcome,
  TargetDescriptor,
} from '../types/index.js';
import type { FrameworkAdapter } from '../framework/msf-adapter.js';

const TERMINAL_ATTEMPT_STATUSES: ReadonlySet<AttemptStatus> = new Set([
  'succeeded',
  'failed',
  'timed_out',
  'errored',
]);

export interface AttemptResult {
  status: AttemptStatus;
  rawOutput: string;
  artifactPath?: string;
  error?: AttemptError;
  finishedAt?: string;
}

/**
 * One automated run against one target. Owns the candidate snapshot and the
 * ordered attempt log, and refuses transitions that would break the ordering
 * or single-running guarantees.
 */
export class OrchestrationSession {
  readonly id: string;
  readonly target: TargetDescriptor;
  readonly adapter: FrameworkAdapter;

  private _outcome: SessionOutcome = 'not_started';
  private _candidates: readonly ExploitCandidate[] = [];
  private _attempts: AttemptRecord[] = [];
  private _fault: SessionFault | null = null;
  private _startedAt: string | null = null;
  private _finishedAt: string | null = null;

  constructor(
    target: TargetDescriptor,
    adapter: FrameworkAdapter,
    private readonly now: () => Date = () => new Date(),
    id: string = `session-${randomUUID().slice(0, 8)}`
  ) {
    this.id = id;
    this.target = Object.freeze({ ...target, openServices: Object.freeze([...target.openServices]) });
    this.adapter = adapter;
  }

  get outcome(): SessionOutcome {
    return this._outcome;
  }

  get candidates(): readonly ExploitCandidate[] {
    return this._candidates;
  }

  get attempts(): readonly AttemptRecord[] {
    return [...this._attempts];
  }

  get fault(): SessionFault | null {
    return this._fault;
  }

  get startedAt(): string | null {
    return this._startedAt;
  }

  get finishedAt(): string | null {
    return this._finishedAt;
  }

  get runningAttempts(): AttemptRecord[] {
    return this._attempts.filter((attempt) => attempt.status === 'running');
  }

  begin(candidates: readonly ExploitCandidate[]): void {
    if (this._outcome !== 'not_started') {
      throw new Error(`Session ${this.id} already started (${this._outcome})`);
    }
    this._candidates = Object.freeze([...candidates]);
    this._outcome = 'in_progress';
    this._startedAt = this.now().toISOString();
  }

  startAttempt(candidate: ExploitCandidate): AttemptRecord {
    this.assertInProgress();

    const open = this._attempts.find((attempt) => !TERMINAL_ATTEMPT_STATUSES.has(attempt.status));
    if (open) {
      throw new Error(`Attempt ${open.index} (${open.candidate.moduleId}) is still ${open.status}`);
    }

    const expected = this._candidates[this._attempts.length];
    if (expected !== candidate) {
      throw new Error(
        `Out-of-order attempt: expected ${expected?.moduleId ?? 'no further candidate'}, got ${candidate.moduleId}`
      );
    }

    const record: AttemptRecord = {
      index: this._attempts.length + 1,
      candidate,
      startedAt: this.now().toISOString(),
      status: 'pending',
      rawOutput: '',
    };
    this._attempts.push(record);
    return record;
  }

  markRunning(index: number): AttemptRecord {
    const record = this.openAttempt(index);
    if (record.status !== 'pending') {
      throw new Error(`Attempt ${index} cannot start running from ${record.status}`);
    }
    return this.replace({ ...record, status: 'running' });
  }

  finishAttempt(index: number, result: AttemptResult): AttemptRecord {
    const record = this.openAttempt(index);
    if (!TERMINAL_ATTEMPT_STATUSES.has(result.status)) {
      throw new Error(`Attempt ${index} cannot finish as ${result.status}`);
    }

    return this.replace(
      Object.freeze({
        ...record,
        status: result.status,
        rawOutput: result.rawOutput,
        finishedAt: result.finishedAt ?? this.now().toISOString(),
        ...(result.artifactPath ? { artifactPath: result.artifactPath } : {}),
        ...(result.error ? { error: result.error } : {}),
      })
    );
  }

  conclude(outcome: Exclude<SessionOutcome, 'not_started' | 'in_progress'>, fault?: SessionFault): void {
    this.assertInProgress();

    if (this._attempts.some((attempt) => !TERMINAL_ATTEMPT_STATUSES.has(attempt.status))) {
      throw new Error(`Session ${this.id} cannot conclude with an attempt still open`);
    }

    const anySucceeded = this._attempts.some((attempt) => attempt.status === 'succeeded');

    if (outcome === 'succeeded' && !anySucceeded) {
      throw new Error('A session can only succeed through a succeeded attempt');
    }
    if (outcome === 'exhausted' && (anySucceeded || this._attempts.length !== this._candidates.length)) {
      throw new Error('A session is only exhausted once every candidate failed');
    }
    if (outcome === 'aborted' && !fault) {
      throw new Error('An aborted session needs a fault');
    }

    this._outcome = outcome;
    this._fault = fault ?? null;
    this._finishedAt = this.now().toISOString();
  }

  private assertInProgress(): void {
    if (this._outcome !== 'in_progress') {
      throw new Error(`Session ${this.id} is ${this._outcome}`);
    }
  }

  private openAttempt(index: number): AttemptRecord {
    const record = this._attempts[index - 1];
    if (!record) throw new Error(`No attempt ${index} in session ${this.id}`);
    if (record.finishedAt !== undefined) throw new Error(`Attempt ${index} is already finished`);
    return record;
  }

  private replace(record: AttemptRecord): AttemptRecord {
    this._attempts[record.index - 1] = record;
    return record;
  }
}
