import type { AttemptRecord, AttemptStatus, AttemptSummary, OutcomeReport } from '../types/index.js';
import type { OrchestrationSession } from './session.js';
import { DEFAULTS } from '../constants.js';

export interface SummarizeOptions {
  outputSummaryChars?: number;
}

export function summarize(session: OrchestrationSession, options: SummarizeOptions = {}): OutcomeReport {
  const limit = options.outputSummaryChars ?? DEFAULTS.OUTPUT_SUMMARY_CHARS;
  const attempts = session.attempts.map((attempt) => summarizeAttempt(attempt, limit));

  const counts: Record<AttemptStatus, number> = {
    pending: 0,
    running: 0,
    succeeded: 0,
    failed: 0,
    timed_out: 0,
    errored: 0,
  };
  for (const attempt of attempts) counts[attempt.status]++;

  const winner = attempts.find((attempt) => attempt.status === 'succeeded');

  return {
    sessionId: session.id,
    target: {
      address: session.target.address,
      hostname: session.target.hostname ?? null,
      services: session.target.openServices.map((service) => ({ ...service })),
    },
    sessionOutcome: session.outcome,
    fault: session.fault,
    startedAt: session.startedAt,
    finishedAt: session.finishedAt,
    durationMs: elapsed(session.startedAt, session.finishedAt),
    candidateCount: session.candidates.length,
    attempts,
    counts,
    successfulModule: winner?.moduleId ?? null,
  };
}

function summarizeAttempt(attempt: AttemptRecord, limit: number): AttemptSummary {
  return {
    index: attempt.index,
    moduleId: attempt.candidate.moduleId,
    port: attempt.candidate.service.port,
    rank: attempt.candidate.rank,
    status: attempt.status,
    durationMs: elapsed(attempt.startedAt, attempt.finishedAt ?? null),
    artifactPath: attempt.artifactPath ?? null,
    outputSummary: tail(attempt.rawOutput, limit),
    error: attempt.error ?? null,
  };
}

/** Last `limit` characters, since module output ends with the verdict lines. */
export function tail(text: string, limit: number): string {
  const trimmed = text.trim();
  if (limit <= 0) return '';
  if (trimmed.length <= limit) return trimmed;
  return `...${trimmed.slice(trimmed.length - limit)}`;
}

function elapsed(start: string | null, end: string | null): number {
  if (!start || !end) return 0;
  return Math.max(0, Date.parse(end) - Date.parse(start));
}
