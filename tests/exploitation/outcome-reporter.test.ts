import { describe, it, expect } from 'vitest';
import { summarize, tail } from '../../src/exploitation/outcome-reporter.js';
import { OrchestrationSession } from '../../src/exploitation/session.js';
import { NO_SESSION, SESSION_OPENED, ScriptedAdapter, makeCandidate, makeTarget, FTP } from '../helpers/scripted-adapter.js';

const START = Date.parse('2026-01-01T10:00:00.000Z');
const ALPHA = makeCandidate('exploit/unix/ftp/alpha');
const BRAVO = makeCandidate('exploit/unix/ftp/bravo', { rank: 'great' });

describe('tail', () => {
  it('keeps the end of long output', () => {
    expect(tail('abcdef', 3)).toBe('...def');
  });

  it('returns short output trimmed and whole', () => {
    expect(tail('  abc \n', 10)).toBe('abc');
  });

  it('returns nothing for a zero limit', () => {
    expect(tail('abc', 0)).toBe('');
  });
});

describe('summarize', () => {
  function finishedSession(): OrchestrationSession {
    let clock = START;
    const session = new OrchestrationSession(makeTarget(), new ScriptedAdapter(), () => new Date(clock), 'session-report');
    session.begin([ALPHA, BRAVO]);

    session.startAttempt(ALPHA);
    clock += 1500;
    session.finishAttempt(1, { status: 'failed', rawOutput: NO_SESSION });

    session.startAttempt(BRAVO);
    clock += 500;
    session.finishAttempt(2, { status: 'succeeded', rawOutput: SESSION_OPENED, artifactPath: '/tmp/bravo.rc' });
    session.conclude('succeeded');
    return session;
  }

  it('reports the session and its attempts in order', () => {
    const report = summarize(finishedSession());

    expect(report).toMatchObject({
      sessionId: 'session-report',
      target: { address: '10.0.0.5', hostname: 'lab-box', services: [FTP] },
      sessionOutcome: 'succeeded',
      fault: null,
      startedAt: '2026-01-01T10:00:00.000Z',
      finishedAt: '2026-01-01T10:00:02.000Z',
      durationMs: 2000,
      candidateCount: 2,
      successfulModule: 'exploit/unix/ftp/bravo',
    });
    expect(report.attempts).toEqual([
      {
        index: 1,
        moduleId: 'exploit/unix/ftp/alpha',
        port: 21,
        rank: 'excellent',
        status: 'failed',
        durationMs: 1500,
        artifactPath: null,
        outputSummary: NO_SESSION,
        error: null,
      },
      {
        index: 2,
        moduleId: 'exploit/unix/ftp/bravo',
        port: 21,
        rank: 'great',
        status: 'succeeded',
        durationMs: 500,
        artifactPath: '/tmp/bravo.rc',
        outputSummary: SESSION_OPENED,
        error: null,
      },
    ]);
  });

  it('counts attempts per status', () => {
    expect(summarize(finishedSession()).counts).toEqual({
      pending: 0,
      running: 0,
      succeeded: 1,
      failed: 1,
      timed_out: 0,
      errored: 0,
    });
  });

  it('truncates output summaries to the configured length', () => {
    const report = summarize(finishedSession(), { outputSummaryChars: 5 });

    expect(report.attempts[0].outputSummary).toBe('...ated.');
  });

  it('reports a session that never started', () => {
    const session = new OrchestrationSession(makeTarget([]), new ScriptedAdapter());

    expect(summarize(session)).toMatchObject({
      sessionOutcome: 'not_started',
      startedAt: null,
      durationMs: 0,
      candidateCount: 0,
      attempts: [],
      successfulModule: null,
    });
  });
});
