import { describe, it, expect } from 'vitest';
import { OrchestrationSession } from '../../src/exploitation/session.js';
import { FTP, SMB, ScriptedAdapter, makeCandidate, makeTarget } from '../helpers/scripted-adapter.js';

const ALPHA = makeCandidate('exploit/unix/ftp/alpha');
const BRAVO = makeCandidate('exploit/unix/ftp/bravo');

function started(): OrchestrationSession {
  const session = new OrchestrationSession(makeTarget(), new ScriptedAdapter(), () => new Date('2026-01-01T10:00:00Z'), 'session-test');
  session.begin([ALPHA, BRAVO]);
  return session;
}

describe('OrchestrationSession', () => {
  it('starts not_started and moves to in_progress with a frozen snapshot', () => {
    const session = new OrchestrationSession(makeTarget(), new ScriptedAdapter());
    expect(session.outcome).toBe('not_started');
    expect(session.id).toMatch(/^session-[0-9a-f]{8}$/);

    session.begin([ALPHA]);

    expect(session.outcome).toBe('in_progress');
    expect(Object.isFrozen(session.candidates)).toBe(true);
    expect(session.startedAt).not.toBeNull();
    expect(() => session.begin([ALPHA])).toThrow('already started (in_progress)');
  });

  it('keeps its own copy of the target', () => {
    const services = [FTP];
    const session = new OrchestrationSession(makeTarget(services), new ScriptedAdapter());
    services.push(SMB);

    expect(session.target.openServices).toEqual([FTP]);
    expect(Object.isFrozen(session.target)).toBe(true);
  });

  it('numbers attempts from 1 and walks pending, running, terminal', () => {
    const session = started();

    const pending = session.startAttempt(ALPHA);
    expect(pending).toMatchObject({ index: 1, status: 'pending', rawOutput: '' });

    expect(session.markRunning(1).status).toBe('running');
    expect(session.runningAttempts).toHaveLength(1);

    const done = session.finishAttempt(1, { status: 'failed', rawOutput: 'no session' });
    expect(done).toMatchObject({ index: 1, status: 'failed', rawOutput: 'no session', finishedAt: '2026-01-01T10:00:00.000Z' });
    expect(Object.isFrozen(done)).toBe(true);
    expect(session.runningAttempts).toEqual([]);
  });

  it('rejects attempts out of snapshot order', () => {
    const session = started();

    expect(() => session.startAttempt(BRAVO)).toThrow(
      'Out-of-order attempt: expected exploit/unix/ftp/alpha, got exploit/unix/ftp/bravo'
    );
  });

  it('allows only one open attempt at a time', () => {
    const session = started();
    session.startAttempt(ALPHA);

    expect(() => session.startAttempt(BRAVO)).toThrow('Attempt 1 (exploit/unix/ftp/alpha) is still pending');
  });

  it('refuses to finish an attempt twice or with a non-terminal status', () => {
    const session = started();
    session.startAttempt(ALPHA);

    expect(() => session.finishAttempt(1, { status: 'running', rawOutput: '' })).toThrow('cannot finish as running');
    session.finishAttempt(1, { status: 'errored', rawOutput: '' });
    expect(() => session.finishAttempt(1, { status: 'failed', rawOutput: '' })).toThrow('Attempt 1 is already finished');
  });

  it('hands out copies of the attempt log', () => {
    const session = started();
    session.startAttempt(ALPHA);

    const attempts = session.attempts;
    expect(attempts).not.toBe(session.attempts);
    expect(attempts).toEqual(session.attempts);
  });

  describe('conclude', () => {
    it('succeeds only through a succeeded attempt', () => {
      const session = started();
      session.startAttempt(ALPHA);
      session.finishAttempt(1, { status: 'failed', rawOutput: '' });

      expect(() => session.conclude('succeeded')).toThrow('only succeed through a succeeded attempt');

      session.startAttempt(BRAVO);
      session.finishAttempt(2, { status: 'succeeded', rawOutput: '' });
      session.conclude('succeeded');
      expect(session.outcome).toBe('succeeded');
      expect(session.fault).toBeNull();
    });

    it('is exhausted only once every candidate was attempted', () => {
      const session = started();
      session.startAttempt(ALPHA);
      session.finishAttempt(1, { status: 'failed', rawOutput: '' });

      expect(() => session.conclude('exhausted')).toThrow('only exhausted once every candidate failed');
    });

    it('needs a fault to abort and no open attempt', () => {
      const session = started();
      session.startAttempt(ALPHA);

      expect(() => session.conclude('aborted', { type: 'OperatorAbort', message: 'stop' })).toThrow(
        'cannot conclude with an attempt still open'
      );
      session.finishAttempt(1, { status: 'errored', rawOutput: '' });
      expect(() => session.conclude('aborted')).toThrow('needs a fault');

      session.conclude('aborted', { type: 'OperatorAbort', message: 'stop' });
      expect(session.fault).toEqual({ type: 'OperatorAbort', message: 'stop' });
      expect(() => session.startAttempt(BRAVO)).toThrow('Session session-test is aborted');
    });
  });
});
