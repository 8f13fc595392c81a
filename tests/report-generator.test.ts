import { describe, it, expect } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { formatDuration, generateReport, renderMarkdownReport, type ReportData } from '../src/report-generator.js';
import type { OutcomeReport } from '../src/types/index.js';
import { FTP } from './helpers/scripted-adapter.js';

const OUTCOME: OutcomeReport = {
  sessionId: 'session-1a2b3c4d',
  target: { address: '10.0.0.5', hostname: 'lab-box', services: [FTP] },
  sessionOutcome: 'succeeded',
  fault: null,
  startedAt: '2026-01-01T10:00:00.000Z',
  finishedAt: '2026-01-01T10:01:05.000Z',
  durationMs: 65000,
  candidateCount: 3,
  attempts: [
    {
      index: 1,
      moduleId: 'exploit/unix/ftp/alpha',
      port: 21,
      rank: 'excellent',
      status: 'timed_out',
      durationMs: 60000,
      artifactPath: null,
      outputSummary: '',
      error: { type: 'TimeoutError', message: 'No outcome within 60000ms' },
    },
    {
      index: 2,
      moduleId: 'exploit/unix/ftp/bravo',
      port: 21,
      rank: 'good',
      status: 'succeeded',
      durationMs: 5000,
      artifactPath: 'artifacts/10.0.0.5/exploit_unix_ftp_bravo/1767261665000-2.rc',
      outputSummary: '[*] Command shell session 1 opened',
      error: null,
    },
  ],
  counts: { pending: 0, running: 0, succeeded: 1, failed: 0, timed_out: 1, errored: 0 },
  successfulModule: 'exploit/unix/ftp/bravo',
};

const DATA: ReportData = {
  sessionId: 'run-1',
  startTime: '2026-01-01T10:00:00.000Z',
  totalDurationMs: 90500,
  portScan: { address: '10.0.0.5', method: 'nmap', portsScanned: 24, services: [FTP], scanDurationMs: 2500 },
  exploitation: OUTCOME,
};

describe('formatDuration', () => {
  it('picks the largest sensible unit', () => {
    expect(formatDuration(999)).toBe('999ms');
    expect(formatDuration(5000)).toBe('5s');
    expect(formatDuration(90500)).toBe('1m 30s');
    expect(formatDuration(3_780_000)).toBe('1h 3m');
  });
});

describe('renderMarkdownReport', () => {
  const lines = renderMarkdownReport(DATA).split('\n');

  it('states the outcome and the winning module', () => {
    expect(lines).toContain('**Target:** 10.0.0.5 (lab-box)');
    expect(lines).toContain('**Outcome:** SUCCEEDED: a session was opened on the target');
    expect(lines).toContain('**Successful module:** `exploit/unix/ftp/bravo`');
    expect(lines).toContain('**Duration:** 1m 30s');
  });

  it('counts only statuses that occurred', () => {
    expect(lines).toContain('| Candidates | 3 |');
    expect(lines).toContain('| succeeded | 1 |');
    expect(lines).toContain('| timed_out | 1 |');
    expect(lines).not.toContain('| failed | 0 |');
  });

  it('lists services and every attempt in order', () => {
    expect(lines).toContain('| 21 | tcp | ftp | vsftpd | 2.3.4 |');
    expect(lines).toContain('| 1 | `exploit/unix/ftp/alpha` | 21 | excellent | timed_out | 1m 0s | - |');
    expect(lines).toContain(
      '| 2 | `exploit/unix/ftp/bravo` | 21 | good | succeeded | 5s | artifacts/10.0.0.5/exploit_unix_ftp_bravo/1767261665000-2.rc |'
    );
    expect(lines).toContain('- **Error:** TimeoutError: No outcome within 60000ms');
    expect(lines).toContain('- **Port scan:** 1 open of 24 via nmap (2s)');
  });

  it('notes when exploitation never ran', () => {
    const text = renderMarkdownReport({ ...DATA, exploitation: null });

    expect(text).toContain('\nExploitation did not run.\n');
    expect(text).toContain('| 21 | tcp | ftp | vsftpd | 2.3.4 |');
    expect(text).not.toContain('## Attempts');
  });

  it('shows the fault of an aborted session', () => {
    const aborted: OutcomeReport = {
      ...OUTCOME,
      sessionOutcome: 'aborted',
      fault: { type: 'ConnectionError', message: 'msfconsole exited' },
      successfulModule: null,
    };

    const text = renderMarkdownReport({ ...DATA, exploitation: aborted });

    expect(text).toContain('**Outcome:** Aborted\n**Fault:** ConnectionError: msfconsole exited\n');
  });
});

describe('generateReport', () => {
  it('writes markdown or JSON under deliverables', async () => {
    const outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'netstrike-report-'));
    try {
      const markdownPath = await generateReport(DATA, outputDir, 'markdown');
      const jsonPath = await generateReport(DATA, outputDir, 'json');

      expect(markdownPath).toBe(path.join(outputDir, 'deliverables', 'exploitation_report.md'));
      expect(await fs.readFile(markdownPath, 'utf8')).toBe(renderMarkdownReport(DATA));
      expect(JSON.parse(await fs.readFile(jsonPath, 'utf8'))).toEqual(DATA);
    } finally {
      await fs.rm(outputDir, { recursive: true, force: true });
    }
  });
});
