import fs from 'node:fs';
import path from 'node:path';
import type { AttemptStatus, ModuleName, RunSummary, SessionMetrics } from '../types/index.js';
import { MODULE_PHASE_MAP } from '../constants.js';
import { FileLock } from '../utils/concurrency.js';
import { isErrnoException } from '../error-handling.js';

/**
 * `session.json` for one output directory. Each activity opens its own
 * tracker, so every change is a locked read-modify-write ending in an
 * atomic rename.
 */
export class MetricsTracker {
  readonly path: string;
  private readonly lock: FileLock;
  private current: SessionMetrics;

  constructor(outputDir: string, private readonly sessionId: string) {
    this.path = path.join(outputDir, 'session.json');
    this.lock = new FileLock(outputDir);
    this.current = emptyMetrics(sessionId);
  }

  update(change: (metrics: SessionMetrics) => void): Promise<SessionMetrics> {
    return this.lock.withLock(this.sessionId, () => {
      const metrics = this.read() ?? emptyMetrics(this.sessionId);
      change(metrics);
      this.write(metrics);
      this.current = metrics;
      return structuredClone(metrics);
    });
  }

  /** Last state this tracker read or wrote. */
  snapshot(): SessionMetrics {
    return structuredClone(this.current);
  }

  private read(): SessionMetrics | null {
    try {
      const stored: SessionMetrics = JSON.parse(fs.readFileSync(this.path, 'utf-8'));
      return stored;
    } catch (error) {
      if (isErrnoException(error, 'ENOENT')) return null;
      throw error;
    }
  }

  private write(metrics: SessionMetrics): void {
    fs.mkdirSync(path.dirname(this.path), { recursive: true });
    const tmpPath = `${this.path}.${process.pid}.tmp`;
    fs.writeFileSync(tmpPath, JSON.stringify(metrics, null, 2));
    fs.renameSync(tmpPath, this.path);
  }
}

export function emptyMetrics(sessionId: string, now: Date = new Date()): SessionMetrics {
  return { sessionId, startTime: now.toISOString(), status: 'running', modules: {}, attempts: {} };
}

// ─── Transitions ────────────────────────────────────────────────

export function startModule(metrics: SessionMetrics, name: ModuleName, run: number, now: Date = new Date()): void {
  metrics.modules[name] = {
    name,
    phase: MODULE_PHASE_MAP[name],
    status: 'running',
    run,
    startTime: now.toISOString(),
  };
}

export function endModule(
  metrics: SessionMetrics,
  name: ModuleName,
  success: boolean,
  error?: string,
  now: Date = new Date()
): void {
  const module = metrics.modules[name];
  if (!module) return;

  module.status = success ? 'completed' : 'failed';
  module.endTime = now.toISOString();
  if (module.startTime) module.durationMs = now.getTime() - Date.parse(module.startTime);
  if (error) module.error = error;
}

export function countAttempt(metrics: SessionMetrics, status: AttemptStatus): void {
  metrics.attempts[status] = (metrics.attempts[status] ?? 0) + 1;
}

export function finishRun(metrics: SessionMetrics, summary: RunSummary, now: Date = new Date()): void {
  metrics.status = 'completed';
  metrics.summary = summary;
  metrics.endTime = now.toISOString();
  metrics.totalDurationMs = now.getTime() - Date.parse(metrics.startTime);
}
