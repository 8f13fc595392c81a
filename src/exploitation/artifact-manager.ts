import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { AttemptRecord, TargetDescriptor } from '../types/index.js';
import type { FrameworkAdapter } from '../framework/msf-adapter.js';
import { MSF_RUN_COMMAND } from '../constants-msf.js';
import { requestConfirmation, type ConfirmationGate } from './confirmation.js';
import { isErrnoException } from '../error-handling.js';

const ARTIFACT_FILE = /^(\d+)-(\d+)\.rc$/;

export interface ArtifactEntry {
  path: string;
  target: string;
  module: string;
  timestamp: number;
  attemptIndex: number;
}

/**
 * Directory name for an address or module id. Every byte outside
 * `[A-Za-z0-9._-]` is written as `%XX`, so distinct values never share a
 * directory and `unslug` gets the original back.
 */
export function slug(value: string): string {
  const escaped = Array.from(Buffer.from(value, 'utf8'), (byte) => {
    const char = String.fromCharCode(byte);
    return /[A-Za-z0-9_-]/.test(char) || (char === '.' && value !== '.' && value !== '..')
      ? char
      : `%${byte.toString(16).toUpperCase().padStart(2, '0')}`;
  }).join('');
  return escaped || '%';
}

export function unslug(name: string): string {
  try {
    return name === '%' ? '' : decodeURIComponent(name);
  } catch {
    return name;
  }
}

/**
 * Stores one replayable resource script per recorded attempt under
 * `<directory>/<target>/<module>/<epochMs>-<attempt>.rc`.
 */
export class ArtifactManager {
  constructor(readonly directory: string) {}

  async record(target: TargetDescriptor, attempt: AttemptRecord, content: string): Promise<string> {
    const epoch = Date.parse(attempt.finishedAt ?? attempt.startedAt);
    const dir = path.join(this.directory, slug(target.address), slug(attempt.candidate.moduleId));
    const filePath = path.join(dir, `${epoch}-${attempt.index}.rc`);

    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(filePath, content, 'utf8');
    return filePath;
  }

  async mostRecent(targetAddress: string): Promise<string | null> {
    const [newest] = await this.list(targetAddress);
    return newest?.path ?? null;
  }

  /** Recorded artifacts, newest first. */
  async list(targetAddress?: string): Promise<ArtifactEntry[]> {
    const targets = targetAddress !== undefined ? [slug(targetAddress)] : await listDirectories(this.directory);
    const entries: ArtifactEntry[] = [];

    for (const target of targets) {
      const targetDir = path.join(this.directory, target);
      for (const module of await listDirectories(targetDir)) {
        const moduleDir = path.join(targetDir, module);
        for (const file of await fs.readdir(moduleDir)) {
          const match = ARTIFACT_FILE.exec(file);
          if (!match) continue;
          entries.push({
            path: path.join(moduleDir, file),
            target: unslug(target),
            module: unslug(module),
            timestamp: parseInt(match[1], 10),
            attemptIndex: parseInt(match[2], 10),
          });
        }
      }
    }

    return entries.sort((a, b) => b.timestamp - a.timestamp || b.attemptIndex - a.attemptIndex);
  }
}

async function listDirectories(dir: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
  } catch (error) {
    if (isErrnoException(error, 'ENOENT')) return [];
    throw error;
  }
}

// ─── Resource Scripts ───────────────────────────────────────────

export function renderResourceScript(
  target: TargetDescriptor,
  attempt: AttemptRecord,
  options: Record<string, string>
): string {
  const { candidate } = attempt;
  const lines = [
    `# Target:   ${target.address}:${candidate.service.port} (${candidate.service.protocol}/${candidate.service.serviceName})`,
    `# Module:   ${candidate.moduleId} [${candidate.rank}]`,
    `# Attempt:  ${attempt.index} ${attempt.status}`,
    `# Started:  ${attempt.startedAt}`,
  ];
  if (attempt.finishedAt) lines.push(`# Finished: ${attempt.finishedAt}`);
  if (attempt.error) lines.push(`# Error:    ${attempt.error.type}: ${attempt.error.message}`);

  lines.push('', `use ${candidate.moduleId}`);
  for (const [name, value] of Object.entries(options)) {
    lines.push(`set ${name} ${value}`);
  }
  lines.push(MSF_RUN_COMMAND, '', '# Captured output:');
  for (const line of attempt.rawOutput.split(/\r?\n/)) {
    lines.push(line ? `# ${line}` : '#');
  }

  return `${lines.join('\n')}\n`;
}

export interface ResourceScriptSummary {
  moduleId: string | null;
  address: string | null;
  port: number | null;
}

export function readResourceScript(content: string): ResourceScriptSummary {
  const moduleMatch = /^use\s+(\S+)\s*$/m.exec(content);
  const hostMatch = /^set\s+RHOSTS\s+(\S+)\s*$/im.exec(content);
  const portMatch = /^set\s+RPORT\s+(\d+)\s*$/im.exec(content);

  return {
    moduleId: moduleMatch ? moduleMatch[1] : null,
    address: hostMatch ? hostMatch[1] : null,
    port: portMatch ? parseInt(portMatch[1], 10) : null,
  };
}

/**
 * Run a recorded script through `resource` once the operator confirms.
 * Returns the console output, or null when the replay was declined.
 */
export async function replayArtifact(
  adapter: FrameworkAdapter,
  artifactPath: string,
  gate: ConfirmationGate,
  options: { timeoutMs: number; confirmationTimeoutMs?: number; signal?: AbortSignal }
): Promise<string | null> {
  const script = readResourceScript(await fs.readFile(artifactPath, 'utf8'));

  const decision = await requestConfirmation(
    gate,
    {
      address: script.address ?? 'unknown',
      port: script.port,
      moduleId: script.moduleId ?? path.basename(artifactPath),
      scope: 'replay',
    },
    { timeoutMs: options.confirmationTimeoutMs, signal: options.signal }
  );
  if (decision === 'abort') {
    console.log(`[artifacts] Replay of ${artifactPath} declined`);
    return null;
  }

  return adapter.execute(`resource ${path.resolve(artifactPath)}`, options.timeoutMs, { signal: options.signal });
}
