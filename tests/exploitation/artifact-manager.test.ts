import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  ArtifactManager,
  readResourceScript,
  renderResourceScript,
  replayArtifact,
  slug,
  unslug,
} from '../../src/exploitation/artifact-manager.js';
import type { ConfirmationGate } from '../../src/exploitation/confirmation.js';
import type { AttemptRecord } from '../../src/types/index.js';
import { ScriptedAdapter, makeCandidate, makeTarget } from '../helpers/scripted-adapter.js';

const ALPHA = makeCandidate('exploit/unix/ftp/alpha');
const BRAVO = makeCandidate('exploit/unix/ftp/bravo');

function attempt(index: number, candidate = ALPHA, finishedAt = '2026-01-01T10:00:05.000Z'): AttemptRecord {
  return {
    index,
    candidate,
    startedAt: '2026-01-01T10:00:00.000Z',
    finishedAt,
    status: 'failed',
    rawOutput: 'msf > run -z\n\n[*] Exploit completed',
  };
}

describe('slug', () => {
  it('keeps addresses readable and escapes path separators', () => {
    expect(slug('10.0.0.5')).toBe('10.0.0.5');
    expect(slug('exploit/unix/ftp/vsftpd_234_backdoor')).toBe('exploit%2Funix%2Fftp%2Fvsftpd_234_backdoor');
    expect(slug('fe80::1')).toBe('fe80%3A%3A1');
    expect(slug('..')).toBe('%2E%2E');
    expect(slug('')).toBe('%');
  });

  it('gives distinct values distinct names', () => {
    expect(slug('a b')).toBe('a%20b');
    expect(slug('a_b')).toBe('a_b');
    expect(slug('a%20b')).toBe('a%2520b');
    expect(slug('fe80::1')).not.toBe(slug('fe80:1'));
  });

  it('reverses with unslug', () => {
    for (const value of ['10.0.0.5', 'fe80::1', 'exploit/unix/ftp/vsftpd_234_backdoor', 'a%20b', '']) {
      expect(unslug(slug(value))).toBe(value);
    }
  });
});

describe('renderResourceScript', () => {
  it('writes the header, the replayable commands and the captured output', () => {
    const script = renderResourceScript(makeTarget(), attempt(2), { RHOSTS: '10.0.0.5', RPORT: '21' });

    expect(script).toBe(
      [
        '# Target:   10.0.0.5:21 (tcp/ftp)',
        '# Module:   exploit/unix/ftp/alpha [excellent]',
        '# Attempt:  2 failed',
        '# Started:  2026-01-01T10:00:00.000Z',
        '# Finished: 2026-01-01T10:00:05.000Z',
        '',
        'use exploit/unix/ftp/alpha',
        'set RHOSTS 10.0.0.5',
        'set RPORT 21',
        'run -z',
        '',
        '# Captured output:',
        '# msf > run -z',
        '#',
        '# [*] Exploit completed',
        '',
      ].join('\n')
    );
  });

  it('notes the error of an errored attempt', () => {
    const errored: AttemptRecord = {
      ...attempt(1),
      status: 'errored',
      error: { type: 'ConfigurationError', message: 'Framework rejected RPORT: bad' },
    };

    expect(renderResourceScript(makeTarget(), errored, {})).toContain(
      '# Error:    ConfigurationError: Framework rejected RPORT: bad\n'
    );
  });
});

describe('readResourceScript', () => {
  it('reads the module and endpoint back', () => {
    const script = renderResourceScript(makeTarget(), attempt(1), { RHOSTS: '10.0.0.5', RPORT: '21' });

    expect(readResourceScript(script)).toEqual({ moduleId: 'exploit/unix/ftp/alpha', address: '10.0.0.5', port: 21 });
  });

  it('ignores commands quoted in the captured output', () => {
    expect(readResourceScript('# use exploit/other\n# set RPORT 80\n')).toEqual({
      moduleId: null,
      address: null,
      port: null,
    });
  });
});

describe('ArtifactManager', () => {
  let directory: string;
  let manager: ArtifactManager;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'netstrike-artifacts-'));
    manager = new ArtifactManager(directory);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('records under target, module and finish time', async () => {
    const filePath = await manager.record(makeTarget(), attempt(2), 'use exploit/unix/ftp/alpha\n');

    expect(filePath).toBe(
      path.join(directory, '10.0.0.5', 'exploit%2Funix%2Fftp%2Falpha', `${Date.parse('2026-01-01T10:00:05.000Z')}-2.rc`)
    );
    expect(await fs.readFile(filePath, 'utf8')).toBe('use exploit/unix/ftp/alpha\n');
  });

  it('lists newest first and breaks ties by attempt index', async () => {
    await manager.record(makeTarget(), attempt(1, ALPHA, '2026-01-01T10:00:01.000Z'), '');
    await manager.record(makeTarget(), attempt(2, ALPHA, '2026-01-01T10:00:09.000Z'), '');
    await manager.record(makeTarget(), attempt(3, BRAVO, '2026-01-01T10:00:09.000Z'), '');
    await fs.writeFile(path.join(directory, '10.0.0.5', 'exploit%2Funix%2Fftp%2Falpha', 'notes.txt'), 'x');

    const entries = await manager.list('10.0.0.5');

    expect(entries.map((entry) => [entry.module, entry.attemptIndex])).toEqual([
      ['exploit/unix/ftp/bravo', 3],
      ['exploit/unix/ftp/alpha', 2],
      ['exploit/unix/ftp/alpha', 1],
    ]);
    expect(await manager.mostRecent('10.0.0.5')).toBe(entries[0].path);
  });

  it('lists every target when none is given', async () => {
    await manager.record(makeTarget(), attempt(1), '');
    await manager.record({ ...makeTarget(), address: '10.0.0.6' }, attempt(1), '');

    const targets = (await manager.list()).map((entry) => entry.target).sort();

    expect(targets).toEqual(['10.0.0.5', '10.0.0.6']);
  });

  it('keeps targets with similar names apart', async () => {
    const spaced = await manager.record({ ...makeTarget(), address: 'lab box' }, attempt(1, ALPHA, '2026-01-01T10:00:01.000Z'), '');
    const underscored = await manager.record({ ...makeTarget(), address: 'lab_box' }, attempt(2, ALPHA, '2026-01-01T10:00:09.000Z'), '');

    expect(await manager.mostRecent('lab box')).toBe(spaced);
    expect(await manager.mostRecent('lab_box')).toBe(underscored);
  });

  it('returns nothing for a target without artifacts', async () => {
    expect(await manager.list('10.0.0.99')).toEqual([]);
    expect(await manager.mostRecent('10.0.0.99')).toBeNull();
    expect(await new ArtifactManager(path.join(directory, 'missing')).list()).toEqual([]);
  });

  describe('replayArtifact', () => {
    let artifactPath: string;

    beforeEach(async () => {
      vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const content = renderResourceScript(makeTarget(), attempt(1), { RHOSTS: '10.0.0.5', RPORT: '21' });
      artifactPath = await manager.record(makeTarget(), attempt(1), content);
    });

    it('asks before replaying and runs the script through resource', async () => {
      const adapter = new ScriptedAdapter().on(/^resource /, '[*] Processing script');
      const gate = { confirm: vi.fn<ConfirmationGate['confirm']>(async () => 'proceed') };

      const output = await replayArtifact(adapter, artifactPath, gate, { timeoutMs: 1000 });

      expect(output).toBe('[*] Processing script');
      expect(adapter.commands).toEqual([`resource ${path.resolve(artifactPath)}`]);
      expect(gate.confirm.mock.calls[0][0]).toEqual({
        address: '10.0.0.5',
        port: 21,
        moduleId: 'exploit/unix/ftp/alpha',
        scope: 'replay',
      });
    });

    it('does nothing when the replay is declined', async () => {
      const adapter = new ScriptedAdapter();
      const gate = { confirm: vi.fn<ConfirmationGate['confirm']>(async () => 'abort') };

      await expect(replayArtifact(adapter, artifactPath, gate, { timeoutMs: 1000 })).resolves.toBeNull();
      expect(adapter.commands).toEqual([]);
    });
  });
});
