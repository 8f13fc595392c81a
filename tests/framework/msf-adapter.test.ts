import { describe, it, expect, vi, afterEach } from 'vitest';
import { MsfConsoleAdapter, cleanOutput, findSentinel } from '../../src/framework/msf-adapter.js';
import { CommandTimeoutError, NetstrikeError } from '../../src/error-handling.js';
import { fakeLauncher, VERSION_REPLY, type ConsoleScript } from '../helpers/fake-console.js';

function open(script: ConsoleScript, onTranscript?: (chunk: string) => void) {
  const { launcher, consoles } = fakeLauncher((command) => (command === 'version' ? VERSION_REPLY : script(command)));
  const opening = MsfConsoleAdapter.open({
    msfPath: 'msfconsole',
    startupTimeoutMs: 500,
    launcher,
    ...(onTranscript ? { onTranscript } : {}),
  });
  return { opening, consoles };
}

describe('MsfConsoleAdapter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('waits for the console to answer before resolving open', async () => {
    const { opening, consoles } = open(() => '');
    const adapter = await opening;

    expect(adapter.isOpen).toBe(true);
    expect(consoles).toHaveLength(1);
    expect(consoles[0].commands).toEqual(['version']);
  });

  it('returns command output without ANSI codes or trailing whitespace', async () => {
    const { opening } = open((command) => (command === 'back' ? '\x1b[1m[*] ok\x1b[0m  \n\n' : ''));
    const adapter = await opening;

    await expect(adapter.execute('back', 500)).resolves.toBe('[*] ok');
  });

  it('runs commands one at a time in call order', async () => {
    const { opening, consoles } = open((command) => `out:${command}`);
    const adapter = await opening;

    const results = await Promise.all([
      adapter.execute('use exploit/a', 500),
      adapter.execute('show options', 500),
      adapter.execute('back', 500),
    ]);

    expect(results).toEqual(['out:use exploit/a', 'out:show options', 'out:back']);
    expect(consoles[0].commands).toEqual(['version', 'use exploit/a', 'show options', 'back']);
  });

  it('forwards every raw chunk to the transcript listener', async () => {
    const chunks: string[] = [];
    const { opening } = open(() => 'hello', (chunk) => chunks.push(chunk));
    const adapter = await opening;
    await adapter.execute('banner', 500);

    expect(chunks.join('')).toContain('hello\n__NETSTRIKE_DONE_2__\n');
  });

  it('rejects with the partial output when a command times out', async () => {
    const { opening } = open((command) =>
      command === 'run -z' ? { hold: true, partial: '[*] Started reverse TCP handler\n' } : ''
    );
    const adapter = await opening;

    const error = await adapter.execute('run -z', 50).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(CommandTimeoutError);
    if (!(error instanceof CommandTimeoutError)) return;
    expect(error.type).toBe('TimeoutError');
    expect(error.partialOutput).toBe('[*] Started reverse TCP handler');
  });

  it('discards late output of a timed-out command', async () => {
    const { opening, consoles } = open((command) => (command === 'run -z' ? { hold: true } : `out:${command}`));
    const adapter = await opening;

    await expect(adapter.execute('run -z', 30)).rejects.toThrow('timed out after 30ms');

    const next = adapter.execute('sessions -l', 500);
    consoles[0].release('[*] Exploit completed, but no session was created.');

    await expect(next).resolves.toBe('out:sessions -l');
  });

  it('recover reports idle when nothing is outstanding', async () => {
    const { opening, consoles } = open(() => '');
    const adapter = await opening;

    await expect(adapter.recover(50)).resolves.toBe('idle');
    expect(consoles[0].signals).toEqual([]);
  });

  it('recover interrupts an orphaned job and keeps the console', async () => {
    const { opening, consoles } = open((command) => (command === 'run -z' ? { hold: true } : `out:${command}`));
    const adapter = await opening;
    await expect(adapter.execute('run -z', 30)).rejects.toThrow(CommandTimeoutError);

    await expect(adapter.recover(200)).resolves.toBe('interrupted');
    expect(consoles).toHaveLength(1);
    expect(consoles[0].signals).toEqual(['SIGINT']);
    await expect(adapter.execute('back', 500)).resolves.toBe('out:back');
  });

  it('recover restarts a console that ignores the interrupt', async () => {
    const { opening, consoles } = open((command) => (command === 'run -z' ? { hold: true } : `out:${command}`));
    const adapter = await opening;
    consoles[0].interruptible = false;
    await expect(adapter.execute('run -z', 30)).rejects.toThrow(CommandTimeoutError);

    await expect(adapter.recover(30)).resolves.toBe('restarted');
    expect(consoles).toHaveLength(2);
    expect(consoles[0].signals).toEqual(['SIGINT', 'SIGKILL']);
    expect(consoles[1].commands).toEqual(['version']);
    await expect(adapter.execute('back', 500)).resolves.toBe('out:back');
  });

  it('fails the running command with ConnectionError when the console exits', async () => {
    const { opening, consoles } = open((command) => (command === 'run -z' ? { hold: true } : ''));
    const adapter = await opening;

    const running = adapter.execute('run -z', 1000);
    setImmediate(() => consoles[0].exit(1, null));

    await expect(running).rejects.toMatchObject({ type: 'ConnectionError' });
    expect(adapter.isOpen).toBe(false);
    await expect(adapter.execute('back', 500)).rejects.toThrow('Framework console is not open');
  });

  it('rejects with OperatorAbort when the signal fires', async () => {
    const { opening } = open((command) => (command === 'run -z' ? { hold: true } : ''));
    const adapter = await opening;
    const abort = new AbortController();

    const running = adapter.execute('run -z', 1000, { signal: abort.signal });
    setTimeout(() => abort.abort(), 10);

    await expect(running).rejects.toMatchObject({ type: 'OperatorAbort', message: 'Operator aborted "run -z"' });
  });

  it('refuses multi-line commands', async () => {
    const { opening } = open(() => '');
    const adapter = await opening;

    await expect(adapter.execute('use a\nrun', 500)).rejects.toMatchObject({ type: 'ProtocolError' });
  });

  it('wraps a launch failure as ConnectionError', async () => {
    const opening = MsfConsoleAdapter.open({
      msfPath: '/missing/msfconsole',
      startupTimeoutMs: 100,
      launcher: () => {
        throw new Error('spawn ENOENT');
      },
    });

    await expect(opening).rejects.toThrow(NetstrikeError);
    await expect(opening).rejects.toThrow('Failed to start /missing/msfconsole: spawn ENOENT');
  });

  it('gives up when the console never becomes ready', async () => {
    const { launcher } = fakeLauncher(() => ({ hold: true }));
    const opening = MsfConsoleAdapter.open({ msfPath: 'msfconsole', startupTimeoutMs: 30, launcher });

    await expect(opening).rejects.toMatchObject({ type: 'ConnectionError' });
  });

  it('close sends exit and marks the adapter closed', async () => {
    const { opening, consoles } = open(() => '');
    const adapter = await opening;

    await adapter.close();

    expect(adapter.isOpen).toBe(false);
    await expect(adapter.execute('back', 500)).rejects.toMatchObject({ type: 'ConnectionError' });
    expect(consoles[0].signals).toEqual([]);
  });
});

describe('findSentinel', () => {
  it('ignores the echoed command and matches the sentinel line', () => {
    const buffer = 'msf6 > echo __X__\n[*] output\n__X__\nmsf6 > ';

    const match = findSentinel(buffer, '__X__');

    expect(match).not.toBeNull();
    expect(buffer.slice(0, match?.start)).toBe('msf6 > echo __X__\n[*] output\n');
    expect(buffer.slice(match?.end)).toBe('msf6 > ');
  });

  it('needs the full line before matching', () => {
    expect(findSentinel('[*] output\n__X__', '__X__')).toBeNull();
  });
});

describe('cleanOutput', () => {
  it('drops the echo line and colour codes', () => {
    expect(cleanOutput('\x1b[32m[+] done\x1b[0m\r\necho __X__\n\n', '__X__')).toBe('[+] done');
  });
});
