import { spawn } from 'node:child_process';
import { ANSI_ESCAPE, SENTINEL_PREFIX } from '../constants-msf.js';
import { CommandTimeoutError, NetstrikeError, errorMessage } from '../error-handling.js';

// ─── Console Process Abstraction ────────────────────────────────

export interface ConsoleProcess {
  write(data: string): void;
  onOutput(listener: (chunk: string) => void): void;
  onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void;
  onError(listener: (error: Error) => void): void;
  kill(signal: NodeJS.Signals): void;
}

export type ConsoleLauncher = (command: string, args: string[]) => ConsoleProcess;

export const spawnConsole: ConsoleLauncher = (command, args) => {
  const proc = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] });

  return {
    write: (data) => {
      proc.stdin.write(data);
    },
    onOutput: (listener) => {
      proc.stdout.on('data', (chunk: Buffer) => listener(chunk.toString()));
      proc.stderr.on('data', (chunk: Buffer) => listener(chunk.toString()));
    },
    onExit: (listener) => {
      proc.on('exit', listener);
    },
    onError: (listener) => {
      proc.on('error', listener);
      // EPIPE after the console died surfaces here instead of crashing the process
      proc.stdin.on('error', listener);
    },
    kill: (signal) => {
      proc.kill(signal);
    },
  };
};

// ─── Adapter Contract ───────────────────────────────────────────

export interface ExecuteOptions {
  signal?: AbortSignal;
}

export type RecoveryResult = 'idle' | 'interrupted' | 'restarted';

export interface FrameworkAdapter {
  readonly isOpen: boolean;
  execute(command: string, timeoutMs: number, options?: ExecuteOptions): Promise<string>;
  recover(graceMs: number): Promise<RecoveryResult>;
  close(): Promise<void>;
}

export interface MsfAdapterOptions {
  msfPath: string;
  startupTimeoutMs: number;
  args?: string[];
  launcher?: ConsoleLauncher;
  onTranscript?: (chunk: string) => void;
}

interface PendingCommand {
  sentinel: string;
  resolve: (output: string) => void;
  reject: (error: Error) => void;
}

const DEFAULT_ARGS = ['-q'];
const CLOSE_GRACE_MS = 5_000;

/**
 * Single long-lived msfconsole channel.
 *
 * Commands are serialized through an internal queue. Completion is detected by
 * echoing a per-command sentinel after the command: msfconsole hands unknown
 * commands to the shell, so the sentinel comes back alone on its own line once
 * everything queued before it has run.
 *
 * A command that times out is not forgotten: its sentinel is kept as orphaned
 * and output up to it is discarded when it finally arrives, so the next
 * command never sees stale text. `recover()` interrupts the job behind an
 * orphaned sentinel and, if the console stays unresponsive, kills and respawns it.
 */
export class MsfConsoleAdapter implements FrameworkAdapter {
  private process: ConsoleProcess | null = null;
  private buffer = '';
  private pending: PendingCommand | null = null;
  private orphaned: string[] = [];
  private drainWaiters: Array<(drained: boolean) => void> = [];
  private queue: Promise<unknown> = Promise.resolve();
  private sequence = 0;
  private generation = 0;
  private closing = false;

  private constructor(private readonly options: MsfAdapterOptions) {}

  static async open(options: MsfAdapterOptions): Promise<MsfConsoleAdapter> {
    const adapter = new MsfConsoleAdapter(options);
    await adapter.start();
    return adapter;
  }

  get isOpen(): boolean {
    return this.process !== null && !this.closing;
  }

  execute(command: string, timeoutMs: number, options: ExecuteOptions = {}): Promise<string> {
    return this.enqueue(() => this.send(command, timeoutMs, options.signal));
  }

  recover(graceMs: number): Promise<RecoveryResult> {
    return this.enqueue(async () => {
      if (this.closing) {
        throw new NetstrikeError('Framework console is closing', 'ConnectionError');
      }
      if (this.process && this.orphaned.length === 0) {
        return 'idle';
      }

      if (this.process) {
        console.log(`[framework] Interrupting running job (grace ${graceMs}ms)...`);
        this.process.kill('SIGINT');
        if (await this.waitForDrain(graceMs)) {
          return 'interrupted';
        }
        console.warn('[framework] Console unresponsive after interrupt, restarting');
      }

      this.terminate();
      await this.start();
      return 'restarted';
    });
  }

  close(): Promise<void> {
    return this.enqueue(async () => {
      if (this.closing) return;
      this.closing = true;

      const proc = this.process;
      if (!proc) return;

      await new Promise<void>((resolve) => {
        const timer = setTimeout(() => {
          this.terminate();
          resolve();
        }, CLOSE_GRACE_MS);
        proc.onExit(() => {
          clearTimeout(timer);
          resolve();
        });
        proc.write('exit -y\n');
      });
      this.process = null;
    });
  }

  // ─── Process Lifecycle ──────────────────────────────────────

  private async start(): Promise<void> {
    const launcher = this.options.launcher ?? spawnConsole;
    const generation = ++this.generation;

    let proc: ConsoleProcess;
    try {
      proc = launcher(this.options.msfPath, this.options.args ?? DEFAULT_ARGS);
    } catch (error) {
      throw new NetstrikeError(`Failed to start ${this.options.msfPath}: ${errorMessage(error)}`, 'ConnectionError');
    }

    this.process = proc;
    this.buffer = '';
    this.orphaned = [];

    proc.onOutput((chunk) => {
      if (generation === this.generation) this.handleOutput(chunk);
    });
    proc.onExit((code, signal) => {
      if (generation === this.generation) {
        this.handleLoss(`msfconsole exited (code ${code ?? 'none'}, signal ${signal ?? 'none'})`);
      }
    });
    proc.onError((error) => {
      if (generation === this.generation) this.handleLoss(`msfconsole failed: ${error.message}`);
    });

    try {
      // The banner and database checks can take a while; the first sentinel proves the console reads input.
      await this.send('version', this.options.startupTimeoutMs);
    } catch (error) {
      this.terminate();
      throw new NetstrikeError(`msfconsole did not become ready: ${errorMessage(error)}`, 'ConnectionError');
    }
  }

  private terminate(): void {
    const proc = this.process;
    this.generation++;
    this.process = null;
    this.buffer = '';
    this.orphaned = [];
    this.failPending(new NetstrikeError('msfconsole was terminated', 'ConnectionError'));
    this.flushDrainWaiters(false);
    proc?.kill('SIGKILL');
  }

  private handleLoss(reason: string): void {
    this.process = null;
    this.orphaned = [];
    this.failPending(new NetstrikeError(reason, 'ConnectionError'));
    this.flushDrainWaiters(false);
  }

  // ─── Command Round Trip ─────────────────────────────────────

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private send(command: string, timeoutMs: number, signal?: AbortSignal): Promise<string> {
    const proc = this.process;
    if (!proc || this.closing) {
      return Promise.reject(new NetstrikeError('Framework console is not open', 'ConnectionError'));
    }
    if (/[\r\n]/.test(command)) {
      return Promise.reject(new NetstrikeError('Framework commands must be a single line', 'ProtocolError'));
    }
    if (signal?.aborted) {
      return Promise.reject(new NetstrikeError(`Aborted before "${command}"`, 'OperatorAbort'));
    }

    const sentinel = `${SENTINEL_PREFIX}${++this.sequence}__`;

    return new Promise<string>((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };

      const abandon = (error: Error) => {
        if (this.pending?.sentinel !== sentinel) return;
        this.pending = null;
        this.orphaned.push(sentinel);
        cleanup();
        reject(error);
      };

      const timer = setTimeout(() => {
        abandon(new CommandTimeoutError(command, timeoutMs, cleanOutput(this.buffer, sentinel)));
      }, timeoutMs);

      const onAbort = () => {
        abandon(new NetstrikeError(`Operator aborted "${command}"`, 'OperatorAbort'));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      this.pending = {
        sentinel,
        resolve: (output) => {
          cleanup();
          resolve(output);
        },
        reject: (error) => {
          cleanup();
          reject(error);
        },
      };

      proc.write(`${command}\necho ${sentinel}\n`);
    });
  }

  private handleOutput(chunk: string): void {
    this.options.onTranscript?.(chunk);
    this.buffer += chunk;

    for (;;) {
      const expected = this.orphaned[0] ?? this.pending?.sentinel;
      if (!expected) return;

      const match = findSentinel(this.buffer, expected);
      if (!match) return;

      const output = this.buffer.slice(0, match.start);
      this.buffer = this.buffer.slice(match.end);

      if (this.orphaned[0] === expected) {
        this.orphaned.shift();
        if (this.orphaned.length === 0) this.flushDrainWaiters(true);
        continue;
      }

      const pending = this.pending;
      this.pending = null;
      pending?.resolve(cleanOutput(output, expected));
    }
  }

  private failPending(error: Error): void {
    const pending = this.pending;
    this.pending = null;
    pending?.reject(error);
  }

  private waitForDrain(timeoutMs: number): Promise<boolean> {
    if (this.orphaned.length === 0) return Promise.resolve(true);

    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => {
        this.drainWaiters = this.drainWaiters.filter((waiter) => waiter !== done);
        resolve(false);
      }, timeoutMs);
      const done = (drained: boolean) => {
        clearTimeout(timer);
        resolve(drained);
      };
      this.drainWaiters.push(done);
    });
  }

  private flushDrainWaiters(drained: boolean): void {
    const waiters = this.drainWaiters;
    this.drainWaiters = [];
    for (const waiter of waiters) waiter(drained);
  }
}

// ─── Output Helpers ─────────────────────────────────────────────

export function findSentinel(buffer: string, sentinel: string): { start: number; end: number } | null {
  const pattern = new RegExp(`(^|\\n)[ \\t]*${sentinel}[ \\t]*\\r?\\n`);
  const match = pattern.exec(buffer);
  if (!match) return null;
  return { start: match.index + match[1].length, end: match.index + match[0].length };
}

export function cleanOutput(output: string, sentinel: string): string {
  return output
    .replace(ANSI_ESCAPE, '')
    .split(/\r?\n/)
    .filter((line) => !line.includes(`echo ${sentinel}`))
    .join('\n')
    .trimEnd();
}
