import type { ConsoleLauncher, ConsoleProcess } from '../../src/framework/msf-adapter.js';

export type ConsoleReply = string | { hold: true; partial?: string };
export type ConsoleScript = (command: string) => ConsoleReply;

interface Queued {
  command: string;
  sentinel: string;
  reply: string | null;
}

/**
 * In-process msfconsole stand-in. Like the real console it works through its
 * input in order: a held command blocks every reply queued behind it.
 */
export class FakeConsole implements ConsoleProcess {
  readonly commands: string[] = [];
  readonly signals: NodeJS.Signals[] = [];
  /** Whether SIGINT ends the held command. */
  interruptible = true;

  private queue: Queued[] = [];
  private outputListeners: Array<(chunk: string) => void> = [];
  private exitListeners: Array<(code: number | null, signal: NodeJS.Signals | null) => void> = [];
  private errorListeners: Array<(error: Error) => void> = [];

  constructor(private readonly script: ConsoleScript) {}

  write(data: string): void {
    if (data === 'exit -y\n') {
      setImmediate(() => this.exit(0, null));
      return;
    }

    const match = /^(.*)\necho (\S+)\n$/s.exec(data);
    if (!match) return;
    const [, command, sentinel] = match;
    this.commands.push(command);

    const reply = this.script(command);
    if (typeof reply === 'string') {
      this.queue.push({ command, sentinel, reply });
    } else {
      this.queue.push({ command, sentinel, reply: null });
      if (reply.partial) {
        const partial = reply.partial;
        setImmediate(() => this.emit(partial));
      }
    }
    setImmediate(() => this.flush());
  }

  onOutput(listener: (chunk: string) => void): void {
    this.outputListeners.push(listener);
  }

  onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void {
    this.exitListeners.push(listener);
  }

  onError(listener: (error: Error) => void): void {
    this.errorListeners.push(listener);
  }

  kill(signal: NodeJS.Signals): void {
    this.signals.push(signal);
    if (signal === 'SIGINT' && this.interruptible) {
      const held = this.queue.find((entry) => entry.reply === null);
      if (held) held.reply = '[-] Interrupted';
      setImmediate(() => this.flush());
    }
  }

  /** Let the oldest held command finish with `output`. */
  release(output = ''): void {
    const held = this.queue.find((entry) => entry.reply === null);
    if (held) held.reply = output;
    this.flush();
  }

  emit(chunk: string): void {
    for (const listener of this.outputListeners) listener(chunk);
  }

  exit(code: number | null, signal: NodeJS.Signals | null): void {
    for (const listener of this.exitListeners) listener(code, signal);
  }

  fail(error: Error): void {
    for (const listener of this.errorListeners) listener(error);
  }

  private flush(): void {
    while (this.queue.length > 0 && this.queue[0].reply !== null) {
      const entry = this.queue[0];
      this.queue.shift();
      this.emit(`${entry.reply}\n${entry.sentinel}\n`);
    }
  }
}

export function fakeLauncher(script: ConsoleScript): { launcher: ConsoleLauncher; consoles: FakeConsole[] } {
  const consoles: FakeConsole[] = [];
  const launcher: ConsoleLauncher = () => {
    const fake = new FakeConsole(script);
    consoles.push(fake);
    return fake;
  };
  return { launcher, consoles };
}

export const VERSION_REPLY = 'Framework: 6.4.0-dev\nConsole  : 6.4.0-dev';
