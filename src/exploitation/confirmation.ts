import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';

export type ConfirmationDecision = 'proceed' | 'abort';

export interface ConfirmationRequest {
  address: string;
  port: number | null;
  moduleId: string;
  rank?: string;
  scope: 'session' | 'attempt' | 'replay';
}

const SCOPE_NOTES: Record<ConfirmationRequest['scope'], string> = {
  session: 'Consent covers every remaining candidate in this session.',
  attempt: 'Consent covers this attempt only.',
  replay: 'This replays a recorded resource script.',
};

/**
 * Suspension point before an irreversible launch. Implementations resolve
 * with the operator's decision and should give up when `signal` aborts.
 */
export interface ConfirmationGate {
  confirm(request: ConfirmationRequest, signal?: AbortSignal): Promise<ConfirmationDecision>;
}

/** Terminal prompt. Only an explicit "yes" proceeds. */
export class PromptConfirmationGate implements ConfirmationGate {
  constructor(
    private readonly input: Readable = process.stdin,
    private readonly output: Writable = process.stdout
  ) {}

  confirm(request: ConfirmationRequest, signal?: AbortSignal): Promise<ConfirmationDecision> {
    if (signal?.aborted) return Promise.resolve('abort');

    const rl = createInterface({ input: this.input, output: this.output });
    const endpoint = request.port === null ? request.address : `${request.address}:${request.port}`;

    this.output.write('\n');
    this.output.write('\x1b[33m[!] WARNING: this will run a real exploit against the target.\x1b[0m\n');
    this.output.write(`    Target:  ${endpoint}\n`);
    this.output.write(`    Module:  ${request.moduleId}${request.rank ? ` [${request.rank}]` : ''}\n`);
    this.output.write(`    ${SCOPE_NOTES[request.scope]}\n`);
    this.output.write('    Ensure you have written authorization before proceeding.\n');

    return new Promise((resolve) => {
      let settled = false;
      const settle = (decision: ConfirmationDecision) => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener('abort', onAbort);
        rl.close();
        resolve(decision);
      };
      const onAbort = () => settle('abort');
      signal?.addEventListener('abort', onAbort, { once: true });

      rl.on('close', () => settle('abort'));
      rl.question('[?] Do you want to proceed? (yes/NO): ', (answer) => {
        settle(answer.trim().toLowerCase() === 'yes' ? 'proceed' : 'abort');
      });
    });
  }
}

/**
 * Consent given out of band, e.g. through a workflow signal before the
 * exploitation activity started.
 */
export class PreauthorizedGate implements ConfirmationGate {
  constructor(private readonly grantedBy: string) {}

  async confirm(request: ConfirmationRequest): Promise<ConfirmationDecision> {
    console.log(`[confirmation] ${request.moduleId} pre-authorized by ${this.grantedBy}`);
    return 'proceed';
  }
}

/**
 * Ask the gate, treating an elapsed `timeoutMs` or an operator abort as a
 * refusal. Without a timeout the wait is unbounded.
 */
export async function requestConfirmation(
  gate: ConfirmationGate,
  request: ConfirmationRequest,
  options: { timeoutMs?: number; signal?: AbortSignal } = {}
): Promise<ConfirmationDecision> {
  if (options.signal?.aborted) return 'abort';

  const controller = new AbortController();
  const forwardAbort = () => controller.abort();
  options.signal?.addEventListener('abort', forwardAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<ConfirmationDecision>((resolve) => {
    if (controller.signal.aborted) {
      resolve('abort');
      return;
    }
    controller.signal.addEventListener('abort', () => resolve('abort'), { once: true });
    if (options.timeoutMs !== undefined) {
      timer = setTimeout(() => {
        console.warn(`[confirmation] No answer within ${options.timeoutMs}ms, treating as abort`);
        controller.abort();
      }, options.timeoutMs);
    }
  });

  try {
    return await Promise.race([gate.confirm(request, controller.signal), expired]);
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener('abort', forwardAbort);
    controller.abort();
  }
}
