import type {
  AttemptError,
  AttemptRecord,
  AttemptStatus,
  ExploitCandidate,
  ResolvedCatalog,
  ServiceFingerprint,
  SessionFault,
  TargetDescriptor,
} from '../types/index.js';
import type { FrameworkAdapter } from '../framework/msf-adapter.js';
import { classifyOutput, targetSessionIds } from '../framework/outcome-classifier.js';
import { MSF_LOAD_FAILURE, MSF_RUN_COMMAND, MSF_SESSION_LIST_COMMAND, type MarkerSet } from '../constants-msf.js';
import { CommandTimeoutError, NetstrikeError, classifyError, errorMessage } from '../error-handling.js';
import { OrchestrationSession } from './session.js';
import { renderResourceScript, type ArtifactManager } from './artifact-manager.js';
import { requestConfirmation, type ConfirmationGate } from './confirmation.js';

export interface CandidateSource {
  resolveTarget(target: TargetDescriptor): Promise<ResolvedCatalog>;
  describe(moduleId: string, service: ServiceFingerprint): Promise<ExploitCandidate>;
}

export interface OrchestrationOptions {
  timeoutPerAttemptMs: number;
  commandTimeoutMs: number;
  recoveryGraceMs: number;
  confirmEachAttempt: boolean;
  confirmationTimeoutMs?: number;
  sessionPollIntervalMs: number;
  recordFailedAttempts: boolean;
  globalOptions: Record<string, string>;
  moduleOptions: Record<string, Record<string, string>>;
  markers: MarkerSet;
}

export interface ControllerHooks {
  onSessionStarted?(session: OrchestrationSession): void;
  onAttemptStarted?(attempt: AttemptRecord, session: OrchestrationSession): void;
  onAttemptFinished?(attempt: AttemptRecord, session: OrchestrationSession): void;
}

export interface ControllerDependencies {
  adapter: FrameworkAdapter;
  resolver: CandidateSource;
  artifacts: ArtifactManager;
  gate: ConfirmationGate;
  hooks?: ControllerHooks;
  now?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface RunOptions {
  signal?: AbortSignal;
}

interface RunContext {
  signal?: AbortSignal;
  recordFailed: boolean;
  consentGiven: boolean;
}

interface StepResult {
  status: AttemptStatus;
  error?: AttemptError;
}

const FATAL_TYPES = new Set<string>(['ConnectionError', 'OperatorAbort']);
const OPTION_NAME = /^[A-Za-z][\w:]*$/;

function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) return resolve();
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

/**
 * Drives exploit attempts for one target through one framework adapter:
 * configure, confirm, launch, classify, in snapshot order, one at a time.
 */
export class ExploitExecutionController {
  private active = false;
  private readonly now: () => Date;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly hooks: ControllerHooks;

  constructor(
    private readonly deps: ControllerDependencies,
    private readonly options: OrchestrationOptions
  ) {
    this.now = deps.now ?? (() => new Date());
    this.sleep = deps.sleep ?? defaultSleep;
    this.hooks = deps.hooks ?? {};
  }

  get busy(): boolean {
    return this.active;
  }

  async runAutomatedExploitation(target: TargetDescriptor, runOptions: RunOptions = {}): Promise<OrchestrationSession> {
    return this.runSession(
      target,
      async () => (await this.deps.resolver.resolveTarget(target)).candidates,
      { signal: runOptions.signal, recordFailed: this.options.recordFailedAttempts, consentGiven: false }
    );
  }

  /** Operator-chosen module against one service, default the first open one. */
  async runSingleExploit(
    target: TargetDescriptor,
    moduleId: string,
    port?: number,
    runOptions: RunOptions = {}
  ): Promise<OrchestrationSession> {
    const service = port === undefined
      ? target.openServices[0]
      : target.openServices.find((candidate) => candidate.port === port);
    if (!service) {
      throw new NetstrikeError(
        `${target.address} has no open service${port === undefined ? '' : ` on port ${port}`}`,
        'InvalidTargetError'
      );
    }

    return this.runSession(
      target,
      async () => [await this.describeOrPlaceholder(moduleId, service)],
      { signal: runOptions.signal, recordFailed: true, consentGiven: false }
    );
  }

  /** Re-run one earlier attempt's candidate in a fresh single-candidate session. */
  async retry(target: TargetDescriptor, attempt: AttemptRecord, runOptions: RunOptions = {}): Promise<OrchestrationSession> {
    console.log(`[controller] Retrying attempt ${attempt.index} (${attempt.candidate.moduleId})`);
    return this.runSession(
      target,
      async () => [attempt.candidate],
      { signal: runOptions.signal, recordFailed: true, consentGiven: false }
    );
  }

  // ─── Session Loop ───────────────────────────────────────────

  private async runSession(
    target: TargetDescriptor,
    loadCandidates: () => Promise<ExploitCandidate[]>,
    ctx: RunContext
  ): Promise<OrchestrationSession> {
    if (this.active) {
      throw new Error('Controller is already driving a session; one session per adapter at a time');
    }
    this.active = true;

    try {
      const session = new OrchestrationSession(target, this.deps.adapter, this.now);

      let candidates: ExploitCandidate[];
      try {
        candidates = await loadCandidates();
      } catch (error) {
        const { type, message } = classifyError(error);
        if (type !== 'ConnectionError') throw error;
        session.begin([]);
        session.conclude('aborted', { type, message });
        console.error(`[controller] Lost the framework console while resolving candidates: ${message}`);
        return session;
      }

      session.begin(candidates);
      this.hooks.onSessionStarted?.(session);
      console.log(`[controller] Session ${session.id}: ${candidates.length} candidate(s) for ${target.address}`);

      await this.attemptAll(session, ctx);

      console.log(`[controller] Session ${session.id} ${session.outcome}`);
      return session;
    } finally {
      this.active = false;
    }
  }

  private async attemptAll(session: OrchestrationSession, ctx: RunContext): Promise<void> {
    for (const candidate of session.candidates) {
      if (ctx.signal?.aborted) {
        session.conclude('aborted', { type: 'OperatorAbort', message: 'Aborted by operator before the next candidate' });
        return;
      }

      const attempt = await this.runAttempt(session, candidate, ctx);

      if (attempt.status === 'succeeded') {
        session.conclude('succeeded');
        return;
      }

      const fault = toFault(attempt.error);
      if (fault) {
        session.conclude('aborted', fault);
        return;
      }
    }

    session.conclude('exhausted');
  }

  // ─── One Attempt ────────────────────────────────────────────

  private async runAttempt(
    session: OrchestrationSession,
    candidate: ExploitCandidate,
    ctx: RunContext
  ): Promise<AttemptRecord> {
    const pending = session.startAttempt(candidate);
    this.hooks.onAttemptStarted?.(pending, session);
    const running = session.markRunning(pending.index);

    const total = session.candidates.length;
    console.log(`[controller] Attempt ${running.index}/${total}: ${candidate.moduleId} on port ${candidate.service.port}`);

    const values = this.optionValues(candidate, session.target);
    const transcript: string[] = [];

    let result: StepResult;
    try {
      result = await this.configureAndLaunch(session.target, candidate, values, transcript, ctx);
    } catch (error) {
      result = await this.settleFailure(error, transcript);
    }

    const finishedAt = this.now().toISOString();
    const rawOutput = transcript.join('\n');

    let artifactPath: string | undefined;
    if (result.status === 'succeeded' || ctx.recordFailed) {
      const draft: AttemptRecord = {
        ...running,
        status: result.status,
        rawOutput,
        finishedAt,
        ...(result.error ? { error: result.error } : {}),
      };
      try {
        artifactPath = await this.deps.artifacts.record(
          session.target,
          draft,
          renderResourceScript(session.target, draft, values)
        );
      } catch (error) {
        console.warn(`[controller] Could not write artifact for attempt ${running.index}: ${errorMessage(error)}`);
      }
    }

    const attempt = session.finishAttempt(running.index, {
      status: result.status,
      rawOutput,
      finishedAt,
      artifactPath,
      error: result.error,
    });

    const detail = attempt.error ? ` (${attempt.error.type}: ${attempt.error.message})` : '';
    console.log(`[controller] Attempt ${attempt.index}/${total} ${attempt.status}${detail}`);
    this.hooks.onAttemptFinished?.(attempt, session);
    return attempt;
  }

  private async configureAndLaunch(
    target: TargetDescriptor,
    candidate: ExploitCandidate,
    values: Record<string, string>,
    transcript: string[],
    ctx: RunContext
  ): Promise<StepResult> {
    await this.configure(candidate, values, transcript);

    checkAbort(ctx.signal, 'Aborted by operator before launch');
    await this.confirm(target, candidate, ctx);

    const result = await this.launch(target, transcript, ctx.signal);
    if (result.status !== 'succeeded') {
      checkAbort(ctx.signal, `Aborted by operator after the attempt was classified ${result.status}`);
    }
    return result;
  }

  private async configure(candidate: ExploitCandidate, values: Record<string, string>, transcript: string[]): Promise<void> {
    const useOutput = await this.run(`use ${candidate.moduleId}`, this.options.commandTimeoutMs, transcript);
    if (MSF_LOAD_FAILURE.test(useOutput)) {
      throw new NetstrikeError(`Failed to load module ${candidate.moduleId}`, 'ConfigurationError');
    }

    const provided = new Set(Object.keys(values).map((name) => name.toUpperCase()));
    const missing = Object.entries(candidate.requiredOptions)
      .filter(([name, option]) => option.required && option.defaultValue === undefined && !provided.has(name.toUpperCase()))
      .map(([name]) => name);
    if (missing.length > 0) {
      throw new NetstrikeError(`Missing required option(s) for ${candidate.moduleId}: ${missing.join(', ')}`, 'ConfigurationError');
    }

    for (const [name, value] of Object.entries(values)) {
      if (!OPTION_NAME.test(name) || value === '' || /[\r\n]/.test(value)) {
        throw new NetstrikeError(`Invalid option ${name}=${JSON.stringify(value)}`, 'ConfigurationError');
      }

      const output = await this.run(`set ${name} ${value}`, this.options.commandTimeoutMs, transcript);
      const acknowledged = output.split('\n').some((line) => line.trim() === `${name} => ${value}`);
      if (!acknowledged) {
        const reason = output.trim().split('\n').pop() || 'no acknowledgement';
        throw new NetstrikeError(`Framework rejected ${name}: ${reason}`, 'ConfigurationError');
      }
    }
  }

  private async confirm(target: TargetDescriptor, candidate: ExploitCandidate, ctx: RunContext): Promise<void> {
    if (ctx.consentGiven && !this.options.confirmEachAttempt) return;

    const decision = await requestConfirmation(
      this.deps.gate,
      {
        address: target.address,
        port: candidate.service.port,
        moduleId: candidate.moduleId,
        rank: candidate.rank,
        scope: this.options.confirmEachAttempt ? 'attempt' : 'session',
      },
      { timeoutMs: this.options.confirmationTimeoutMs, signal: ctx.signal }
    );

    if (decision === 'abort') {
      throw new NetstrikeError(`Operator declined to launch ${candidate.moduleId}`, 'OperatorAbort');
    }
    ctx.consentGiven = true;
  }

  /**
   * `run -z` under the attempt budget. Output without a verdict keeps the
   * attempt open: the session list is polled until a session for the target
   * that was not open before the launch shows up, a marker arrives late, or
   * the budget runs out.
   */
  private async launch(target: TargetDescriptor, transcript: string[], signal?: AbortSignal): Promise<StepResult> {
    const budget = this.options.timeoutPerAttemptMs;
    const deadline = this.now().getTime() + budget;

    const before = new Set(
      targetSessionIds(await this.run(MSF_SESSION_LIST_COMMAND, this.options.commandTimeoutMs, transcript), target.address)
    );
    const output = await this.run(MSF_RUN_COMMAND, budget, transcript, signal);
    let verdict = classifyOutput(output, this.options.markers);

    while (verdict === 'unknown') {
      const remaining = deadline - this.now().getTime();
      if (remaining <= 0) {
        return { status: 'timed_out', error: { type: 'TimeoutError', message: `No outcome within ${budget}ms` } };
      }

      await this.sleep(Math.min(this.options.sessionPollIntervalMs, remaining), signal);
      checkAbort(signal, 'Aborted by operator while waiting for a session');

      const listing = await this.run(MSF_SESSION_LIST_COMMAND, this.options.commandTimeoutMs, transcript);
      verdict = targetSessionIds(listing, target.address).some((id) => !before.has(id))
        ? 'succeeded'
        : classifyOutput(listing, this.options.markers);
    }

    if (verdict === 'misconfigured') {
      return {
        status: 'errored',
        error: { type: 'ConfigurationError', message: 'Module rejected its options at launch' },
      };
    }
    return { status: verdict === 'succeeded' ? 'succeeded' : 'failed' };
  }

  /**
   * Map a thrown error to the attempt's terminal status. Timeouts and aborts
   * leave a job behind in the console, so both go through `recover` first.
   */
  private async settleFailure(error: unknown, transcript: string[]): Promise<StepResult> {
    if (error instanceof CommandTimeoutError && error.partialOutput) {
      transcript.push(error.partialOutput);
    }

    const { type, message } = classifyError(error);
    if (type !== 'TimeoutError' && type !== 'OperatorAbort') {
      return { status: 'errored', error: { type, message } };
    }

    try {
      const recovery = await this.deps.adapter.recover(this.options.recoveryGraceMs);
      if (type === 'OperatorAbort') {
        return { status: 'errored', error: { type, message } };
      }
      if (recovery === 'restarted') {
        return { status: 'errored', error: { type, message: `${message}; framework console was restarted` } };
      }
      return { status: 'timed_out', error: { type, message } };
    } catch (recoveryError) {
      const recoveryType = classifyError(recoveryError).type;
      return {
        status: 'errored',
        error: {
          type: type === 'OperatorAbort' ? type : recoveryType,
          message: `${message}; recovery failed: ${errorMessage(recoveryError)}`,
        },
      };
    }
  }

  // ─── Helpers ────────────────────────────────────────────────

  private async run(command: string, timeoutMs: number, transcript: string[], signal?: AbortSignal): Promise<string> {
    transcript.push(`msf > ${command}`);
    const output = await this.deps.adapter.execute(command, timeoutMs, { signal });
    if (output) transcript.push(output);
    return output;
  }

  private optionValues(candidate: ExploitCandidate, target: TargetDescriptor): Record<string, string> {
    return {
      RHOSTS: target.address,
      RPORT: String(candidate.service.port),
      ...this.options.globalOptions,
      ...(this.options.moduleOptions[candidate.moduleId] ?? {}),
    };
  }

  /**
   * Falls back to a bare candidate when `info` cannot describe the module, so
   * the failure lands in the attempt log. A timed-out `info` leaves the
   * console busy and is recovered first; a lost console still ends the run.
   */
  private async describeOrPlaceholder(moduleId: string, service: ServiceFingerprint): Promise<ExploitCandidate> {
    try {
      return await this.deps.resolver.describe(moduleId, service);
    } catch (error) {
      const { type, message } = classifyError(error);
      if (type === 'ConnectionError' || type === 'OperatorAbort') throw error;
      console.warn(`[controller] Could not describe ${moduleId}: ${message}`);

      if (type === 'TimeoutError') {
        try {
          await this.deps.adapter.recover(this.options.recoveryGraceMs);
        } catch (recoveryError) {
          throw new NetstrikeError(`Console unresponsive after "info ${moduleId}": ${errorMessage(recoveryError)}`, 'ConnectionError');
        }
      }

      const placeholder: ExploitCandidate = {
        moduleId,
        rank: 'manual',
        description: moduleId,
        checkSupported: false,
        listingIndex: 0,
        service,
        requiredOptions: {},
      };
      return Object.freeze(placeholder);
    }
  }
}
