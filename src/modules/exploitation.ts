import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { AttemptRecord, NetstrikeConfig, OutcomeReport, TargetDescriptor } from '../types/index.js';
import { MsfConsoleAdapter, type ConsoleLauncher, type FrameworkAdapter } from '../framework/msf-adapter.js';
import { ExploitCatalogResolver } from '../framework/catalog-resolver.js';
import { ExploitExecutionController, type ControllerHooks } from '../exploitation/controller.js';
import { ArtifactManager } from '../exploitation/artifact-manager.js';
import type { ConfirmationGate } from '../exploitation/confirmation.js';
import type { OrchestrationSession } from '../exploitation/session.js';
import { summarize } from '../exploitation/outcome-reporter.js';
import { toOrchestrationConfig } from '../config-parser.js';
import type { AuditSession } from '../audit/index.js';
import { errorMessage } from '../error-handling.js';

export interface Orchestrator {
  resolver: ExploitCatalogResolver;
  artifacts: ArtifactManager;
  controller: ExploitExecutionController;
}

export function createOrchestrator(
  adapter: FrameworkAdapter,
  config: NetstrikeConfig,
  gate: ConfirmationGate,
  hooks?: ControllerHooks
): Orchestrator {
  const resolver = new ExploitCatalogResolver(adapter, {
    commandTimeoutMs: config.framework.command_timeout_ms,
    recoveryGraceMs: config.framework.recovery_grace_ms,
    describeOptions: config.exploitation.describe_options,
    ...(config.exploitation.max_candidates !== undefined ? { maxCandidates: config.exploitation.max_candidates } : {}),
  });
  const artifacts = new ArtifactManager(path.resolve(config.artifacts.directory));
  const controller = new ExploitExecutionController(
    { adapter, resolver, artifacts, gate, ...(hooks ? { hooks } : {}) },
    toOrchestrationConfig(config)
  );
  return { resolver, artifacts, controller };
}

export function openFramework(
  config: NetstrikeConfig,
  options: { launcher?: ConsoleLauncher; onTranscript?: (chunk: string) => void } = {}
): Promise<MsfConsoleAdapter> {
  console.log(`[exploitation] Starting ${config.framework.msf_path}...`);
  return MsfConsoleAdapter.open({
    msfPath: config.framework.msf_path,
    startupTimeoutMs: config.framework.startup_timeout_ms,
    ...options,
  });
}

export type ExploitationMode =
  | { kind: 'automated' }
  | { kind: 'single'; moduleId: string; port?: number }
  | { kind: 'retry'; attempt: AttemptRecord };

export interface ExploitationRunOptions {
  mode?: ExploitationMode;
  gate: ConfirmationGate;
  signal?: AbortSignal;
  audit?: AuditSession;
  /** An already open console; otherwise one is started and closed for this run. */
  adapter?: FrameworkAdapter;
  launcher?: ConsoleLauncher;
  hooks?: ControllerHooks;
}

export interface ExploitationResult {
  session: OrchestrationSession;
  report: OutcomeReport;
}

/**
 * Phase 3: Exploitation
 * Runs one orchestration session against the target and saves the outcome report.
 */
export async function runExploitation(
  target: TargetDescriptor,
  config: NetstrikeConfig,
  outputDir: string,
  options: ExploitationRunOptions
): Promise<ExploitationResult> {
  const { audit } = options;
  const adapter = options.adapter ?? await openFramework(config, {
    ...(options.launcher ? { launcher: options.launcher } : {}),
    ...(audit ? { onTranscript: audit.transcriptListener() } : {}),
  });

  try {
    const hooks = options.hooks ?? {};
    const { controller } = createOrchestrator(adapter, config, options.gate, {
      ...hooks,
      onAttemptFinished: (attempt, session) => {
        hooks.onAttemptFinished?.(attempt, session);
        audit?.logAttempt(attempt).catch((error: unknown) => {
          console.warn(`[exploitation] Could not log attempt ${attempt.index}: ${errorMessage(error)}`);
        });
      },
    });

    const mode: ExploitationMode = options.mode ?? { kind: 'automated' };
    const runOptions = { signal: options.signal };
    const session = mode.kind === 'automated'
      ? await controller.runAutomatedExploitation(target, runOptions)
      : mode.kind === 'single'
        ? await controller.runSingleExploit(target, mode.moduleId, mode.port, runOptions)
        : await controller.retry(target, mode.attempt, runOptions);

    const report = summarize(session, { outputSummaryChars: config.reporting.output_summary_chars });
    audit?.logOutcome(report);

    const deliverablePath = path.join(outputDir, 'deliverables', 'exploitation_results.json');
    await fs.mkdir(path.dirname(deliverablePath), { recursive: true });
    await fs.writeFile(deliverablePath, JSON.stringify(report, null, 2));

    return { session, report };
  } finally {
    if (!options.adapter) await adapter.close();
  }
}
