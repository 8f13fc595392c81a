import {
  proxyActivities,
  defineQuery,
  defineSignal,
  setHandler,
  condition,
  isCancellation,
  ApplicationFailure,
  ActivityCancellationType,
  CancellationScope,
} from '@temporalio/workflow';

import type { OutcomeReport, PortScanResult } from '../types/index.js';

import {
  type PipelineInput,
  type WorkflowState,
  type WorkflowProgress,
  PROGRESS_QUERY_NAME,
  CONFIRM_SIGNAL_NAME,
  ABORT_SIGNAL_NAME,
  CONFIRMATION_WAIT,
} from './shared.js';

import type * as activityTypes from './activities.js';

const getProgressQuery = defineQuery<WorkflowProgress>(PROGRESS_QUERY_NAME);
export const confirmExploitationSignal = defineSignal<[string]>(CONFIRM_SIGNAL_NAME);
export const abortExploitationSignal = defineSignal<[string]>(ABORT_SIGNAL_NAME);

// ─── Activity Proxies ───────────────────────────────────────────

const NON_RETRYABLE = ['ConfigurationError', 'ConnectionError', 'OperatorAbort', 'InvalidTargetError'];

const { runPortScanActivity, runReportActivity } = proxyActivities<typeof activityTypes>({
  startToCloseTimeout: '30 minutes',
  heartbeatTimeout: '60 seconds',
  retry: {
    initialInterval: '30 seconds',
    backoffCoefficient: 2,
    maximumInterval: '5 minutes',
    maximumAttempts: 5,
    nonRetryableErrorTypes: NON_RETRYABLE,
  },
});

// Exploits are never re-run behind the operator's back
const { runExploitationActivity } = proxyActivities<typeof activityTypes>({
  startToCloseTimeout: '4 hours',
  heartbeatTimeout: '60 seconds',
  cancellationType: ActivityCancellationType.WAIT_CANCELLATION_COMPLETED,
  retry: {
    maximumAttempts: 1,
    nonRetryableErrorTypes: NON_RETRYABLE,
  },
});

// ─── Pipeline Workflow ──────────────────────────────────────────

export async function netstrikePipelineWorkflow(input: PipelineInput): Promise<OutcomeReport | null> {
  const sessionId = `netstrike-${Date.now()}`;
  const startTime = new Date().toISOString();

  const state: WorkflowState = {
    currentPhase: 'scanning',
    currentModule: null,
    completedModules: [],
    failedModules: [],
    moduleStatuses: {},
    awaitingConfirmation: false,
    sessionOutcome: null,
    startTime,
  };

  let confirmedBy: string | null = input.preconfirmed ? 'workflow input' : null;
  let abortReason: string | null = null;
  const exploitationScope = new CancellationScope();

  setHandler(getProgressQuery, (): WorkflowProgress => ({
    currentPhase: state.currentPhase,
    currentModule: state.currentModule,
    completedModules: [...state.completedModules],
    failedModules: [...state.failedModules],
    awaitingConfirmation: state.awaitingConfirmation,
    sessionOutcome: state.sessionOutcome,
    startTime: state.startTime,
    elapsedMs: Date.now() - new Date(state.startTime).getTime(),
  }));

  setHandler(confirmExploitationSignal, (operator) => {
    confirmedBy = operator || 'operator';
  });

  setHandler(abortExploitationSignal, (reason) => {
    abortReason = reason || 'operator request';
    exploitationScope.cancel();
  });

  const baseInput = {
    sessionId,
    outputPath: input.outputPath,
    configPath: input.configPath,
  };

  const report = async (portScan: PortScanResult, exploitation: OutcomeReport | null | undefined) => {
    state.currentPhase = 'reporting';
    state.currentModule = 'report';
    state.moduleStatuses.report = 'running';
    try {
      await runReportActivity({
        ...baseInput,
        portScan,
        exploitation,
        startTime,
        totalDurationMs: Date.now() - new Date(startTime).getTime(),
      });
      state.completedModules.push('report');
      state.moduleStatuses.report = 'completed';
    } catch (error) {
      state.failedModules.push('report');
      state.moduleStatuses.report = 'failed';
      throw ApplicationFailure.nonRetryable(
        `Report generation failed: ${error instanceof Error ? error.message : String(error)}`,
        'ReportError'
      );
    }
  };

  // ── Phase 1: Port scan ───────────────────────────────────────

  state.currentPhase = 'scanning';
  state.currentModule = 'port-scan';
  state.moduleStatuses['port-scan'] = 'running';

  let portScan: PortScanResult;
  try {
    portScan = await runPortScanActivity({ ...baseInput, address: input.target.address });
    state.completedModules.push('port-scan');
    state.moduleStatuses['port-scan'] = 'completed';
  } catch (error) {
    state.failedModules.push('port-scan');
    state.moduleStatuses['port-scan'] = 'failed';
    throw ApplicationFailure.nonRetryable(
      `Port scan failed: ${error instanceof Error ? error.message : String(error)}`,
      'ScanError'
    );
  }

  if (portScan.services.length === 0) {
    state.moduleStatuses.exploitation = 'skipped';
    await report(portScan, null);
    return null;
  }

  // ── Phase 2: Operator consent ────────────────────────────────

  state.currentPhase = 'exploitation';
  state.awaitingConfirmation = confirmedBy === null;
  const answered = await condition(() => confirmedBy !== null || abortReason !== null, CONFIRMATION_WAIT);
  state.awaitingConfirmation = false;

  if (!answered || abortReason !== null || confirmedBy === null) {
    state.moduleStatuses.exploitation = 'skipped';
    state.sessionOutcome = 'not_started';
    await report(portScan, null);
    return null;
  }
  const consent = confirmedBy;

  // ── Phase 3: Exploitation (cancellable) ──────────────────────

  state.currentModule = 'exploitation';
  state.moduleStatuses.exploitation = 'running';

  let exploitation: OutcomeReport | undefined;
  try {
    exploitation = await exploitationScope.run(() =>
      runExploitationActivity({
        ...baseInput,
        target: input.target,
        portScan,
        mode: input.mode ?? { kind: 'automated' },
        confirmedBy: consent,
      })
    );
    state.sessionOutcome = exploitation.sessionOutcome;
    state.completedModules.push('exploitation');
    state.moduleStatuses.exploitation = 'completed';
  } catch (error) {
    if (!isCancellation(error)) {
      state.failedModules.push('exploitation');
      state.moduleStatuses.exploitation = 'failed';
      throw error;
    }
    state.sessionOutcome = 'aborted';
    state.completedModules.push('exploitation');
    state.moduleStatuses.exploitation = 'completed';
  }

  // ── Phase 4: Reporting ───────────────────────────────────────

  await report(portScan, exploitation);
  return exploitation ?? null;
}
