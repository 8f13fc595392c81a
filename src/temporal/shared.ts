import type {
  ModuleName,
  ModuleStatus,
  OutcomeReport,
  PhaseName,
  PortScanResult,
  SessionOutcome,
} from '../types/index.js';
import type { ExploitationMode } from '../modules/exploitation.js';

// ─── Workflow Input ─────────────────────────────────────────────

export interface PipelineTarget {
  address: string;
  hostname?: string;
  macAddress?: string;
}

export interface PipelineInput {
  target: PipelineTarget;
  configPath?: string;
  outputPath: string;
  mode?: ExploitationMode;
  /** Skip the wait for `confirmExploitation`; the operator consented when starting. */
  preconfirmed?: boolean;
}

// ─── Activity Input/Output ──────────────────────────────────────

export interface ActivityInput {
  sessionId: string;
  outputPath: string;
  configPath?: string;
}

export interface PortScanActivityInput extends ActivityInput {
  address: string;
}

export interface ExploitationActivityInput extends ActivityInput {
  target: PipelineTarget;
  portScan: PortScanResult;
  mode: ExploitationMode;
  confirmedBy: string;
}

export interface ReportActivityInput extends ActivityInput {
  portScan: PortScanResult;
  /** Absent when the exploitation activity was cancelled; the saved deliverable is read instead. */
  exploitation?: OutcomeReport | null;
  startTime: string;
  totalDurationMs: number;
}

// ─── Workflow State & Progress ──────────────────────────────────

export interface WorkflowState {
  currentPhase: PhaseName;
  currentModule: ModuleName | null;
  completedModules: ModuleName[];
  failedModules: ModuleName[];
  moduleStatuses: Partial<Record<ModuleName, ModuleStatus>>;
  awaitingConfirmation: boolean;
  sessionOutcome: SessionOutcome | null;
  startTime: string;
}

export interface WorkflowProgress {
  currentPhase: PhaseName;
  currentModule: ModuleName | null;
  completedModules: ModuleName[];
  failedModules: ModuleName[];
  awaitingConfirmation: boolean;
  sessionOutcome: SessionOutcome | null;
  startTime: string;
  elapsedMs: number;
}

// ─── Query & Signal Definitions ─────────────────────────────────

export const PROGRESS_QUERY_NAME = 'getProgress';
export const CONFIRM_SIGNAL_NAME = 'confirmExploitation';
export const ABORT_SIGNAL_NAME = 'abortExploitation';

// ─── Constants ──────────────────────────────────────────────────

export const TASK_QUEUE = 'netstrike-pipeline';
export const CONFIRMATION_WAIT = '30 minutes';
