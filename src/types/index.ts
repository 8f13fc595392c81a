// ─── Discovery & Targets ─────────────────────────────────────────

export interface DiscoveredHost {
  address: string;
  macAddress: string | null;
  hostname: string | null;
}

export type TransportProtocol = 'tcp' | 'udp';

export interface ServiceFingerprint {
  port: number;
  protocol: TransportProtocol;
  serviceName: string;
  product?: string;
  version?: string;
}

export interface TargetDescriptor {
  readonly address: string;
  readonly hostname?: string;
  readonly macAddress?: string;
  readonly openServices: readonly ServiceFingerprint[];
}

export interface DiscoveryResult {
  range: string;
  method: 'nmap' | 'arp';
  hosts: DiscoveredHost[];
  scanDurationMs: number;
}

export interface PortScanResult {
  address: string;
  method: 'nmap' | 'tcp-connect';
  portsScanned: number;
  services: ServiceFingerprint[];
  scanDurationMs: number;
}

// ─── Exploit Catalog ─────────────────────────────────────────────

export type ModuleRank = 'excellent' | 'great' | 'good' | 'normal' | 'average' | 'low' | 'manual';

export interface ModuleOption {
  required: boolean;
  defaultValue?: string;
  description: string;
}

export interface ExploitCandidate {
  readonly moduleId: string;
  readonly rank: ModuleRank;
  readonly disclosureDate?: string;
  readonly description: string;
  readonly checkSupported: boolean;
  readonly listingIndex: number;
  readonly service: ServiceFingerprint;
  readonly requiredOptions: Readonly<Record<string, ModuleOption>>;
}

export interface ResolvedCatalog {
  candidates: ExploitCandidate[];
  skippedLines: number;
}

// ─── Attempts & Sessions ────────────────────────────────────────

export type AttemptStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'timed_out' | 'errored';

export type SessionOutcome = 'not_started' | 'in_progress' | 'succeeded' | 'exhausted' | 'aborted';

export type OutputVerdict = 'succeeded' | 'failed' | 'misconfigured' | 'unknown';

export interface AttemptError {
  type: string;
  message: string;
}

export interface AttemptRecord {
  readonly index: number;
  readonly candidate: ExploitCandidate;
  readonly startedAt: string;
  readonly finishedAt?: string;
  readonly status: AttemptStatus;
  readonly rawOutput: string;
  readonly artifactPath?: string;
  readonly error?: AttemptError;
}

export interface SessionFault {
  type: 'ConnectionError' | 'OperatorAbort';
  message: string;
}

// ─── Reports ─────────────────────────────────────────────────────

export interface AttemptSummary {
  index: number;
  moduleId: string;
  port: number;
  rank: ModuleRank;
  status: AttemptStatus;
  durationMs: number;
  artifactPath: string | null;
  outputSummary: string;
  error: AttemptError | null;
}

export interface OutcomeReport {
  sessionId: string;
  target: {
    address: string;
    hostname: string | null;
    services: ServiceFingerprint[];
  };
  sessionOutcome: SessionOutcome;
  fault: SessionFault | null;
  startedAt: string | null;
  finishedAt: string | null;
  durationMs: number;
  candidateCount: number;
  attempts: AttemptSummary[];
  counts: Record<AttemptStatus, number>;
  successfulModule: string | null;
}

// ─── Configuration ───────────────────────────────────────────────

export interface NetstrikeConfig {
  framework: FrameworkConfig;
  exploitation: ExploitationConfig;
  artifacts: ArtifactConfig;
  scanning: ScanningConfig;
  reporting: ReportingConfig;
}

export interface FrameworkConfig {
  msf_path: string;
  startup_timeout_ms: number;
  command_timeout_ms: number;
  recovery_grace_ms: number;
}

export interface ExploitationConfig {
  timeout_per_attempt_ms: number;
  confirm_each_attempt: boolean;
  confirmation_timeout_ms?: number;
  max_candidates?: number;
  session_poll_interval_ms: number;
  record_failed_attempts: boolean;
  describe_options: boolean;
  global_options: Record<string, string>;
  module_options: Record<string, Record<string, string>>;
  markers: MarkerConfig;
}

export interface MarkerConfig {
  success: string[];
  failure: string[];
  configuration_error: string[];
}

export interface ArtifactConfig {
  directory: string;
}

export interface ScanningConfig {
  ports: number[];
  timeout_ms: number;
  concurrency: number;
  use_nmap: boolean;
}

export interface ReportingConfig {
  format: 'markdown' | 'json';
  output_summary_chars: number;
}

// ─── Audit & Metrics ─────────────────────────────────────────────

export type ModuleName = 'discovery' | 'port-scan' | 'exploitation' | 'report';

export type PhaseName = 'discovery' | 'scanning' | 'exploitation' | 'reporting';

export type ModuleStatus = 'pending' | 'running' | 'completed' | 'failed' | 'skipped';

export interface ModuleMetrics {
  name: ModuleName;
  phase: PhaseName;
  status: ModuleStatus;
  run: number;
  startTime?: string;
  endTime?: string;
  durationMs?: number;
  error?: string;
}

export interface RunSummary {
  hostsDiscovered: number;
  servicesFound: number;
  candidatesResolved: number;
  attemptsMade: number;
  sessionOutcome: SessionOutcome;
}

/** Contents of `session.json`, shared by every process writing to one output directory. */
export interface SessionMetrics {
  sessionId: string;
  startTime: string;
  endTime?: string;
  status: 'running' | 'completed' | 'failed';
  error?: string;
  totalDurationMs?: number;
  modules: Partial<Record<ModuleName, ModuleMetrics>>;
  attempts: Partial<Record<AttemptStatus, number>>;
  summary?: RunSummary;
}

export interface AuditEvent {
  timestamp: string;
  module: ModuleName;
  run: number;
  event: string;
  data: Record<string, unknown>;
}
