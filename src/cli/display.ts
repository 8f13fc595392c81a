import type {
  AttemptRecord,
  AttemptStatus,
  DiscoveredHost,
  ExploitCandidate,
  OutcomeReport,
  ServiceFingerprint,
  SessionOutcome,
} from '../types/index.js';
import type { ArtifactEntry } from '../exploitation/artifact-manager.js';
import { describeDevice } from '../modules/target-selector.js';

const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
  bgRed: '\x1b[41m',
  bgGreen: '\x1b[42m',
};

export function statusColor(status: AttemptStatus | SessionOutcome): string {
  switch (status) {
    case 'succeeded': return COLORS.bgGreen + COLORS.bold;
    case 'failed':
    case 'exhausted': return COLORS.red;
    case 'timed_out': return COLORS.yellow;
    case 'errored':
    case 'aborted': return COLORS.magenta + COLORS.bold;
    case 'running':
    case 'in_progress': return COLORS.cyan;
    case 'pending':
    case 'not_started': return COLORS.gray;
  }
}

export function formatStatus(status: AttemptStatus | SessionOutcome): string {
  return `${statusColor(status)}${status.toUpperCase()}${COLORS.reset}`;
}

export function printPhaseHeader(phase: string): void {
  console.log('');
  console.log(`${COLORS.cyan}${'─'.repeat(50)}${COLORS.reset}`);
  console.log(`${COLORS.cyan}${COLORS.bold}  Phase: ${phase.toUpperCase()}${COLORS.reset}`);
  console.log(`${COLORS.cyan}${'─'.repeat(50)}${COLORS.reset}`);
}

export function printInfo(message: string): void {
  console.log(`${COLORS.blue}  [*]${COLORS.reset} ${message}`);
}

export function printSuccess(message: string): void {
  console.log(`${COLORS.green}  [+]${COLORS.reset} ${message}`);
}

export function printWarning(message: string): void {
  console.log(`${COLORS.yellow}  [!]${COLORS.reset} ${message}`);
}

export function printError(message: string): void {
  console.log(`${COLORS.red}  [-]${COLORS.reset} ${message}`);
}

export function printHosts(hosts: readonly DiscoveredHost[]): void {
  if (hosts.length === 0) {
    printWarning('No hosts discovered');
    return;
  }
  console.log('');
  console.log(`  ${'#'.padEnd(4)}${'IP Address'.padEnd(17)}${'MAC Address'.padEnd(19)}${'Hostname'.padEnd(26)}Description`);
  console.log(`  ${'-'.repeat(86)}`);
  hosts.forEach((host, i) => {
    console.log(
      `  ${String(i + 1).padEnd(4)}${host.address.padEnd(17)}${(host.macAddress ?? '-').padEnd(19)}${(host.hostname ?? '-').padEnd(26)}${describeDevice(host)}`
    );
  });
  console.log(`  Total targets available: ${hosts.length}`);
}

export function printServices(services: readonly ServiceFingerprint[]): void {
  if (services.length === 0) {
    printWarning('No open ports found');
    return;
  }
  for (const service of services) {
    const detail = [service.product, service.version].filter(Boolean).join(' ');
    console.log(`  ${COLORS.green}${String(service.port).padStart(5)}/${service.protocol}${COLORS.reset}  ${service.serviceName.padEnd(16)}${COLORS.gray}${detail}${COLORS.reset}`);
  }
}

export function printCandidates(candidates: readonly ExploitCandidate[]): void {
  if (candidates.length === 0) {
    printWarning('No exploit modules matched the open services');
    return;
  }
  candidates.forEach((candidate, i) => {
    const date = candidate.disclosureDate ?? '----------';
    console.log(
      `  ${String(i + 1).padStart(3)}. ${COLORS.bold}${candidate.moduleId}${COLORS.reset} ${COLORS.gray}[${candidate.rank}] ${date} port ${candidate.service.port}${COLORS.reset}`
    );
    console.log(`       ${candidate.description}`);
  });
}

export function printAttempt(attempt: AttemptRecord, total: number): void {
  const error = attempt.error ? ` ${COLORS.gray}(${attempt.error.type}: ${attempt.error.message})${COLORS.reset}` : '';
  console.log(`  [${attempt.index}/${total}] ${attempt.candidate.moduleId} ${formatStatus(attempt.status)}${error}`);
}

export function printOutcome(report: OutcomeReport): void {
  console.log('');
  console.log(`${COLORS.cyan}╔══════════════════════════════════════════╗${COLORS.reset}`);
  console.log(`${COLORS.cyan}║         Exploitation Summary             ║${COLORS.reset}`);
  console.log(`${COLORS.cyan}╚══════════════════════════════════════════╝${COLORS.reset}`);
  console.log(`  Target:        ${report.target.address}`);
  console.log(`  Outcome:       ${formatStatus(report.sessionOutcome)}`);
  if (report.fault) console.log(`  Fault:         ${report.fault.type}: ${report.fault.message}`);
  if (report.successfulModule) console.log(`  Module:        ${COLORS.green}${report.successfulModule}${COLORS.reset}`);
  console.log(`  Candidates:    ${report.candidateCount}`);
  console.log(`  Attempts:      ${report.attempts.length}`);
  console.log(`  Failed:        ${report.counts.failed}  Timed out: ${report.counts.timed_out}  Errored: ${report.counts.errored}`);
  console.log('');
}

export function printArtifacts(entries: readonly ArtifactEntry[]): void {
  if (entries.length === 0) {
    printWarning('No artifacts recorded yet');
    return;
  }
  entries.forEach((entry, i) => {
    console.log(`  ${String(i + 1).padStart(3)}. ${new Date(entry.timestamp).toISOString()}  ${entry.module}  ${COLORS.gray}${entry.path}${COLORS.reset}`);
  });
}
