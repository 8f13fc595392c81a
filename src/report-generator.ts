import { promises as fs } from 'node:fs';
import path from 'node:path';
import type {
  AttemptStatus,
  DiscoveryResult,
  OutcomeReport,
  PortScanResult,
  ReportingConfig,
  SessionOutcome,
} from './types/index.js';

export interface ReportData {
  sessionId: string;
  startTime: string;
  totalDurationMs: number;
  discovery?: DiscoveryResult;
  portScan?: PortScanResult;
  exploitation: OutcomeReport | null;
}

const OUTCOME_LABELS: Record<SessionOutcome, string> = {
  not_started: 'Not started',
  in_progress: 'In progress',
  succeeded: 'SUCCEEDED: a session was opened on the target',
  exhausted: 'Exhausted: no candidate module succeeded',
  aborted: 'Aborted',
};

const STATUS_ORDER: AttemptStatus[] = ['succeeded', 'failed', 'timed_out', 'errored', 'running', 'pending'];

/**
 * Writes `deliverables/exploitation_report.<md|json>` and returns its path.
 */
export async function generateReport(
  data: ReportData,
  outputDir: string,
  format: ReportingConfig['format']
): Promise<string> {
  const deliverables = path.join(outputDir, 'deliverables');
  await fs.mkdir(deliverables, { recursive: true });

  if (format === 'json') {
    const jsonPath = path.join(deliverables, 'exploitation_report.json');
    await fs.writeFile(jsonPath, JSON.stringify(data, null, 2));
    return jsonPath;
  }

  const markdownPath = path.join(deliverables, 'exploitation_report.md');
  await fs.writeFile(markdownPath, renderMarkdownReport(data));
  return markdownPath;
}

export function renderMarkdownReport(data: ReportData): string {
  const lines: string[] = [];
  const report = data.exploitation;

  // ─── Header ───────────────────────────────────────────────
  lines.push('# Exploitation Report');
  lines.push('');
  lines.push(`**Session ID:** ${data.sessionId}`);
  lines.push(`**Date:** ${new Date(data.startTime).toUTCString()}`);
  lines.push(`**Duration:** ${formatDuration(data.totalDurationMs)}`);
  if (report) {
    const hostname = report.target.hostname ? ` (${report.target.hostname})` : '';
    lines.push(`**Target:** ${report.target.address}${hostname}`);
  }
  lines.push('');
  lines.push('---');
  lines.push('');

  // ─── Summary ──────────────────────────────────────────────
  lines.push('## Summary');
  lines.push('');

  if (!report) {
    lines.push('Exploitation did not run.');
    lines.push('');
  } else {
    lines.push(`**Outcome:** ${OUTCOME_LABELS[report.sessionOutcome]}`);
    if (report.fault) {
      lines.push(`**Fault:** ${report.fault.type}: ${report.fault.message}`);
    }
    if (report.successfulModule) {
      lines.push(`**Successful module:** \`${report.successfulModule}\``);
    }
    lines.push('');
    lines.push('| Metric | Count |');
    lines.push('|--------|-------|');
    lines.push(`| Candidates | ${report.candidateCount} |`);
    lines.push(`| Attempts | ${report.attempts.length} |`);
    for (const status of STATUS_ORDER) {
      if (report.counts[status] > 0) lines.push(`| ${status} | ${report.counts[status]} |`);
    }
    lines.push('');
  }

  // ─── Services ─────────────────────────────────────────────
  const services = report?.target.services ?? data.portScan?.services ?? [];
  lines.push('## Open Services');
  lines.push('');
  if (services.length === 0) {
    lines.push('No open services were found.');
  } else {
    lines.push('| Port | Protocol | Service | Product | Version |');
    lines.push('|------|----------|---------|---------|---------|');
    for (const service of services) {
      lines.push(
        `| ${service.port} | ${service.protocol} | ${service.serviceName} | ${service.product ?? '-'} | ${service.version ?? '-'} |`
      );
    }
  }
  lines.push('');

  // ─── Attempts ─────────────────────────────────────────────
  if (report && report.attempts.length > 0) {
    lines.push('## Attempts');
    lines.push('');
    lines.push('| # | Module | Port | Rank | Status | Duration | Artifact |');
    lines.push('|---|--------|------|------|--------|----------|----------|');
    for (const attempt of report.attempts) {
      lines.push(
        `| ${attempt.index} | \`${attempt.moduleId}\` | ${attempt.port} | ${attempt.rank} | ${attempt.status} | ${formatDuration(attempt.durationMs)} | ${attempt.artifactPath ?? '-'} |`
      );
    }
    lines.push('');

    for (const attempt of report.attempts) {
      lines.push(`### Attempt ${attempt.index}: ${attempt.moduleId}`);
      lines.push('');
      if (attempt.error) {
        lines.push(`- **Error:** ${attempt.error.type}: ${attempt.error.message}`);
        lines.push('');
      }
      if (attempt.outputSummary) {
        lines.push('```');
        lines.push(attempt.outputSummary);
        lines.push('```');
        lines.push('');
      }
    }
  }

  lines.push('---');
  lines.push('');

  // ─── Appendix ─────────────────────────────────────────────
  lines.push('## Appendix');
  lines.push('');
  if (data.discovery) {
    lines.push(`- **Discovery:** ${data.discovery.hosts.length} host(s) in ${data.discovery.range} via ${data.discovery.method} (${formatDuration(data.discovery.scanDurationMs)})`);
  }
  if (data.portScan) {
    lines.push(`- **Port scan:** ${data.portScan.services.length} open of ${data.portScan.portsScanned} via ${data.portScan.method} (${formatDuration(data.portScan.scanDurationMs)})`);
  }
  if (report) {
    lines.push(`- **Exploitation:** ${formatDuration(report.durationMs)}`);
  }
  lines.push('');
  lines.push('> Only test systems you own or have explicit written authorization to test.');

  return lines.join('\n');
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = Math.floor(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  if (minutes < 60) return `${minutes}m ${remainingSeconds}s`;
  const hours = Math.floor(minutes / 60);
  const remainingMinutes = minutes % 60;
  return `${hours}h ${remainingMinutes}m`;
}
