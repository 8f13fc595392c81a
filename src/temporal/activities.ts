import { promises as fs } from 'node:fs';
import path from 'node:path';
import { heartbeat, Context } from '@temporalio/activity';
import type { NetstrikeConfig, OutcomeReport, PortScanResult } from '../types/index.js';
import type {
  PortScanActivityInput,
  ExploitationActivityInput,
  ReportActivityInput,
} from './shared.js';
import { parseConfig, getDefaultConfig, applyEnvOverrides } from '../config-parser.js';
import { AuditSession } from '../audit/index.js';
import { runPortScan } from '../modules/port-scanner.js';
import { runExploitation } from '../modules/exploitation.js';
import { buildTargetDescriptor } from '../modules/target-selector.js';
import { PreauthorizedGate } from '../exploitation/confirmation.js';
import { generateReport } from '../report-generator.js';
import { NetstrikeError, errorMessage, isErrnoException } from '../error-handling.js';
import { DEFAULTS } from '../constants.js';

// ─── Helpers ────────────────────────────────────────────────────

function startHeartbeat(moduleName: string): NodeJS.Timeout {
  const startTime = Date.now();
  return setInterval(() => {
    heartbeat({
      module: moduleName,
      elapsedSeconds: Math.floor((Date.now() - startTime) / 1000),
    });
  }, DEFAULTS.HEARTBEAT_INTERVAL_MS);
}

async function loadConfig(configPath?: string): Promise<NetstrikeConfig> {
  const config = configPath ? await parseConfig(configPath) : getDefaultConfig();
  return applyEnvOverrides(config);
}

async function readSavedExploitation(outputPath: string): Promise<OutcomeReport | null> {
  try {
    const content = await fs.readFile(path.join(outputPath, 'deliverables', 'exploitation_results.json'), 'utf-8');
    const report: OutcomeReport = JSON.parse(content);
    return report;
  } catch (error) {
    if (isErrnoException(error, 'ENOENT')) return null;
    throw error;
  }
}

// ─── Port Scan Activity ─────────────────────────────────────────

export async function runPortScanActivity(
  input: PortScanActivityInput
): Promise<PortScanResult> {
  const hb = startHeartbeat('port-scan');
  const audit = new AuditSession({ sessionId: input.sessionId, outputDir: input.outputPath });
  await audit.initialize();

  try {
    await audit.startModule('port-scan', Context.current().info.attempt);
    const config = await loadConfig(input.configPath);
    console.log(`[port-scan] Scanning ${config.scanning.ports.length} ports on ${input.address}...`);

    const result = await runPortScan(input.address, config.scanning, input.outputPath);

    console.log(`[port-scan] ${result.services.length} open port(s) via ${result.method} in ${result.scanDurationMs}ms`);
    await audit.endModule('port-scan', true);
    return result;
  } catch (error) {
    await audit.endModule('port-scan', false, errorMessage(error));
    throw error;
  } finally {
    clearInterval(hb);
  }
}

// ─── Exploitation Activity ──────────────────────────────────────

/**
 * Runs one orchestration session. Workflow cancellation reaches the
 * controller as its abort signal, so the session concludes `aborted`
 * and its results are still written before the activity returns.
 */
export async function runExploitationActivity(
  input: ExploitationActivityInput
): Promise<OutcomeReport> {
  const hb = startHeartbeat('exploitation');
  const audit = new AuditSession({ sessionId: input.sessionId, outputDir: input.outputPath });
  await audit.initialize();

  try {
    await audit.startModule('exploitation', Context.current().info.attempt);
    const config = await loadConfig(input.configPath);

    if (config.exploitation.confirm_each_attempt) {
      throw new NetstrikeError(
        'confirm_each_attempt requires the interactive CLI; the pipeline only takes session-level consent',
        'ConfigurationError'
      );
    }

    const target = buildTargetDescriptor(
      {
        address: input.target.address,
        hostname: input.target.hostname ?? null,
        macAddress: input.target.macAddress ?? null,
      },
      input.portScan.services
    );
    console.log(`[exploitation] ${target.openServices.length} service(s) on ${target.address}, consent from ${input.confirmedBy}`);

    const { report } = await runExploitation(target, config, input.outputPath, {
      mode: input.mode,
      gate: new PreauthorizedGate(input.confirmedBy),
      signal: Context.current().cancellationSignal,
      audit,
    });

    console.log(`[exploitation] Session ${report.sessionId} ${report.sessionOutcome} after ${report.attempts.length} attempt(s)`);
    await audit.endModule(
      'exploitation',
      report.fault === null,
      report.fault ? `${report.fault.type}: ${report.fault.message}` : undefined
    );
    return report;
  } catch (error) {
    await audit.endModule('exploitation', false, errorMessage(error));
    throw error;
  } finally {
    clearInterval(hb);
  }
}

// ─── Report Activity ────────────────────────────────────────────

export async function runReportActivity(
  input: ReportActivityInput
): Promise<string> {
  const hb = startHeartbeat('report');
  const audit = new AuditSession({ sessionId: input.sessionId, outputDir: input.outputPath });
  await audit.initialize();

  try {
    await audit.startModule('report', Context.current().info.attempt);
    console.log('[report] Generating exploitation report...');

    const config = await loadConfig(input.configPath);
    const exploitation = input.exploitation === undefined
      ? await readSavedExploitation(input.outputPath)
      : input.exploitation;

    const reportPath = await generateReport(
      {
        sessionId: input.sessionId,
        startTime: input.startTime,
        totalDurationMs: input.totalDurationMs,
        portScan: input.portScan,
        exploitation,
      },
      input.outputPath,
      config.reporting.format
    );

    console.log(`[report] Report written to ${reportPath}`);
    await audit.endModule('report', true);

    await audit.finalize({
      hostsDiscovered: 1,
      servicesFound: input.portScan.services.length,
      candidatesResolved: exploitation?.candidateCount ?? 0,
      attemptsMade: exploitation?.attempts.length ?? 0,
      sessionOutcome: exploitation?.sessionOutcome ?? 'not_started',
    });
    return reportPath;
  } catch (error) {
    await audit.endModule('report', false, errorMessage(error));
    throw error;
  } finally {
    clearInterval(hb);
  }
}
