#!/usr/bin/env node
import { createInterface } from 'node:readline';
import path from 'node:path';
import dotenv from 'dotenv';
import type {
  DiscoveredHost,
  DiscoveryResult,
  NetstrikeConfig,
  OutcomeReport,
  PortScanResult,
  TargetDescriptor,
} from '../types/index.js';
import { parseConfig, getDefaultConfig, applyEnvOverrides, resolveOutputDir } from '../config-parser.js';
import { AuditSession } from '../audit/index.js';
import { runDiscovery } from '../modules/discovery.js';
import { runPortScan } from '../modules/port-scanner.js';
import { selectTarget, buildTargetDescriptor, type TargetSelection } from '../modules/target-selector.js';
import { runExploitation, openFramework, createOrchestrator, type ExploitationMode } from '../modules/exploitation.js';
import type { MsfConsoleAdapter } from '../framework/msf-adapter.js';
import type { OrchestrationSession } from '../exploitation/session.js';
import { PromptConfirmationGate } from '../exploitation/confirmation.js';
import { ArtifactManager, replayArtifact } from '../exploitation/artifact-manager.js';
import { generateReport } from '../report-generator.js';
import { classifyError, errorMessage } from '../error-handling.js';
import {
  printPhaseHeader,
  printInfo,
  printSuccess,
  printWarning,
  printError,
  printHosts,
  printServices,
  printCandidates,
  printAttempt,
  printOutcome,
  printArtifacts,
  formatStatus,
} from './display.js';

dotenv.config();

const MENU = [
  ['1', 'Discover hosts'],
  ['2', 'Select target'],
  ['3', 'Scan ports'],
  ['4', 'Search exploits'],
  ['5', 'Automated exploitation'],
  ['6', 'Run single exploit'],
  ['7', 'Retry an attempt'],
  ['8', 'Artifacts'],
  ['9', 'Status'],
  ['0', 'Quit'],
] as const;

interface MenuState {
  config: NetstrikeConfig;
  outputDir: string;
  audit: AuditSession;
  sessionId: string;
  startTime: string;
  discovery: DiscoveryResult | null;
  selected: DiscoveredHost | null;
  portScan: PortScanResult | null;
  target: TargetDescriptor | null;
  adapter: MsfConsoleAdapter | null;
  lastSession: OrchestrationSession | null;
  lastReport: OutcomeReport | null;
  /** Set while an exploitation run is in flight; Ctrl-C aborts through it. */
  running: AbortController | null;
}

function ask(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    let answered = false;
    rl.on('SIGINT', () => {
      rl.close();
    });
    rl.on('close', () => {
      if (!answered) resolve('');
    });
    rl.question(question, (answer) => {
      answered = true;
      rl.close();
      resolve(answer.trim());
    });
  });
}

function printBanner(state: MenuState): void {
  console.log('');
  console.log('╔══════════════════════════════════════════╗');
  console.log('║        netstrike exploit console         ║');
  console.log('╚══════════════════════════════════════════╝');
  console.log(`Session:  ${state.sessionId}`);
  console.log(`Output:   ${state.outputDir}`);
  console.log(`Console:  ${state.config.framework.msf_path}`);
  console.log('');
  console.log('\x1b[33mOnly test systems you own or have explicit written authorization to test.\x1b[0m');
}

function printMenu(state: MenuState): void {
  console.log('');
  const target = state.target
    ? `${state.target.address} (${state.target.openServices.length} open)`
    : state.selected?.address ?? 'none';
  console.log(`Target: ${target}`);
  for (const [key, label] of MENU) {
    console.log(`  ${key}) ${label}`);
  }
}

async function ensureFramework(state: MenuState): Promise<MsfConsoleAdapter> {
  if (state.adapter?.isOpen) return state.adapter;
  state.adapter = await openFramework(state.config, { onTranscript: state.audit.transcriptListener() });
  printSuccess('Framework console ready');
  return state.adapter;
}

function requireTarget(state: MenuState): TargetDescriptor | null {
  if (!state.target) {
    printWarning('Scan a selected host first (options 2 and 3)');
    return null;
  }
  if (state.target.openServices.length === 0) {
    printWarning(`${state.target.address} has no open services to exploit`);
    return null;
  }
  return state.target;
}

// ─── Menu Actions ───────────────────────────────────────────────

async function discover(state: MenuState): Promise<void> {
  printPhaseHeader('discovery');
  const range = await ask('Range to sweep (blank for the local /24): ');
  await state.audit.startModule('discovery');
  try {
    state.discovery = await runDiscovery(range || undefined, state.outputDir);
    await state.audit.endModule('discovery', true);
  } catch (error) {
    await state.audit.endModule('discovery', false, errorMessage(error));
    throw error;
  }
  printHosts(state.discovery.hosts);
}

async function select(state: MenuState): Promise<void> {
  const answer = await ask('Host number or IP address: ');
  if (!answer) return;

  const selection: TargetSelection = /^\d+$/.test(answer)
    ? { index: parseInt(answer, 10) }
    : { address: answer };
  state.selected = selectTarget(state.discovery?.hosts ?? [], selection);
  state.portScan = null;
  state.target = null;
  state.lastSession = null;
  printSuccess(`Selected ${state.selected.address}`);
}

async function scan(state: MenuState): Promise<void> {
  if (!state.selected) {
    printWarning('Select a target first (option 2)');
    return;
  }
  printPhaseHeader('scanning');
  await state.audit.startModule('port-scan');
  try {
    state.portScan = await runPortScan(state.selected.address, state.config.scanning, state.outputDir);
    state.target = buildTargetDescriptor(state.selected, state.portScan.services);
    printServices(state.portScan.services);
    await state.audit.endModule('port-scan', true);
  } catch (error) {
    await state.audit.endModule('port-scan', false, errorMessage(error));
    throw error;
  }
}

async function search(state: MenuState): Promise<void> {
  const target = requireTarget(state);
  if (!target) return;

  const adapter = await ensureFramework(state);
  const { resolver } = createOrchestrator(adapter, state.config, new PromptConfirmationGate());
  printInfo(`Searching the catalog for ${target.openServices.length} service(s)...`);
  const catalog = await resolver.resolveTarget(target);
  printCandidates(catalog.candidates);
  if (catalog.skippedLines > 0) {
    printWarning(`${catalog.skippedLines} search line(s) could not be parsed`);
  }
}

async function exploit(state: MenuState, mode: ExploitationMode): Promise<void> {
  const target = state.target;
  if (!target) return;

  const adapter = await ensureFramework(state);
  const abort = new AbortController();
  state.running = abort;
  printPhaseHeader('exploitation');
  printInfo('Press Ctrl-C once to abort, twice to restart the console');

  await state.audit.startModule('exploitation');
  try {
    const { session, report } = await runExploitation(target, state.config, state.outputDir, {
      mode,
      gate: new PromptConfirmationGate(),
      signal: abort.signal,
      audit: state.audit,
      adapter,
      hooks: {
        onAttemptStarted: (attempt, current) => {
          printInfo(`[${attempt.index}/${current.candidates.length}] ${attempt.candidate.moduleId} on port ${attempt.candidate.service.port}`);
        },
        onAttemptFinished: (attempt, current) => printAttempt(attempt, current.candidates.length),
      },
    });
    state.lastSession = session;
    state.lastReport = report;
    printOutcome(report);
    await state.audit.endModule('exploitation', report.fault === null, report.fault?.message);

    const reportPath = await generateReport(
      {
        sessionId: state.sessionId,
        startTime: state.startTime,
        totalDurationMs: Date.now() - new Date(state.startTime).getTime(),
        ...(state.discovery ? { discovery: state.discovery } : {}),
        ...(state.portScan ? { portScan: state.portScan } : {}),
        exploitation: report,
      },
      state.outputDir,
      state.config.reporting.format
    );
    printSuccess(`Report saved to ${reportPath}`);
  } catch (error) {
    await state.audit.endModule('exploitation', false, errorMessage(error));
    throw error;
  } finally {
    state.running = null;
  }
}

async function single(state: MenuState): Promise<void> {
  if (!requireTarget(state)) return;
  const moduleId = await ask('Module path (e.g. exploit/unix/ftp/vsftpd_234_backdoor): ');
  if (!moduleId) return;
  const portAnswer = await ask('Port (blank for the first open service): ');
  const port = portAnswer ? parseInt(portAnswer, 10) : undefined;
  if (port !== undefined && Number.isNaN(port)) {
    printError(`Invalid port: ${portAnswer}`);
    return;
  }
  await exploit(state, port === undefined ? { kind: 'single', moduleId } : { kind: 'single', moduleId, port });
}

async function retry(state: MenuState): Promise<void> {
  if (!requireTarget(state)) return;
  const attempts = state.lastSession?.attempts ?? [];
  if (attempts.length === 0) {
    printWarning('No attempts to retry yet');
    return;
  }
  for (const attempt of attempts) {
    printAttempt(attempt, attempts.length);
  }
  const answer = await ask('Attempt number to retry: ');
  const attempt = attempts.find((candidate) => String(candidate.index) === answer);
  if (!attempt) {
    if (answer) printError(`No attempt ${answer}`);
    return;
  }
  await exploit(state, { kind: 'retry', attempt });
}

async function artifacts(state: MenuState): Promise<void> {
  const manager = new ArtifactManager(path.resolve(state.config.artifacts.directory));
  const address = state.target?.address ?? state.selected?.address;
  const entries = await manager.list(address);
  printArtifacts(entries);
  if (!address || entries.length === 0) return;

  const answer = await ask(`Replay the newest artifact for ${address}? (y/N): `);
  if (answer.toLowerCase() !== 'y') return;

  const newest = await manager.mostRecent(address);
  if (!newest) return;

  const adapter = await ensureFramework(state);
  const abort = new AbortController();
  state.running = abort;
  try {
    const output = await replayArtifact(adapter, newest, new PromptConfirmationGate(), {
      timeoutMs: state.config.exploitation.timeout_per_attempt_ms,
      ...(state.config.exploitation.confirmation_timeout_ms !== undefined
        ? { confirmationTimeoutMs: state.config.exploitation.confirmation_timeout_ms }
        : {}),
      signal: abort.signal,
    });
    if (output !== null) console.log(output);
  } finally {
    state.running = null;
  }
}

function status(state: MenuState): void {
  printPhaseHeader('status');
  console.log(`  Hosts discovered: ${state.discovery?.hosts.length ?? 0}`);
  console.log(`  Selected:         ${state.selected?.address ?? 'none'}`);
  console.log(`  Open services:    ${state.target ? state.target.openServices.length : '-'}`);
  console.log(`  Console:          ${state.adapter?.isOpen ? 'open' : 'closed'}`);
  if (state.lastReport) {
    console.log(`  Last session:     ${state.lastReport.sessionId} ${formatStatus(state.lastReport.sessionOutcome)}`);
    console.log(`  Attempts:         ${state.lastReport.attempts.length}/${state.lastReport.candidateCount}`);
  }

  const totals = Object.entries(state.audit.getMetrics().attempts)
    .map(([attemptStatus, count]) => `${attemptStatus} ${count}`)
    .join(', ');
  if (totals) console.log(`  Run totals:       ${totals}`);
}

// ─── Main Loop ──────────────────────────────────────────────────

function installInterruptHandler(state: MenuState): void {
  process.on('SIGINT', () => {
    const running = state.running;
    if (!running) return;

    if (!running.signal.aborted) {
      printWarning('Aborting after the current step... (Ctrl-C again to restart the console)');
      running.abort();
      return;
    }

    const adapter = state.adapter;
    if (!adapter) return;
    printWarning('Forcing console recovery...');
    adapter.recover(state.config.framework.recovery_grace_ms).then(
      (result) => printInfo(`Console recovery: ${result}`),
      (error: unknown) => printError(`Console recovery failed: ${errorMessage(error)}`)
    );
  });
}

async function loadConfig(configPath?: string): Promise<NetstrikeConfig> {
  const config = configPath ? await parseConfig(configPath) : getDefaultConfig();
  return applyEnvOverrides(config);
}

async function main() {
  const configPath = process.argv[2];
  const config = await loadConfig(configPath);
  const startTime = new Date().toISOString();
  const sessionId = `netstrike-${Date.now()}`;
  const outputDir = path.join(resolveOutputDir(process.argv[3]), sessionId);

  const audit = new AuditSession({ sessionId, outputDir });
  await audit.initialize();

  const state: MenuState = {
    config,
    outputDir,
    audit,
    sessionId,
    startTime,
    discovery: null,
    selected: null,
    portScan: null,
    target: null,
    adapter: null,
    lastSession: null,
    lastReport: null,
    running: null,
  };

  installInterruptHandler(state);
  printBanner(state);

  const actions: Record<string, (s: MenuState) => Promise<void> | void> = {
    '1': discover,
    '2': select,
    '3': scan,
    '4': search,
    '5': (s) => (requireTarget(s) ? exploit(s, { kind: 'automated' }) : undefined),
    '6': single,
    '7': retry,
    '8': artifacts,
    '9': status,
  };

  try {
    for (;;) {
      printMenu(state);
      const choice = await ask('netstrike> ');
      if (choice === '0' || choice === 'q') break;

      const action = actions[choice];
      if (!action) {
        if (choice) printError(`Unknown option: ${choice}`);
        continue;
      }

      try {
        await action(state);
      } catch (error) {
        const classified = classifyError(error);
        printError(`${classified.type}: ${classified.message}`);
      }
    }
  } finally {
    await state.adapter?.close();
    await audit.finalize({
      hostsDiscovered: state.discovery?.hosts.length ?? 0,
      servicesFound: state.portScan?.services.length ?? 0,
      candidatesResolved: state.lastReport?.candidateCount ?? 0,
      attemptsMade: state.lastReport?.attempts.length ?? 0,
      sessionOutcome: state.lastReport?.sessionOutcome ?? 'not_started',
    });
  }
  printInfo('Goodbye');
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
