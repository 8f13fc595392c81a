import { Connection, Client, type WorkflowHandle } from '@temporalio/client';
import {
  ABORT_SIGNAL_NAME,
  CONFIRM_SIGNAL_NAME,
  PROGRESS_QUERY_NAME,
  TASK_QUEUE,
} from './shared.js';
import type { PipelineInput, WorkflowProgress } from './shared.js';
import type { ExploitationMode } from '../modules/exploitation.js';
import { PromptConfirmationGate } from '../exploitation/confirmation.js';
import { NetstrikeError, errorMessage } from '../error-handling.js';
import { isIP } from 'node:net';
import { userInfo } from 'node:os';
import path from 'node:path';
import dotenv from 'dotenv';

dotenv.config();

// Usage:
//   client TARGET=10.0.0.5 [MODULE=exploit/...] [PORT=445] [CONFIG=...] [OUTPUT=...] [CONFIRM=true] [WAIT=true]
//   client ACTION=confirm ID=<workflow-id>
//   client ACTION=abort ID=<workflow-id> [REASON=...]

function parseArgs(args: string[]): Record<string, string> {
  const parsed: Record<string, string> = {};
  for (const arg of args) {
    const eqIdx = arg.indexOf('=');
    if (eqIdx > 0) {
      parsed[arg.substring(0, eqIdx)] = arg.substring(eqIdx + 1);
    }
  }
  return parsed;
}

function parseMode(args: Record<string, string>): ExploitationMode {
  if (!args.MODULE) return { kind: 'automated' };
  if (args.PORT === undefined) return { kind: 'single', moduleId: args.MODULE };

  const port = Number(args.PORT);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new NetstrikeError(`Invalid port: ${args.PORT}`, 'InvalidTargetError');
  }
  return { kind: 'single', moduleId: args.MODULE, port };
}

async function promptForTarget(): Promise<string> {
  const { createInterface } = await import('node:readline');
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  return new Promise((resolve) => {
    console.log('');
    console.log('\x1b[1mEnter the target IP address:\x1b[0m');
    rl.question('\x1b[32m> \x1b[0m', (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

function operatorName(): string {
  return process.env.NETSTRIKE_OPERATOR || userInfo().username;
}

async function signalWorkflow(client: Client, action: string, args: Record<string, string>): Promise<void> {
  if (!args.ID) {
    throw new NetstrikeError(`ACTION=${action} needs ID=<workflow-id>`, 'ConfigurationError');
  }
  const handle = client.workflow.getHandle(args.ID);

  if (action === 'confirm') {
    await handle.signal(CONFIRM_SIGNAL_NAME, operatorName());
    console.log(`Exploitation confirmed for ${args.ID}`);
  } else if (action === 'abort') {
    await handle.signal(ABORT_SIGNAL_NAME, args.REASON || `aborted by ${operatorName()}`);
    console.log(`Abort sent to ${args.ID}`);
  } else {
    throw new NetstrikeError(`Unknown ACTION: ${action}`, 'ConfigurationError');
  }
}

async function waitForCompletion(handle: WorkflowHandle, input: PipelineInput): Promise<void> {
  console.log('');
  console.log('Waiting for completion...');

  let prompted = false;
  const gate = new PromptConfirmationGate();

  const poll = async () => {
    const progress = await handle.query<WorkflowProgress>(PROGRESS_QUERY_NAME);
    const elapsed = Math.floor(progress.elapsedMs / 1000);
    console.log(
      `[${elapsed}s] Phase: ${progress.currentPhase} | Module: ${progress.currentModule || 'idle'} | Done: ${progress.completedModules.length} | Failed: ${progress.failedModules.length}`
    );

    if (progress.awaitingConfirmation && !prompted) {
      prompted = true;
      const mode: ExploitationMode = input.mode ?? { kind: 'automated' };
      const decision = await gate.confirm({
        address: input.target.address,
        port: mode.kind === 'single' ? mode.port ?? null : null,
        moduleId: mode.kind === 'single' ? mode.moduleId : 'ranked candidates (automated)',
        scope: 'session',
      });
      if (decision === 'proceed') {
        await handle.signal(CONFIRM_SIGNAL_NAME, operatorName());
      } else {
        await handle.signal(ABORT_SIGNAL_NAME, 'declined at the confirmation prompt');
      }
    }
  };

  let polling = false;
  const pollInterval = setInterval(() => {
    if (polling) return;
    polling = true;
    poll()
      .catch((error: unknown) => {
        console.warn(`Progress query failed: ${errorMessage(error)}`);
      })
      .finally(() => {
        polling = false;
      });
  }, 5000);

  try {
    await handle.result();
    console.log('');
    console.log('Pipeline completed.');
    console.log(`Deliverables: ${path.join(input.outputPath, 'deliverables')}`);
  } catch (error) {
    console.error('');
    console.error(`Pipeline failed: ${errorMessage(error)}`);
  } finally {
    clearInterval(pollInterval);
  }
}

async function main() {
  const args = parseArgs(process.argv.slice(2));

  const temporalAddress = process.env.TEMPORAL_ADDRESS || 'localhost:7233';
  const connection = await Connection.connect({ address: temporalAddress });
  const client = new Client({ connection, namespace: process.env.TEMPORAL_NAMESPACE ?? 'default' });

  if (args.ACTION) {
    await signalWorkflow(client, args.ACTION, args);
    return;
  }

  let address = args.TARGET;
  if (!address) {
    address = await promptForTarget();
    if (!args.WAIT) args.WAIT = 'true';
  }
  if (!isIP(address)) {
    throw new NetstrikeError(`Invalid IP address: ${address || '(empty)'}`, 'InvalidTargetError');
  }

  const mode = parseMode(args);
  const configPath = args.CONFIG ? path.resolve(args.CONFIG) : undefined;
  const outputBase = args.OUTPUT || process.env.NETSTRIKE_OUTPUT_DIR || './audit-logs';

  const sessionId = `${address.replace(/[.:]/g, '-')}_netstrike-${Date.now()}`;
  const outputPath = path.resolve(outputBase, sessionId);

  const input: PipelineInput = {
    target: { address },
    configPath,
    outputPath,
    mode,
    preconfirmed: args.CONFIRM === 'true',
  };

  console.log('');
  console.log('╔══════════════════════════════════════════╗');
  console.log('║            netstrike pipeline            ║');
  console.log('╚══════════════════════════════════════════╝');
  console.log(`Target:   ${address}`);
  console.log(`Mode:     ${mode.kind === 'single' ? `single ${mode.moduleId}` : 'automated'}`);
  console.log(`Config:   ${configPath || '(defaults)'}`);
  console.log(`Output:   ${outputPath}`);
  console.log(`Session:  ${sessionId}`);
  console.log('');
  console.log('\x1b[33mOnly test systems you own or have explicit written authorization to test.\x1b[0m');
  console.log('');

  const handle = await client.workflow.start('netstrikePipelineWorkflow', {
    taskQueue: TASK_QUEUE,
    workflowId: sessionId,
    args: [input],
    workflowRunTimeout: '6 hours',
  });

  console.log(`Workflow started: ${handle.workflowId}`);
  console.log(`Run ID: ${handle.firstExecutionRunId}`);
  console.log('');
  console.log('Next steps:');
  if (!input.preconfirmed) {
    console.log(`  Confirm:  client ACTION=confirm ID=${handle.workflowId}`);
  }
  console.log(`  Abort:    client ACTION=abort ID=${handle.workflowId}`);
  console.log(`  Progress: query ${handle.workflowId}`);
  console.log('  Temporal UI: http://localhost:8233');

  if (args.WAIT === 'true') {
    await waitForCompletion(handle, input);
  }
}

main().catch((err) => {
  console.error('Client error:', err);
  process.exit(1);
});
