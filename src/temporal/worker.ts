import { NativeConnection, Worker, bundleWorkflowCode } from '@temporalio/worker';
import { fileURLToPath } from 'node:url';
import dotenv from 'dotenv';
import * as activities from './activities.js';
import { TASK_QUEUE } from './shared.js';
import { NetstrikeError } from '../error-handling.js';

dotenv.config();

// Every exploitation activity drives its own msfconsole process.
const DEFAULT_MAX_ACTIVITIES = 2;

function maxActivities(raw: string | undefined): number {
  if (raw === undefined || raw === '') return DEFAULT_MAX_ACTIVITIES;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new NetstrikeError(`NETSTRIKE_MAX_ACTIVITIES must be a positive integer, got "${raw}"`, 'ConfigurationError');
  }
  return value;
}

async function main(): Promise<void> {
  const address = process.env.TEMPORAL_ADDRESS ?? 'localhost:7233';
  const namespace = process.env.TEMPORAL_NAMESPACE ?? 'default';
  const concurrency = maxActivities(process.env.NETSTRIKE_MAX_ACTIVITIES);

  console.log('netstrike worker');
  console.log(`  temporal    ${address} (${namespace})`);
  console.log(`  task queue  ${TASK_QUEUE}`);
  console.log(`  activities  ${concurrency} at a time`);

  const connection = await NativeConnection.connect({ address });
  try {
    const worker = await Worker.create({
      connection,
      namespace,
      taskQueue: TASK_QUEUE,
      workflowBundle: await bundleWorkflowCode({
        workflowsPath: fileURLToPath(new URL('./workflows.js', import.meta.url)),
      }),
      activities,
      maxConcurrentActivityTaskExecutions: concurrency,
    });

    console.log('Polling for pipeline tasks. Ctrl-C stops the worker once running activities finish.');
    await worker.run();
  } finally {
    await connection.close();
  }
}

main().catch((err) => {
  console.error('Worker stopped:', err);
  process.exit(1);
});
