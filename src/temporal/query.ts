import { Client, Connection, WorkflowNotFoundError } from '@temporalio/client';
import dotenv from 'dotenv';
import { PROGRESS_QUERY_NAME, type WorkflowProgress } from './shared.js';
import { formatDuration } from '../report-generator.js';

dotenv.config();

function printProgress(workflowId: string, progress: WorkflowProgress): void {
  const phase = progress.awaitingConfirmation
    ? `${progress.currentPhase} (awaiting confirmation)`
    : progress.currentPhase;

  const rows: Array<[string, string]> = [
    ['Workflow', workflowId],
    ['Phase', phase],
    ['Module', progress.currentModule ?? 'idle'],
    ['Outcome', progress.sessionOutcome ?? '-'],
    ['Started', progress.startTime],
    ['Elapsed', formatDuration(progress.elapsedMs)],
    ['Completed', progress.completedModules.join(', ') || 'none'],
    ['Failed', progress.failedModules.join(', ') || 'none'],
  ];

  console.log('');
  for (const [label, value] of rows) {
    console.log(`${`${label}:`.padEnd(12)}${value}`);
  }
  if (progress.awaitingConfirmation) {
    console.log('');
    console.log(`Confirm with: npm run client -- ACTION=confirm ID=${workflowId}`);
  }
  console.log('');
}

async function main(): Promise<void> {
  const workflowId = process.argv[2];
  if (!workflowId) {
    console.error('Usage: npm run query -- <workflow-id>');
    process.exit(1);
  }

  const connection = await Connection.connect({ address: process.env.TEMPORAL_ADDRESS ?? 'localhost:7233' });
  const client = new Client({ connection, namespace: process.env.TEMPORAL_NAMESPACE ?? 'default' });
  const handle = client.workflow.getHandle(workflowId);

  try {
    const { status } = await handle.describe();
    if (status.name !== 'RUNNING') {
      console.log(`Workflow ${workflowId} is ${status.name.toLowerCase()}.`);
      if (status.name === 'COMPLETED') console.log('The report is in the deliverables/ directory of the run.');
      return;
    }

    printProgress(workflowId, await handle.query<WorkflowProgress>(PROGRESS_QUERY_NAME));
  } catch (error) {
    if (!(error instanceof WorkflowNotFoundError)) throw error;
    console.error(`No workflow with ID ${workflowId}`);
    process.exitCode = 1;
  } finally {
    await connection.close();
  }
}

main().catch((err) => {
  console.error('Query error:', err);
  process.exit(1);
});
