// Load environment variables first
import dotenv from 'dotenv';
dotenv.config();

import { Worker, NativeConnection } from '@temporalio/worker';
import * as activities from './activities/quote.activities';
import { temporalSettings } from './config/temporal';

async function run() {
  const { address, taskQueue } = temporalSettings();

  // Step 1: Connect to the Temporal server
  const connection = await NativeConnection.connect({
    address,
  });

  // Step 2: Register Workflows and Activities with the Worker
  const worker = await Worker.create({
    connection,
    workflowsPath: require.resolve('./workflows/quote.workflow'),
    activities,
    taskQueue,
  });

  console.log('Worker started and connected to Temporal server. Press Ctrl+C to exit.');

  // Step 3: Start accepting batch quote tasks
  await worker.run();
}

run().catch((err) => {
  console.error('Worker failed to start', err);
  process.exit(1);
});
