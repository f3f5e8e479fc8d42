#!/usr/bin/env node
// Load environment variables first
import dotenv from 'dotenv';
dotenv.config();

import { Connection, WorkflowClient } from '@temporalio/client';
import { nanoid } from 'nanoid';
import inquirer from 'inquirer';
import chalk from 'chalk';
import { Command } from 'commander';
import fs from 'fs';
import type { batchQuoteWorkflow } from '../workflows/quote.workflow';
import { loadGeometryMetrics } from '../data/geometry';
import { assembleQuote, flattenQuote } from '../engine/quote';
import { QuoteError } from '../engine/errors';
import { EXPEDITED_OPTIONS, SHIPPING_TIERS } from '../engine/schemas';
import { temporalSettings } from '../config/temporal';
import { PartQuoteInput, QuoteRequest } from '../models/types';
import { formatQuoteReport } from './report';
import { buildQuoteRequest, requestFromChoice } from './request';

interface QuoteCommandOptions {
  quantity: number;
  shipping?: string;
  expedited?: string;
  output?: string;
  interactive?: boolean;
}

interface BatchCommandOptions {
  quantity: number;
  shipping?: string;
  persist: boolean;
}

function parseQuantity(value: string): number {
  return Number(value);
}

function printReport(lines: string[]) {
  lines.forEach(line => {
    if (/^[A-Z][A-Z ]+:$/.test(line) || line === 'CNC QUOTE RESULTS') {
      console.log(chalk.blue(line));
    } else {
      console.log(line);
    }
  });
}

function reportError(error: unknown) {
  if (error instanceof QuoteError) {
    console.error(chalk.red(`\nError [${error.code}]:`), error.message);
  } else {
    console.error(chalk.red('\nError generating quote:'), error);
  }
  process.exitCode = 1;
}

async function promptForRequest(defaults: QuoteCommandOptions): Promise<QuoteRequest> {
  const answers = await inquirer.prompt<{ quantity: number; shipping: string }>([
    {
      type: 'number',
      name: 'quantity',
      message: 'How many parts?',
      default: defaults.quantity,
      validate: (input: number) => (Number.isInteger(input) && input > 0) || 'Please enter a positive whole number'
    },
    {
      type: 'list',
      name: 'shipping',
      message: 'Shipping:',
      choices: [...SHIPPING_TIERS, ...EXPEDITED_OPTIONS],
      default: defaults.shipping || 'standard'
    }
  ]);

  return requestFromChoice(answers.quantity, answers.shipping);
}

async function runQuote(metricsFile: string, options: QuoteCommandOptions) {
  const { name, metrics } = loadGeometryMetrics(metricsFile);

  const request = options.interactive
    ? await promptForRequest(options)
    : buildQuoteRequest(options);

  console.log(chalk.blue(`Quoting ${name}...`));
  const quote = assembleQuote(metrics, request);

  printReport(formatQuoteReport(name, quote));

  if (options.output) {
    const document = {
      input_file: metricsFile,
      quantity: quote.quantity,
      shipping: quote.shipping,
      quote,
      flat: flattenQuote(quote)
    };
    fs.writeFileSync(options.output, JSON.stringify(document, null, 2), 'utf-8');
    console.log(chalk.green(`\n✓ Quote saved to: ${options.output}`));
  }
}

async function runBatch(metricsFiles: string[], options: BatchCommandOptions) {
  const request = buildQuoteRequest(options);
  const parts: PartQuoteInput[] = metricsFiles.map(file => {
    const { name, metrics } = loadGeometryMetrics(file);
    return { name, geometry: metrics, request };
  });

  const { address, taskQueue } = temporalSettings();
  const connection = await Connection.connect({ address });
  const client = new WorkflowClient({ connection });
  const workflowId = `cnc-batch-${nanoid()}`;

  try {
    const handle = await client.start<typeof batchQuoteWorkflow>('batchQuoteWorkflow', {
      taskQueue,
      workflowId,
      args: [{ parts, persist: options.persist }]
    });

    console.log(chalk.blue(`Workflow started: ${workflowId}`));
    console.log(chalk.yellow(`Quoting ${parts.length} parts...\n`));

    const outcomes = await handle.result();

    console.log(chalk.blue('=== Batch Summary ==='));
    outcomes.forEach(outcome => {
      if (outcome.status === 'quoted') {
        const { quote } = outcome;
        console.log(
          chalk.green('✓'),
          `${outcome.name}: $${quote.perUnitCost.toFixed(2)}/unit, $${quote.totalCost.toFixed(2)} total, ${quote.leadTimeDays} days`
        );
        if (outcome.savedPath) {
          console.log(`    saved to ${outcome.savedPath}`);
        }
      } else {
        console.log(chalk.red('✗'), `${outcome.name}: [${outcome.errorType}] ${outcome.error}`);
      }
    });
  } finally {
    await connection.close();
  }
}

// CLI setup
const program = new Command();

program
  .name('cnc-quote')
  .description('CNC machining cost and lead-time estimator for aluminum parts')
  .version('1.0.0');

program
  .command('quote')
  .description('Quote one part from its geometry metrics JSON file')
  .argument('<metrics-file>', 'Geometry metrics JSON produced by the CAD extraction step')
  .option('-q, --quantity <n>', 'Quantity of parts', parseQuantity, 1)
  .option('-s, --shipping <tier>', `Shipping tier (${SHIPPING_TIERS.join(', ')})`)
  .option('-e, --expedited <option>', `Legacy expedited delivery (${EXPEDITED_OPTIONS.join(', ')})`)
  .option('-o, --output <file>', 'Write the quote as JSON')
  .option('-i, --interactive', 'Prompt for quantity and shipping')
  .action(async (metricsFile: string, options: QuoteCommandOptions) => {
    try {
      await runQuote(metricsFile, options);
    } catch (error) {
      reportError(error);
    }
  });

program
  .command('batch')
  .description('Quote several parts concurrently through the Temporal batch workflow')
  .argument('<metrics-files...>', 'Geometry metrics JSON files')
  .option('-q, --quantity <n>', 'Quantity of each part', parseQuantity, 1)
  .option('-s, --shipping <tier>', `Shipping tier (${SHIPPING_TIERS.join(', ')})`)
  .option('--no-persist', 'Do not write quotes to the runs directory')
  .action(async (metricsFiles: string[], options: BatchCommandOptions) => {
    try {
      await runBatch(metricsFiles, options);
    } catch (error) {
      reportError(error);
      if (!(error instanceof QuoteError)) {
        console.log(chalk.yellow('\nMake sure:'));
        console.log('1. Temporal server is running (npm run temporal)');
        console.log('2. Worker is running (npm run worker)');
      }
    }
  });

program.parseAsync().catch(reportError);
