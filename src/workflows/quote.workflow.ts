import {
  proxyActivities,
  defineQuery,
  setHandler,
  ActivityFailure,
  ApplicationFailure
} from '@temporalio/workflow';
import type * as activities from '../activities/quote.activities';
import { BatchQuoteOutcome, PartQuoteInput } from '../models/types';
import { NON_RETRYABLE_ERROR_TYPES } from '../engine/errors';

// Quoting is pure computation: a failure there will fail again, so only
// persistence gets real retries.
const { quotePart } = proxyActivities<typeof activities>({
  startToCloseTimeout: '30 seconds',
  retry: {
    maximumAttempts: 3,
    nonRetryableErrorTypes: NON_RETRYABLE_ERROR_TYPES
  }
});

const { persistQuote } = proxyActivities<typeof activities>({
  startToCloseTimeout: '2 minutes',
  retry: {
    maximumAttempts: 5
  }
});

export interface BatchProgress {
  total: number;
  quoted: number;
  failed: number;
}

export const batchProgressQuery = defineQuery<BatchProgress>('batchProgress');

export interface BatchQuoteParams {
  parts: PartQuoteInput[];
  persist?: boolean;
}

function describeFailure(error: unknown): { error: string; errorType: string } {
  const cause = error instanceof ActivityFailure ? error.cause : error;
  if (cause instanceof ApplicationFailure) {
    return { error: cause.message, errorType: cause.type || 'ApplicationFailure' };
  }
  if (cause instanceof Error) {
    return { error: cause.message, errorType: cause.name };
  }
  return { error: String(cause), errorType: 'Error' };
}

/**
 * Quote every part concurrently. Parts are independent, so one failure is
 * recorded on its own outcome and the rest of the batch still completes.
 */
export async function batchQuoteWorkflow(params: BatchQuoteParams): Promise<BatchQuoteOutcome[]> {
  const { parts, persist = true } = params;
  const progress: BatchProgress = { total: parts.length, quoted: 0, failed: 0 };

  setHandler(batchProgressQuery, () => progress);

  return Promise.all(
    parts.map(async (part): Promise<BatchQuoteOutcome> => {
      try {
        const quote = await quotePart(part);
        const savedPath = persist ? await persistQuote(part.name, quote) : undefined;
        progress.quoted++;
        return { name: part.name, status: 'quoted', quote, savedPath };
      } catch (error) {
        progress.failed++;
        return { name: part.name, status: 'failed', ...describeFailure(error) };
      }
    })
  );
}
