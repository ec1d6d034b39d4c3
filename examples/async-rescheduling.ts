/**
 * Asynchronous retries with rescheduling.
 *
 * A hand-written retry loop makes an attempt, and on failure reschedules the
 * next one on a `TimerScheduler` after a fixed backoff. Each attempt hands its
 * work to a user pool decorated with `PoolDecorator`, so the work sees the
 * attempt's retry context although it runs on a different lane.
 *
 * Run with: npm run example
 */

import {
  type RetryContext,
  PoolDecorator,
  TimerScheduler,
  WorkerPool,
  getCurrentRetryContext,
  runWithRetryContext,
} from '../src';

const MAX_ATTEMPTS = 5;
const BACKOFF_MS = 200;

const rescheduler = new TimerScheduler({ size: 3, name: 'rescheduler', logger: console });
const usersPool = new PoolDecorator(new WorkerPool({ size: 1, name: 'user-pool' }));

let calls = 0;

async function work(): Promise<string> {
  await new Promise((resolve) => setTimeout(resolve, 100));
  calls += 1;
  const context = getCurrentRetryContext();
  if (calls > 3) {
    console.log(`done, attempt ${context?.retryCount}`);
    return 'done';
  }
  console.log(`failed, attempt ${context?.retryCount}`);
  throw new Error(`attempt ${context?.retryCount} failed`);
}

async function attempt(context: RetryContext): Promise<string> {
  // The pool decorator inherits the context current on this strand.
  return runWithRetryContext(context, async () => usersPool.submit(work).promise);
}

async function retry(previous?: RetryContext): Promise<string> {
  const context: RetryContext = {
    retryCount: previous ? previous.retryCount + 1 : 0,
    lastError: previous?.lastError,
  };
  try {
    return await attempt(context);
  } catch (error) {
    if (context.retryCount + 1 >= MAX_ATTEMPTS) throw error;
    const failed: RetryContext = { ...context, lastError: error };
    return rescheduler.schedule(() => retry(failed), BACKOFF_MS).promise;
  }
}

async function main(): Promise<void> {
  const result = await retry();
  console.log(`result: ${result}`);
  rescheduler.shutdown();
  usersPool.shutdown();
  await Promise.all([rescheduler.awaitTermination(1_000), usersPool.awaitTermination(1_000)]);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
