/**
 * @module
 * One-call entry points: decorate whatever executor you hold, or run a single
 * function under a retry context.
 */

import { type DecoratorOptions, DispatchDecorator } from './dispatch-decorator';
import { requirePresent } from './errors';
import {
  type Executor,
  type ExecutorService,
  type ScheduledExecutorService,
  type Task,
  isExecutorService,
  isScheduledExecutorService,
} from './executor';
import { PoolDecorator } from './pool-decorator';
import { SchedulerDecorator } from './scheduler-decorator';
import { type ContextSource, type WrapOptions, wrapTask } from './task-wrapper';

/**
 * Decorates `target` with the richest decorator its surface supports.
 *
 * @example
 * ```typescript
 * const scheduler = withRetryContext(new TimerScheduler(), attemptContext);
 * scheduler.schedule(() => getCurrentRetryContext(), 100); // resolves to attemptContext
 * ```
 */
export function withRetryContext(
  target: ScheduledExecutorService,
  context?: ContextSource,
  options?: DecoratorOptions,
): SchedulerDecorator;
export function withRetryContext(
  target: ExecutorService,
  context?: ContextSource,
  options?: DecoratorOptions,
): PoolDecorator;
export function withRetryContext(
  target: Executor | null | undefined,
  context?: ContextSource,
  options?: DecoratorOptions,
): DispatchDecorator;
export function withRetryContext(
  target: Executor | null | undefined,
  context?: ContextSource,
  options: DecoratorOptions = {},
): DispatchDecorator | PoolDecorator | SchedulerDecorator {
  const executor = requirePresent(target, 'delegateExecutor');
  if (isScheduledExecutorService(executor)) return new SchedulerDecorator(executor, context, options);
  if (isExecutorService(executor)) return new PoolDecorator(executor, context, options);
  return new DispatchDecorator(executor, context, options);
}

export interface RunOptions extends WrapOptions {
  /** Handed to `fn`. A signal that never aborts is used otherwise. */
  signal?: AbortSignal;
}

/**
 * Runs `fn` on the calling strand under `context` and returns what it
 * returns. The caller's context is back in place once `fn` is done.
 */
export function runWithRetryContext<T>(
  context: ContextSource,
  fn: Task<T>,
  options: RunOptions = {},
): T | Promise<T> {
  const wrapped = wrapTask(fn, context, options);
  return wrapped(options.signal ?? new AbortController().signal);
}
