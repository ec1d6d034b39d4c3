/**
 * @module
 * Submission contracts shared by the bundled executors and by the decorators
 * that propagate retry contexts over them. Any object implementing these
 * interfaces can be decorated.
 */

import type { Result } from 'neverthrow';
import { ConfigurationError } from './errors';

// =================================================================
// Section 1: Tasks
// =================================================================

/**
 * A unit of work. Receives the `AbortSignal` its executor aborts when the
 * task is interrupted (`cancel(true)`, `shutdownNow()`); tasks that do not
 * care about interruption simply ignore the argument.
 *
 * An action is a `Task<void>`.
 */
export type Task<T = unknown> = (signal: AbortSignal) => T | Promise<T>;

/**
 * Lifecycle of a submitted task.
 * Periodic tasks return to `pending` between firings.
 */
export type TaskState = 'pending' | 'running' | 'fulfilled' | 'rejected' | 'cancelled';

/**
 * Handle to the eventual outcome of a submitted task.
 */
export interface Future<T> extends PromiseLike<T> {
  /** Settles with the task's outcome, or rejects with `TaskCancelledError` once cancelled. */
  readonly promise: Promise<T>;
  readonly state: TaskState;
  /** The signal handed to the task. */
  readonly signal: AbortSignal;
  /**
   * Cancels the task. A task that has not started never runs; a running task
   * has its signal aborted when `mayInterruptIfRunning` is true.
   * @returns `false` if the task had already completed or been cancelled.
   */
  cancel(mayInterruptIfRunning?: boolean): boolean;
  isCancelled(): boolean;
  isDone(): boolean;
  /** Waits for the outcome without throwing. */
  settle(): Promise<Result<T, unknown>>;
}

/**
 * Handle to a delayed or periodic task.
 */
export interface ScheduledFuture<T> extends Future<T> {
  /** Milliseconds until the next firing; `0` once due or finished. */
  getDelay(): number;
  readonly periodic: boolean;
  /** Number of completed firings. */
  readonly executions: number;
}

// =================================================================
// Section 2: Executor Contracts
// =================================================================

/**
 * Accepts one task at a time, fire-and-forget.
 */
export interface Executor {
  execute(task: Task<unknown>): void;
}

export interface InvokeOptions {
  /** Milliseconds to wait before giving up on the batch. */
  timeout?: number;
}

/**
 * An executor with result-bearing submission, bulk submission and lifecycle
 * management.
 */
export interface ExecutorService extends Executor {
  submit<T>(task: Task<T>): Future<T>;
  /** Runs `task`, then completes the future with `result`. */
  submit<T>(task: Task<unknown>, result: T): Future<T>;
  /**
   * Runs every task and resolves, once all are done, with their futures in
   * input order. With a `timeout`, unfinished tasks are cancelled when it
   * elapses.
   */
  invokeAll<T>(tasks: ReadonlyArray<Task<T>> | null | undefined, options?: InvokeOptions): Promise<Future<T>[]>;
  /**
   * Resolves with the result of the first task to succeed and cancels the
   * others. Rejects with an `AggregateError` when every task fails.
   */
  invokeAny<T>(tasks: ReadonlyArray<Task<T>> | null | undefined, options?: InvokeOptions): Promise<T>;
  /** Stops accepting tasks; queued tasks still run. */
  shutdown(): void;
  /** Stops accepting tasks, interrupts running ones and returns those that never started. */
  shutdownNow(): Task<unknown>[];
  isShutdown(): boolean;
  isTerminated(): boolean;
  /** Resolves `true` once terminated, or `false` if `timeout` ms pass first. */
  awaitTermination(timeout: number): Promise<boolean>;
}

/**
 * An executor service that also runs tasks after a delay or periodically.
 */
export interface ScheduledExecutorService extends ExecutorService {
  schedule<T>(task: Task<T>, delay: number): ScheduledFuture<T>;
  /** Fires at `initialDelay`, `initialDelay + period`, `initialDelay + 2 * period`, ... */
  scheduleAtFixedRate(task: Task<unknown>, initialDelay: number, period: number): ScheduledFuture<unknown>;
  /** Fires at `initialDelay`, then `delay` ms after each firing finishes. */
  scheduleWithFixedDelay(task: Task<unknown>, initialDelay: number, delay: number): ScheduledFuture<unknown>;
}

// =================================================================
// Section 3: Type Guards and Helpers
// =================================================================

export function isExecutorService(target: Executor): target is ExecutorService {
  const candidate: Partial<ExecutorService> = target;
  return typeof candidate.submit === 'function' && typeof candidate.invokeAll === 'function';
}

export function isScheduledExecutorService(target: Executor): target is ScheduledExecutorService {
  const candidate: Partial<ScheduledExecutorService> = target;
  return (
    isExecutorService(target) &&
    typeof candidate.schedule === 'function' &&
    typeof candidate.scheduleAtFixedRate === 'function'
  );
}

/**
 * The display name used for a task in log lines and error messages.
 */
export function taskName(task: Task<unknown>): string {
  return task.name || 'anonymousTask';
}

/**
 * @throws {ConfigurationError} If `task` is not a function.
 */
export function requireRunnable<T>(task: Task<T> | null | undefined): Task<T> {
  if (typeof task !== 'function') {
    throw new ConfigurationError('task', 'task cannot be null');
  }
  return task;
}
