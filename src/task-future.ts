/**
 * @module
 * Futures handed out by the bundled executors.
 */

import { type Result, ok, err } from 'neverthrow';
import { TaskCancelledError } from './errors';
import {
  type Future,
  type ScheduledFuture,
  type Task,
  type TaskState,
  taskName,
} from './executor';

export interface FutureHooks {
  /** Called once, right after the future is cancelled. */
  onCancel?: () => void;
}

// =================================================================
// Section 1: TaskFuture
// =================================================================

/**
 * A one-shot task together with the handle to its outcome. The owning
 * executor calls {@link TaskFuture.run} when a lane is free.
 *
 * @template T The task's result type.
 */
export class TaskFuture<T> implements Future<T> {
  readonly promise: Promise<T>;
  protected currentState: TaskState = 'pending';
  private readonly controller = new AbortController();
  private settleWith: (outcome: Result<T, unknown>) => void = () => {};

  constructor(
    readonly task: Task<T>,
    protected readonly hooks: FutureHooks = {},
  ) {
    this.promise = new Promise<T>((resolve, reject) => {
      this.settleWith = (outcome) => outcome.match(resolve, reject);
    });
    // Like any future, a failure surfaces only to callers that ask for it.
    void this.promise.catch(() => undefined);
  }

  get state(): TaskState {
    return this.currentState;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get name(): string {
    return taskName(this.task);
  }

  then<R1 = T, R2 = never>(
    onfulfilled?: ((value: T) => R1 | PromiseLike<R1>) | null,
    onrejected?: ((reason: unknown) => R2 | PromiseLike<R2>) | null,
  ): Promise<R1 | R2> {
    return this.promise.then(onfulfilled, onrejected);
  }

  isDone(): boolean {
    return (
      this.currentState === 'fulfilled' ||
      this.currentState === 'rejected' ||
      this.currentState === 'cancelled'
    );
  }

  isCancelled(): boolean {
    return this.currentState === 'cancelled';
  }

  cancel(mayInterruptIfRunning = false): boolean {
    if (this.isDone()) return false;
    const wasRunning = this.currentState === 'running';
    const reason = new TaskCancelledError(this.name);
    this.currentState = 'cancelled';
    this.settleWith(err(reason));
    if (wasRunning && mayInterruptIfRunning) {
      this.controller.abort(reason);
    }
    this.hooks.onCancel?.();
    return true;
  }

  /**
   * Aborts the task's signal without cancelling the future; the task decides
   * how to react.
   */
  interrupt(reason?: unknown): void {
    if (this.controller.signal.aborted) return;
    this.controller.abort(reason ?? new TaskCancelledError(this.name, `Task ${this.name} was interrupted`));
  }

  settle(): Promise<Result<T, unknown>> {
    return this.promise.then(
      (value) => ok<T, unknown>(value),
      (error: unknown) => err<T, unknown>(error),
    );
  }

  /**
   * Runs the task unless it was cancelled first. Never rejects.
   * @internal Called by the owning executor.
   */
  async run(): Promise<void> {
    if (this.currentState !== 'pending') return;
    this.currentState = 'running';
    const outcome = await this.invoke();
    this.complete(outcome);
  }

  protected invoke(): Promise<Result<T, unknown>> {
    // The executor callback runs the task synchronously; a sync throw becomes a rejection.
    return new Promise<T>((resolve) => resolve(this.task(this.signal))).then(
      (value) => ok<T, unknown>(value),
      (error: unknown) => err<T, unknown>(error),
    );
  }

  protected complete(outcome: Result<T, unknown>): void {
    // A future cancelled mid-run keeps its cancellation.
    if (this.currentState !== 'running') return;
    this.currentState = outcome.isOk() ? 'fulfilled' : 'rejected';
    this.settleWith(outcome);
  }
}

// =================================================================
// Section 2: ScheduledTaskFuture
// =================================================================

export type ScheduleMode = 'once' | 'fixed-rate' | 'fixed-delay';

export interface ScheduleSpec<T> extends FutureHooks {
  mode: ScheduleMode;
  /** Epoch milliseconds of the first firing. */
  firstRunAt: number;
  /** Period (fixed-rate) or delay between firings (fixed-delay); ignored for `once`. */
  interval: number;
  /** Called after each successful periodic firing, once the next firing time is known. */
  onRepeat?: (future: ScheduledTaskFuture<T>) => void;
}

/**
 * A delayed or periodic task. A periodic future goes back to `pending` after
 * each successful firing and only settles when cancelled (rejecting with
 * `TaskCancelledError`) or when a firing fails (rejecting with that failure).
 */
export class ScheduledTaskFuture<T> extends TaskFuture<T> implements ScheduledFuture<T> {
  readonly mode: ScheduleMode;
  private nextRunAt: number;
  private completedRuns = 0;
  private readonly interval: number;
  private readonly onRepeat?: (future: ScheduledTaskFuture<T>) => void;

  constructor(task: Task<T>, spec: ScheduleSpec<T>) {
    super(task, { onCancel: spec.onCancel });
    this.mode = spec.mode;
    this.nextRunAt = spec.firstRunAt;
    this.interval = spec.interval;
    this.onRepeat = spec.onRepeat;
  }

  get periodic(): boolean {
    return this.mode !== 'once';
  }

  get executions(): number {
    return this.completedRuns;
  }

  getDelay(): number {
    if (this.isDone()) return 0;
    return Math.max(0, this.nextRunAt - Date.now());
  }

  override async run(): Promise<void> {
    if (this.currentState !== 'pending') return;
    this.currentState = 'running';
    const outcome = await this.invoke();
    this.completedRuns += 1;

    if (this.periodic && outcome.isOk() && !this.isDone()) {
      this.currentState = 'pending';
      this.nextRunAt =
        this.mode === 'fixed-rate' ? this.nextRunAt + this.interval : Date.now() + this.interval;
      this.onRepeat?.(this);
      return;
    }
    this.complete(outcome);
  }
}
