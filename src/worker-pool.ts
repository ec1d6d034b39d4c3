/**
 * @module
 * An in-process `ExecutorService`: a fixed number of worker lanes draining a
 * FIFO queue.
 *
 * Each lane is an `AsyncResource` created when the pool is built, so a task
 * always runs inside its lane's async context, whoever submitted it. Given a
 * `registry`, every lane is created on a strand of its own and therefore has
 * its own context slot, the way each thread of a thread pool has its own
 * thread-locals.
 */

import { AsyncLocalStorage, AsyncResource } from 'node:async_hooks';
import type { StrandSource } from './context-registry';
import {
  ConfigurationError,
  RejectedTaskError,
  TaskTimeoutError,
  normalizeDelay,
} from './errors';
import {
  type ExecutorService,
  type Future,
  type InvokeOptions,
  type Task,
  requireRunnable,
  taskName,
} from './executor';
import { type Logger, noopLogger, scopedLogger } from './logger';
import { TaskFuture } from './task-future';

// =================================================================
// Section 1: Options and Internal Types
// =================================================================

/**
 * How a free lane is handed its next task.
 * - `macrotask`: on a `setTimeout(…, 0)` tick, yielding to I/O in between.
 * - `microtask`: on `queueMicrotask`, before any pending I/O or timers.
 */
export type DispatchMode = 'macrotask' | 'microtask';

export interface WorkerPoolOptions {
  /**
   * Number of lanes, i.e. how many tasks may be in flight at once.
   * @default 1
   */
  size?: number;
  /**
   * Used in log lines.
   * @default 'WorkerPool'
   */
  name?: string;
  /** @default 'macrotask' */
  dispatch?: DispatchMode;
  /** @default noopLogger */
  logger?: Logger;
  /**
   * Creates every lane on a strand forked from this source, giving each lane
   * a context slot of its own. Without it, lanes share the slot of the strand
   * that built the pool.
   */
  registry?: StrandSource;
  /**
   * Receives failures of tasks handed to `execute()`, which have no future to
   * report to. Defaults to logging them at `error`.
   */
  onUncaughtError?: (error: unknown, task: Task<unknown>) => void;
}

/**
 * What the pool's queue holds. Implemented by `TaskFuture`.
 */
export interface PoolWork {
  readonly name: string;
  readonly task: Task<unknown>;
  /** Never rejects. */
  run(): Promise<void>;
  cancel(mayInterruptIfRunning?: boolean): boolean;
  interrupt(reason?: unknown): void;
  isDone(): boolean;
}

interface Lane {
  readonly id: number;
  readonly scope: AsyncResource;
}

interface LaneMarker {
  readonly pool: WorkerPool;
  readonly id: number;
}

const laneMarkers = new AsyncLocalStorage<LaneMarker>();

// =================================================================
// Section 2: WorkerPool
// =================================================================

/**
 * @example
 * ```typescript
 * const pool = new WorkerPool({ size: 2, logger: console });
 * const future = pool.submit(async () => fetchQuote());
 * const quote = await future;
 * pool.shutdown();
 * await pool.awaitTermination(1_000);
 * ```
 */
export class WorkerPool implements ExecutorService {
  readonly size: number;
  readonly name: string;
  protected readonly logger: Logger;

  private readonly dispatch: DispatchMode;
  private readonly onUncaughtError: (error: unknown, task: Task<unknown>) => void;
  private readonly lanes: readonly Lane[];
  private readonly idleLanes: number[];
  private readonly queue: PoolWork[] = [];
  private readonly active = new Set<PoolWork>();
  private shutdownRequested = false;
  private terminationAnnounced = false;
  private announceTermination: () => void = () => {};
  private readonly termination: Promise<void>;

  /**
   * @throws {ConfigurationError} If `size` is not a positive integer.
   */
  constructor(options: WorkerPoolOptions = {}) {
    const size = options.size ?? 1;
    if (!Number.isInteger(size) || size < 1) {
      throw new ConfigurationError('size', `size must be a positive integer, got ${size}`);
    }
    this.size = size;
    this.name = options.name ?? 'WorkerPool';
    this.logger = scopedLogger(options.logger ?? noopLogger, this.name);
    this.dispatch = options.dispatch ?? 'macrotask';
    this.onUncaughtError =
      options.onUncaughtError ??
      ((error, task) => this.logger.error(`Task ${taskName(task)} failed`, error));

    const registry = options.registry;
    const createLane = (id: number): Lane => ({
      id,
      scope: registry
        ? registry.fork(() => new AsyncResource('WorkerPoolLane'))
        : new AsyncResource('WorkerPoolLane'),
    });
    this.lanes = Array.from({ length: size }, (_, id) => createLane(id));
    // Used as a stack: lane 0 first, and a lane that just finished is reused first.
    this.idleLanes = this.lanes.map((lane) => lane.id).reverse();

    this.termination = new Promise<void>((resolve) => {
      this.announceTermination = resolve;
    });
  }

  /**
   * The id of the lane running the caller, or `undefined` when the caller
   * does not run on one of this pool's lanes.
   */
  currentWorkerId(): number | undefined {
    const marker = laneMarkers.getStore();
    return marker?.pool === this ? marker.id : undefined;
  }

  // ----- Submission -----

  execute(task: Task<unknown>): void {
    const future = this.accept(requireRunnable(task));
    void future.settle().then((outcome) => {
      if (!outcome.isErr() || future.isCancelled()) return;
      try {
        this.onUncaughtError(outcome.error, task);
      } catch (handlerError) {
        this.logger.error(`onUncaughtError threw for task ${taskName(task)}`, handlerError);
      }
    });
  }

  submit<T>(task: Task<T>): Future<T>;
  submit<T>(task: Task<unknown>, result: T): Future<T>;
  submit<T>(task: Task<unknown>, ...result: [] | [T]): Future<T> | Future<unknown> {
    const target = requireRunnable(task);
    if (result.length === 0) return this.accept(target);

    const value = result[0];
    const withResult = async (signal: AbortSignal): Promise<T> => {
      await target(signal);
      return value;
    };
    Object.defineProperty(withResult, 'name', { value: target.name, configurable: true });
    return this.accept(withResult);
  }

  async invokeAll<T>(
    tasks: ReadonlyArray<Task<T>> | null | undefined,
    options: InvokeOptions = {},
  ): Promise<Future<T>[]> {
    const batch = requireBatch(tasks);
    const timeout = options.timeout === undefined ? undefined : normalizeDelay(options.timeout, 'timeout');
    const futures = this.acceptAll(batch);

    const allDone = Promise.all(futures.map((future) => future.settle()));
    if (timeout === undefined) {
      await allDone;
      return futures;
    }
    if (!(await within(allDone, timeout))) {
      for (const future of futures) future.cancel(true);
    }
    return futures;
  }

  async invokeAny<T>(
    tasks: ReadonlyArray<Task<T>> | null | undefined,
    options: InvokeOptions = {},
  ): Promise<T> {
    const batch = requireBatch(tasks);
    if (batch.length === 0) {
      throw new ConfigurationError('tasks', 'tasks cannot be empty');
    }
    const timeout = options.timeout === undefined ? undefined : normalizeDelay(options.timeout, 'timeout');
    const futures = this.acceptAll(batch);

    let timer: ReturnType<typeof setTimeout> | undefined;
    try {
      return await new Promise<T>((resolve, reject) => {
        const errors: unknown[] = [];
        if (timeout !== undefined) {
          timer = setTimeout(() => reject(new TaskTimeoutError(timeout)), timeout);
        }
        for (const future of futures) {
          void future.settle().then((outcome) =>
            outcome.match(resolve, (error) => {
              errors.push(error);
              if (errors.length === futures.length) {
                reject(new AggregateError(errors, 'Every task failed'));
              }
            }),
          );
        }
      });
    } finally {
      clearTimeout(timer);
      for (const future of futures) future.cancel(true);
    }
  }

  // ----- Lifecycle -----

  shutdown(): void {
    if (this.shutdownRequested) return;
    this.shutdownRequested = true;
    this.logger.debug(`shutdown requested, ${this.queue.length} queued, ${this.active.size} running`);
    this.onShutdown();
    this.checkTermination();
  }

  shutdownNow(): Task<unknown>[] {
    this.shutdown();
    const neverStarted = this.queue.splice(0);
    for (const work of neverStarted) work.cancel(false);
    for (const work of this.active) work.interrupt();
    this.checkTermination();
    return neverStarted.map((work) => work.task);
  }

  isShutdown(): boolean {
    return this.shutdownRequested;
  }

  isTerminated(): boolean {
    return (
      this.shutdownRequested &&
      this.queue.length === 0 &&
      this.active.size === 0 &&
      !this.hasPendingWork()
    );
  }

  async awaitTermination(timeout: number): Promise<boolean> {
    const limit = normalizeDelay(timeout, 'timeout');
    if (this.isTerminated()) return true;
    return within(this.termination, limit);
  }

  // ----- Extension points -----

  /** Called once, when shutdown is first requested. */
  protected onShutdown(): void {}

  /** Work the pool does not hold in its queue yet, such as armed timers. */
  protected hasPendingWork(): boolean {
    return false;
  }

  /**
   * @throws {RejectedTaskError} Once the pool is shut down.
   */
  protected ensureAccepting(name: string): void {
    if (this.shutdownRequested) throw new RejectedTaskError(name);
  }

  /** Queues `work` without checking whether the pool still accepts tasks. */
  protected enqueue(work: PoolWork): void {
    this.queue.push(work);
    this.drain();
  }

  /** Removes `work` from the queue if it has not been handed to a lane. */
  protected withdraw(work: PoolWork): void {
    const index = this.queue.indexOf(work);
    if (index !== -1) this.queue.splice(index, 1);
    this.checkTermination();
  }

  protected checkTermination(): void {
    if (this.terminationAnnounced || !this.isTerminated()) return;
    this.terminationAnnounced = true;
    this.logger.debug('terminated');
    this.announceTermination();
  }

  // ----- Internals -----

  private accept<T>(task: Task<T>): TaskFuture<T> {
    this.ensureAccepting(taskName(task));
    const future: TaskFuture<T> = new TaskFuture(task, {
      onCancel: () => this.withdraw(future),
    });
    this.enqueue(future);
    return future;
  }

  private acceptAll<T>(tasks: ReadonlyArray<Task<T>>): TaskFuture<T>[] {
    const futures: TaskFuture<T>[] = [];
    try {
      for (const task of tasks) futures.push(this.accept(requireRunnable(task)));
    } catch (error) {
      for (const future of futures) future.cancel(true);
      throw error;
    }
    return futures;
  }

  private drain(): void {
    while (this.idleLanes.length > 0 && this.queue.length > 0) {
      const work = this.queue.shift();
      const laneId = this.idleLanes.pop();
      if (work === undefined || laneId === undefined) return;
      const lane = this.lanes[laneId];
      this.active.add(work);
      const start = (): void => this.runOn(lane, work);
      if (this.dispatch === 'microtask') {
        queueMicrotask(start);
      } else {
        setTimeout(start, 0);
      }
    }
  }

  private runOn(lane: Lane, work: PoolWork): void {
    this.logger.debug(`lane ${lane.id} started ${work.name}`);
    const running = lane.scope.runInAsyncScope(() =>
      laneMarkers.run({ pool: this, id: lane.id }, () => work.run()),
    );
    const release = (): void => {
      this.active.delete(work);
      this.idleLanes.push(lane.id);
      this.drain();
      this.checkTermination();
    };
    void running.then(release, (error: unknown) => {
      this.logger.error(`lane ${lane.id} failed while running ${work.name}`, error);
      release();
    });
  }
}

// =================================================================
// Section 3: Helpers
// =================================================================

function requireBatch<T>(tasks: ReadonlyArray<Task<T>> | null | undefined): ReadonlyArray<Task<T>> {
  if (!tasks) throw new ConfigurationError('tasks', 'tasks cannot be null');
  return tasks;
}

/**
 * Resolves `true` when `promise` settles within `timeout` ms, `false` otherwise.
 */
function within(promise: Promise<unknown>, timeout: number): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    const timer = setTimeout(() => resolve(false), timeout);
    const done = (): void => {
      clearTimeout(timer);
      resolve(true);
    };
    void promise.then(done, done);
  });
}
