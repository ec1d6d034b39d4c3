/**
 * @module
 * Scheduled-executor decoration.
 *
 * Each schedule call binds its task exactly once. A periodic schedule hands
 * the same bound task to the underlying scheduler, so every firing runs under
 * the context pinned when the schedule call was made; what is ambient on the
 * firing strand at fire time is never consulted.
 */

import type {
  Future,
  InvokeOptions,
  ScheduledExecutorService,
  ScheduledFuture,
  Task,
} from './executor';
import type { DecoratorOptions, TaskAugmenter } from './dispatch-decorator';
import { PoolDecorator } from './pool-decorator';
import { requirePresent } from './errors';
import type { ContextSource } from './task-wrapper';

export class SchedulerDecorator implements ScheduledExecutorService {
  private readonly pool: PoolDecorator;
  private readonly delegate: ScheduledExecutorService;

  /**
   * @param delegate The scheduler tasks are forwarded to. Cannot be null.
   * @param context The context to install, or `INHERIT_CONTEXT`/`undefined`
   *                to use the one current on the scheduling strand.
   */
  constructor(
    delegate: ScheduledExecutorService | null | undefined,
    context?: ContextSource,
    options: DecoratorOptions = {},
  ) {
    this.delegate = requirePresent(delegate, 'delegateExecutor');
    this.pool = new PoolDecorator(this.delegate, context, options);
  }

  get augment(): TaskAugmenter {
    return this.pool.augment;
  }

  schedule<T>(task: Task<T>, delay: number): ScheduledFuture<T> {
    return this.delegate.schedule(this.augment(task), delay);
  }

  scheduleAtFixedRate(task: Task<unknown>, initialDelay: number, period: number): ScheduledFuture<unknown> {
    return this.delegate.scheduleAtFixedRate(this.augment(task), initialDelay, period);
  }

  scheduleWithFixedDelay(task: Task<unknown>, initialDelay: number, delay: number): ScheduledFuture<unknown> {
    return this.delegate.scheduleWithFixedDelay(this.augment(task), initialDelay, delay);
  }

  execute(task: Task<unknown>): void {
    this.pool.execute(task);
  }

  submit<T>(task: Task<T>): Future<T>;
  submit<T>(task: Task<unknown>, result: T): Future<T>;
  submit<T>(task: Task<unknown>, ...result: [] | [T]): Future<T> | Future<unknown> {
    return result.length === 0 ? this.pool.submit(task) : this.pool.submit(task, result[0]);
  }

  invokeAll<T>(tasks: ReadonlyArray<Task<T>> | null | undefined, options?: InvokeOptions): Promise<Future<T>[]> {
    return this.pool.invokeAll(tasks, options);
  }

  invokeAny<T>(tasks: ReadonlyArray<Task<T>> | null | undefined, options?: InvokeOptions): Promise<T> {
    return this.pool.invokeAny(tasks, options);
  }

  shutdown(): void {
    this.pool.shutdown();
  }

  shutdownNow(): Task<unknown>[] {
    return this.pool.shutdownNow();
  }

  isShutdown(): boolean {
    return this.pool.isShutdown();
  }

  isTerminated(): boolean {
    return this.pool.isTerminated();
  }

  awaitTermination(timeout: number): Promise<boolean> {
    return this.pool.awaitTermination(timeout);
  }

  getDelegate(): ScheduledExecutorService {
    return this.delegate;
  }
}
