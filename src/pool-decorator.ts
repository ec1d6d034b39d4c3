/**
 * @module
 * Executor-service decoration: result-bearing and bulk submission are bound
 * to a retry context; lifecycle calls go straight through.
 */

import type { ExecutorService, Future, InvokeOptions, Task } from './executor';
import { type DecoratorOptions, type TaskAugmenter, DispatchDecorator } from './dispatch-decorator';
import { requirePresent } from './errors';
import type { ContextSource } from './task-wrapper';

/**
 * An {@link ExecutorService} that binds every task to a retry context before
 * forwarding it. Handles returned by the underlying service are passed back
 * untouched.
 */
export class PoolDecorator implements ExecutorService {
  private readonly dispatcher: DispatchDecorator;
  private readonly delegate: ExecutorService;

  /**
   * @param delegate The executor service tasks are forwarded to. Cannot be null.
   * @param context The context to install, or `INHERIT_CONTEXT`/`undefined`
   *                to use the one current on the submitting strand.
   */
  constructor(delegate: ExecutorService | null | undefined, context?: ContextSource, options: DecoratorOptions = {}) {
    this.delegate = requirePresent(delegate, 'delegateExecutor');
    this.dispatcher = new DispatchDecorator(this.delegate, context, options);
  }

  get augment(): TaskAugmenter {
    return this.dispatcher.augment;
  }

  execute(task: Task<unknown>): void {
    this.dispatcher.execute(task);
  }

  submit<T>(task: Task<T>): Future<T>;
  submit<T>(task: Task<unknown>, result: T): Future<T>;
  submit<T>(task: Task<unknown>, ...result: [] | [T]): Future<T> | Future<unknown> {
    const wrapped = this.augment(task);
    return result.length === 0
      ? this.delegate.submit(wrapped)
      : this.delegate.submit(wrapped, result[0]);
  }

  invokeAll<T>(tasks: ReadonlyArray<Task<T>> | null | undefined, options?: InvokeOptions): Promise<Future<T>[]> {
    return this.delegate.invokeAll(this.wrapAll(tasks), options);
  }

  invokeAny<T>(tasks: ReadonlyArray<Task<T>> | null | undefined, options?: InvokeOptions): Promise<T> {
    return this.delegate.invokeAny(this.wrapAll(tasks), options);
  }

  shutdown(): void {
    this.delegate.shutdown();
  }

  shutdownNow(): Task<unknown>[] {
    return this.delegate.shutdownNow();
  }

  isShutdown(): boolean {
    return this.delegate.isShutdown();
  }

  isTerminated(): boolean {
    return this.delegate.isTerminated();
  }

  awaitTermination(timeout: number): Promise<boolean> {
    return this.delegate.awaitTermination(timeout);
  }

  getDelegate(): ExecutorService {
    return this.delegate;
  }

  // Empty and absent batches are the underlying service's business.
  private wrapAll<T>(tasks: ReadonlyArray<Task<T>> | null | undefined): ReadonlyArray<Task<T>> | null | undefined {
    if (!tasks || tasks.length === 0) return tasks;
    return tasks.map((task) => this.augment(task));
  }
}
