/**
 * @module
 * Fire-and-forget executor decoration, plus the task augmenter every
 * decorator in this package is built around.
 */

import { retryContextRegistry } from './context-registry';
import { requirePresent } from './errors';
import type { Executor, Task } from './executor';
import {
  type ContextSource,
  type WrapOptions,
  INHERIT_CONTEXT,
  bindTask,
  requireTask,
  resolveContext,
} from './task-wrapper';

// =================================================================
// Section 1: Task Augmenters
// =================================================================

/**
 * Turns the task being submitted into the task that is actually forwarded.
 * Must be called once per submission and must not run the task.
 */
export type TaskAugmenter = <T>(task: Task<T>) => Task<T>;

export interface DecoratorOptions extends WrapOptions {
  /**
   * When inheriting, resolve the ambient context once, at construction, and
   * pin it for the decorator's whole life. Otherwise it is resolved each time
   * a task is submitted.
   * @default false
   */
  pinAmbient?: boolean;
  /**
   * Replaces context binding with a custom augmenter. The `context` argument
   * and the other options are then ignored.
   */
  augment?: TaskAugmenter;
}

/**
 * Builds the augmenter that binds every submitted task to `context`.
 *
 * An explicit context is pinned. An inherited one is resolved on the
 * submitting strand at each submission, unless `pinAmbient` is set.
 */
export function contextAugmenter(context: ContextSource, options: DecoratorOptions = {}): TaskAugmenter {
  const registry = options.registry ?? retryContextRegistry;
  const inherits = context === INHERIT_CONTEXT || context === null || context === undefined;

  if (!inherits || options.pinAmbient) {
    const pinned = resolveContext(context, options);
    return (task) => bindTask(task, pinned, registry);
  }
  return (task) => bindTask(requireTask(task), resolveContext(INHERIT_CONTEXT, options), registry);
}

// =================================================================
// Section 2: DispatchDecorator
// =================================================================

/**
 * An {@link Executor} that binds each task to a retry context before handing
 * it to the underlying executor.
 *
 * @example
 * ```typescript
 * const executor = new DispatchDecorator(pool, attemptContext);
 * executor.execute(() => getCurrentRetryContext()); // sees attemptContext
 * ```
 */
export class DispatchDecorator implements Executor {
  readonly augment: TaskAugmenter;
  private readonly delegate: Executor;

  /**
   * @param delegate The executor tasks are forwarded to. Cannot be null.
   * @param context The context to install, or `INHERIT_CONTEXT`/`undefined`
   *                to use the one current on the submitting strand.
   * @throws {ConfigurationError} If `delegate` is absent, or `pinAmbient`
   *         finds no ambient context.
   */
  constructor(delegate: Executor | null | undefined, context?: ContextSource, options: DecoratorOptions = {}) {
    this.delegate = requirePresent(delegate, 'delegateExecutor');
    this.augment = options.augment ?? contextAugmenter(context, options);
  }

  execute(task: Task<unknown>): void {
    this.delegate.execute(this.augment(task));
  }

  getDelegate(): Executor {
    return this.delegate;
  }
}
