/**
 * @module
 * Wraps a task so that it runs under a given retry context on whichever
 * strand ends up executing it.
 *
 * Every invocation of a wrapped task:
 * 1. forks a strand from the invoking one and remembers its current context ("prior");
 * 2. installs the pinned context;
 * 3. calls the delegate with the same arguments and hands back exactly what it returns or throws;
 * 4. restores "prior" once the delegate is finished: on return, on throw, or when
 *    its promise settles.
 *
 * The context is resolved when the task is wrapped, never when it runs.
 */

import {
  type ContextRegistry,
  type RetryContext,
  retryContextRegistry,
} from './context-registry';
import { ConfigurationError } from './errors';
import type { Task } from './executor';

// =================================================================
// Section 1: Types
// =================================================================

/**
 * Passed in place of a context to mean "whatever is current on the wrapping
 * strand right now". `null` and `undefined` mean the same.
 */
export const INHERIT_CONTEXT: unique symbol = Symbol('retry.inheritContext');

/**
 * A context to pin, or a request to inherit the ambient one at wrap time.
 */
export type ContextSource = RetryContext | typeof INHERIT_CONTEXT | null | undefined;

export interface WrapOptions {
  /**
   * Registry holding the strand slots.
   * @default retryContextRegistry
   */
  registry?: ContextRegistry<RetryContext>;
  /**
   * Accept an empty ambient context when inheriting. The task then runs with
   * no context installed instead of failing at wrap time.
   * @default false
   */
  allowEmpty?: boolean;
}

/**
 * A task bound to a retry context. Calling it runs the delegate under that
 * context; its `name` and `toString()` are the delegate's.
 */
export interface WrappedTask<T> {
  (signal: AbortSignal): T | Promise<T>;
  readonly delegate: Task<T>;
  /** The context installed on every invocation; `undefined` means "none". */
  readonly context: RetryContext | undefined;
  /**
   * The context that was current on the executing strand when the innermost
   * in-flight invocation began. `undefined` whenever nothing is in flight.
   */
  priorContext(): RetryContext | undefined;
  toString(): string;
}

const WRAPPED_TASK = Symbol('retry.wrappedTask');

interface ExecutionFrame {
  readonly prior: RetryContext | undefined;
}

// =================================================================
// Section 2: Wrapping
// =================================================================

/**
 * Resolves a {@link ContextSource} against the calling strand.
 *
 * @throws {ConfigurationError} When inheriting, the strand has no context and
 *         `allowEmpty` is not set.
 */
export function resolveContext(
  source: ContextSource,
  options: WrapOptions = {},
): RetryContext | undefined {
  if (source !== INHERIT_CONTEXT && source !== null && source !== undefined) {
    return source;
  }
  const registry = options.registry ?? retryContextRegistry;
  const ambient = registry.getCurrent();
  if (ambient === undefined && !options.allowEmpty) {
    throw new ConfigurationError(
      'retryContext',
      'retryContext cannot be null: no retry context is current on the wrapping strand',
    );
  }
  return ambient;
}

/**
 * Binds `delegate` to a retry context.
 *
 * @param delegate The task to run. Must be a function.
 * @param context The context to install, or `INHERIT_CONTEXT`/`undefined` to
 *                pin the context current on the calling strand.
 * @throws {ConfigurationError} If `delegate` is absent, or if inheriting finds
 *         no context and `options.allowEmpty` is not set.
 *
 * @example
 * ```typescript
 * const wrapped = wrapTask(() => getCurrentRetryContext(), attemptContext);
 * pool.submit(wrapped); // resolves to attemptContext, on whichever lane runs it
 * ```
 */
export function wrapTask<T>(
  delegate: Task<T> | null | undefined,
  context?: ContextSource,
  options: WrapOptions = {},
): WrappedTask<T> {
  const task = requireTask(delegate);
  return bindTask(task, resolveContext(context, options), options.registry ?? retryContextRegistry);
}

/**
 * Binds `delegate` to an already-resolved context. `undefined` installs "no
 * context". Used by the decorators, which resolve once and bind many times.
 * @internal
 */
export function bindTask<T>(
  delegate: Task<T>,
  context: RetryContext | undefined,
  registry: ContextRegistry<RetryContext>,
): WrappedTask<T> {
  const task = requireTask(delegate);
  const frames: ExecutionFrame[] = [];

  const leave = (frame: ExecutionFrame): void => {
    registry.setCurrent(frame.prior);
    const index = frames.lastIndexOf(frame);
    if (index !== -1) frames.splice(index, 1);
  };

  const invoke = (signal: AbortSignal): T | Promise<T> =>
    registry.fork(() => {
      const frame: ExecutionFrame = { prior: registry.getCurrent() };
      frames.push(frame);
      registry.setCurrent(context);

      let outcome: T | Promise<T>;
      try {
        outcome = task(signal);
      } catch (error) {
        leave(frame);
        throw error;
      }

      if (isPromiseLike(outcome)) {
        // The caller gets the delegate's own promise; restoring hangs off a side branch.
        void outcome.then(
          () => leave(frame),
          () => leave(frame),
        );
        return outcome;
      }
      leave(frame);
      return outcome;
    });

  Object.defineProperty(invoke, 'name', {
    value: task.name,
    configurable: true,
  });

  return Object.assign(invoke, {
    [WRAPPED_TASK]: true as const,
    delegate: task,
    context,
    priorContext: (): RetryContext | undefined => frames[frames.length - 1]?.prior,
    toString: (): string => task.toString(),
  });
}

// =================================================================
// Section 3: Inspection
// =================================================================

/**
 * Type guard for tasks produced by {@link wrapTask}.
 */
export function isWrappedTask<T>(task: Task<T>): task is WrappedTask<T> {
  return WRAPPED_TASK in task;
}

/**
 * Strips every layer of context wrapping from `task`.
 */
export function unwrapTask<T>(task: Task<T>): Task<T> {
  let current = task;
  while (isWrappedTask(current)) {
    current = current.delegate;
  }
  return current;
}

/**
 * @throws {ConfigurationError} If `delegate` is not a function.
 * @internal
 */
export function requireTask<T>(delegate: Task<T> | null | undefined): Task<T> {
  if (typeof delegate !== 'function') {
    throw new ConfigurationError('delegate', 'delegate cannot be null');
  }
  return delegate;
}

function isPromiseLike<T>(value: T | Promise<T>): value is Promise<T> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}
