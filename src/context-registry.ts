/**
 * @module
 * Per-strand storage for "the retry context that is current here".
 *
 * A *strand* is one asynchronous execution path as tracked by
 * `AsyncLocalStorage`: synchronous code plus every continuation it schedules
 * (awaits, timers, promise callbacks). Each strand owns exactly one
 * {@link ContextSlot}. A slot is only ever reached through the strand that owns
 * it, so no locking is involved anywhere.
 *
 * Code that never entered a forked strand shares the registry's root slot.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { type Result, ok, err } from 'neverthrow';
import { ContextNotFoundError } from './errors';

// =================================================================
// Section 1: Core Types
// =================================================================

/**
 * The state of one retry attempt, as produced by the surrounding retry
 * machinery. This package treats it as an opaque handle: it stores and hands
 * back the reference and never reads or mutates its fields.
 */
export interface RetryContext {
  /** Number of attempts that failed so far. */
  readonly retryCount: number;
  /** Enclosing context when retry operations are nested. */
  readonly parent?: RetryContext | null;
  /** Failure of the previous attempt, if any. */
  readonly lastError?: unknown;
}

/**
 * The single-value holder owned by one strand.
 */
export interface ContextSlot<C> {
  current: C | undefined;
}

/**
 * Anything able to run a function on a strand of its own.
 * `ContextRegistry` implements it; executors accept it to give each worker
 * lane a dedicated slot.
 */
export interface StrandSource {
  fork<R>(fn: () => R): R;
}

// =================================================================
// Section 2: ContextRegistry
// =================================================================

/**
 * Holds the current context of every strand.
 *
 * @template C The context type stored in the slots.
 *
 * @example
 * ```typescript
 * const registry = new ContextRegistry<RetryContext>();
 *
 * registry.fork(() => {
 *   registry.setCurrent(attemptContext);
 *   setTimeout(() => registry.getCurrent(), 10); // -> attemptContext
 * });
 * registry.getCurrent(); // -> undefined, the root slot was never touched
 * ```
 */
export class ContextRegistry<C> implements StrandSource {
  private readonly storage = new AsyncLocalStorage<ContextSlot<C>>();
  private readonly rootSlot: ContextSlot<C> = { current: undefined };

  /**
   * Returns the calling strand's context, or `undefined` when its slot is empty.
   */
  getCurrent(): C | undefined {
    return this.slot().current;
  }

  /**
   * Replaces the calling strand's context. `null` and `undefined` both empty
   * the slot. Callers that need the old value read it with `getCurrent()` first.
   */
  setCurrent(context: C | null | undefined): void {
    this.slot().current = context ?? undefined;
  }

  /**
   * Returns the calling strand's context.
   * @throws {ContextNotFoundError} If the slot is empty.
   */
  requireCurrent(): C {
    const context = this.getCurrent();
    if (context === undefined) throw new ContextNotFoundError();
    return context;
  }

  /**
   * Returns the calling strand's context as a `Result`.
   */
  getCurrentSafe(): Result<C, ContextNotFoundError> {
    const context = this.getCurrent();
    return context === undefined ? err(new ContextNotFoundError()) : ok(context);
  }

  /**
   * Runs `fn` on a new strand whose slot starts out holding the caller's
   * current context. Writes made inside `fn` (or by anything it schedules)
   * land in the new slot and are invisible to the caller.
   */
  fork<R>(fn: () => R): R {
    return this.storage.run({ current: this.getCurrent() }, fn);
  }

  /**
   * Whether the caller runs on a forked strand rather than the root slot.
   */
  isolated(): boolean {
    return this.storage.getStore() !== undefined;
  }

  private slot(): ContextSlot<C> {
    return this.storage.getStore() ?? this.rootSlot;
  }
}

// =================================================================
// Section 3: Process-wide Registry
// =================================================================

/**
 * The registry every wrapper and decorator uses unless given another one.
 */
export const retryContextRegistry = new ContextRegistry<RetryContext>();

/**
 * Reads the current retry context from the process-wide registry.
 */
export function getCurrentRetryContext(): RetryContext | undefined {
  return retryContextRegistry.getCurrent();
}

/**
 * Replaces the current retry context in the process-wide registry.
 */
export function setCurrentRetryContext(context: RetryContext | null | undefined): void {
  retryContextRegistry.setCurrent(context);
}
