/**
 * @module
 * Error types raised by the context-propagation layer and by the bundled
 * executors. Failures raised by user tasks are never wrapped in any of these:
 * they reach the caller exactly as the task raised them.
 */

// =================================================================
// Section 1: Configuration Errors
// =================================================================

/**
 * Thrown at construction or wrap time when a required collaborator is missing
 * or an option is out of range. Never raised while a task executes.
 */
export class ConfigurationError extends Error {
  public readonly _tag = 'ConfigurationError' as const;
  public readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.field = field;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Throws a `ConfigurationError` for `field` unless `value` is present.
 */
export function requirePresent<T>(value: T | null | undefined, field: string): T {
  if (value === null || value === undefined) {
    throw new ConfigurationError(field, `${field} cannot be null`);
  }
  return value;
}

/**
 * Validates a delay or timeout in milliseconds. Negative values count as zero.
 */
export function normalizeDelay(value: number, field: string): number {
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(field, `${field} must be a finite number of milliseconds, got ${value}`);
  }
  return Math.max(0, value);
}

/**
 * Validates a value that must be strictly positive and finite.
 */
export function requirePositive(value: number, field: string): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(field, `${field} must be greater than 0, got ${value}`);
  }
  return value;
}

/**
 * Thrown by `ContextRegistry.requireCurrent()` when the calling strand has no
 * retry context installed.
 */
export class ContextNotFoundError extends Error {
  public readonly _tag = 'ContextNotFoundError' as const;

  constructor(message?: string) {
    super(message || 'No retry context is installed on the current execution strand.');
    this.name = 'ContextNotFoundError';
    Object.setPrototypeOf(this, ContextNotFoundError.prototype);
  }
}

// =================================================================
// Section 2: Executor Errors
// =================================================================

/**
 * Thrown when a task is handed to an executor that no longer accepts work.
 */
export class RejectedTaskError extends Error {
  public readonly _tag = 'RejectedTaskError' as const;
  public readonly taskName: string;

  constructor(taskName: string, reason = 'executor has been shut down') {
    super(`Task ${taskName} rejected: ${reason}`);
    this.name = 'RejectedTaskError';
    this.taskName = taskName;
    Object.setPrototypeOf(this, RejectedTaskError.prototype);
  }
}

/**
 * The rejection reason of a cancelled future, and the abort reason handed to
 * a running task that is interrupted.
 */
export class TaskCancelledError extends Error {
  public readonly _tag = 'TaskCancelledError' as const;
  public readonly taskName: string;

  constructor(taskName: string, message?: string) {
    super(message || `Task ${taskName} was cancelled`);
    this.name = 'TaskCancelledError';
    this.taskName = taskName;
    Object.setPrototypeOf(this, TaskCancelledError.prototype);
  }
}

/**
 * Raised by the timed variants of `invokeAny` when no task succeeded in time.
 */
export class TaskTimeoutError extends Error {
  public readonly _tag = 'TaskTimeoutError' as const;
  public readonly timeout: number;

  constructor(timeout: number) {
    super(`No task completed successfully within ${timeout}ms`);
    this.name = 'TaskTimeoutError';
    this.timeout = timeout;
    Object.setPrototypeOf(this, TaskTimeoutError.prototype);
  }
}

// =================================================================
// Section 3: Type Guards
// =================================================================

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError && error._tag === 'ConfigurationError';
}

export function isTaskCancelledError(error: unknown): error is TaskCancelledError {
  return error instanceof TaskCancelledError && error._tag === 'TaskCancelledError';
}
