/**
 * @module
 * Retry-context propagation across executor hand-off boundaries: wrap a task,
 * or decorate an executor, and the retry context current at submission is the
 * one current while the task runs.
 */

// Per-strand context storage
export * from './context-registry';

// Task wrapping
export * from './task-wrapper';

// Decorators over the executor contracts
export * from './dispatch-decorator';
export * from './pool-decorator';
export * from './scheduler-decorator';
export * from './propagation';

// Executor contracts and the bundled in-process executors
export * from './executor';
export * from './task-future';
export * from './worker-pool';
export * from './timer-scheduler';

// Errors and logging
export * from './errors';
export * from './logger';
