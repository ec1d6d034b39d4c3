/**
 * @module
 * An in-process `ScheduledExecutorService`: timers hand due tasks to the lanes
 * of a {@link WorkerPool}.
 */

import { normalizeDelay, requirePositive } from './errors';
import {
  type ScheduledExecutorService,
  type ScheduledFuture,
  type Task,
  requireRunnable,
  taskName,
} from './executor';
import { type ScheduleMode, ScheduledTaskFuture } from './task-future';
import { type PoolWork, type WorkerPoolOptions, WorkerPool } from './worker-pool';

/**
 * Same options as {@link WorkerPool}; `name` defaults to `'TimerScheduler'`.
 */
export type TimerSchedulerOptions = WorkerPoolOptions;

interface PendingSchedule extends PoolWork {
  readonly periodic: boolean;
  getDelay(): number;
}

/**
 * Runs tasks after a delay or periodically.
 *
 * - Fixed-rate firings are anchored to `initialDelay + n * period`. A firing
 *   that runs late never overlaps the previous one; the next starts as soon as
 *   the previous finished.
 * - Fixed-delay firings start `delay` ms after the previous one finished.
 * - A periodic task that fails stops repeating; its future rejects with the failure.
 * - `shutdown()` cancels periodic schedules; one-shot delayed tasks still fire.
 *
 * @example
 * ```typescript
 * const scheduler = new TimerScheduler({ size: 2 });
 * const heartbeat = scheduler.scheduleAtFixedRate(() => ping(), 0, 5_000);
 * // later
 * heartbeat.cancel();
 * ```
 */
export class TimerScheduler extends WorkerPool implements ScheduledExecutorService {
  private readonly timers = new Map<PendingSchedule, ReturnType<typeof setTimeout>>();

  constructor(options: TimerSchedulerOptions = {}) {
    super({ name: 'TimerScheduler', ...options });
  }

  schedule<T>(task: Task<T>, delay: number): ScheduledFuture<T> {
    return this.plan(requireRunnable(task), 'once', normalizeDelay(delay, 'delay'), 0);
  }

  scheduleAtFixedRate(task: Task<unknown>, initialDelay: number, period: number): ScheduledFuture<unknown> {
    return this.plan(
      requireRunnable(task),
      'fixed-rate',
      normalizeDelay(initialDelay, 'initialDelay'),
      requirePositive(period, 'period'),
    );
  }

  scheduleWithFixedDelay(task: Task<unknown>, initialDelay: number, delay: number): ScheduledFuture<unknown> {
    return this.plan(
      requireRunnable(task),
      'fixed-delay',
      normalizeDelay(initialDelay, 'initialDelay'),
      requirePositive(delay, 'delay'),
    );
  }

  override shutdownNow(): Task<unknown>[] {
    const armed = [...this.timers.keys()];
    for (const schedule of armed) this.disarm(schedule);
    const neverStarted = super.shutdownNow();
    for (const schedule of armed) schedule.cancel(false);
    return [...neverStarted, ...armed.map((schedule) => schedule.task)];
  }

  protected override onShutdown(): void {
    const periodic = [...this.timers.keys()].filter((schedule) => schedule.periodic);
    if (periodic.length > 0) {
      this.logger.debug(`cancelling ${periodic.length} periodic schedule(s)`);
    }
    for (const schedule of periodic) schedule.cancel(false);
  }

  protected override hasPendingWork(): boolean {
    return this.timers.size > 0;
  }

  private plan<T>(task: Task<T>, mode: ScheduleMode, delay: number, interval: number): ScheduledTaskFuture<T> {
    this.ensureAccepting(taskName(task));
    const future: ScheduledTaskFuture<T> = new ScheduledTaskFuture(task, {
      mode,
      firstRunAt: Date.now() + delay,
      interval,
      onCancel: () => {
        this.disarm(future);
        this.withdraw(future);
      },
      onRepeat: (repeated) => {
        if (this.isShutdown()) {
          repeated.cancel(false);
        } else {
          this.arm(repeated, repeated.getDelay());
        }
      },
    });
    this.arm(future, delay);
    return future;
  }

  private arm(schedule: PendingSchedule, delay: number): void {
    const timer = setTimeout(() => {
      this.timers.delete(schedule);
      this.enqueue(schedule);
    }, delay);
    this.timers.set(schedule, timer);
  }

  private disarm(schedule: PendingSchedule): void {
    const timer = this.timers.get(schedule);
    if (timer === undefined) return;
    clearTimeout(timer);
    this.timers.delete(schedule);
  }
}
