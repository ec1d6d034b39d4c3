// task-future.test.ts
import { describe, it, expect, vi } from 'vitest'
import { TaskCancelledError, isTaskCancelledError } from '../src/errors'
import { ScheduledTaskFuture, TaskFuture } from '../src/task-future'

describe('TaskFuture', () => {
  it('should move from pending through running to fulfilled', async () => {
    const states: string[] = []
    const future: TaskFuture<string> = new TaskFuture(() => {
      states.push(future.state)
      return 'value'
    })

    states.push(future.state)
    await future.run()
    states.push(future.state)

    expect(states).toEqual(['pending', 'running', 'fulfilled'])
    expect(future.isDone()).toBe(true)
    await expect(future).resolves.toBe('value')
  })

  it('should settle into an Ok or Err result without throwing', async () => {
    const failure = new Error('nope')
    const good = new TaskFuture(() => 1)
    const bad = new TaskFuture(() => {
      throw failure
    })

    await Promise.all([good.run(), bad.run()])

    expect((await good.settle())._unsafeUnwrap()).toBe(1)
    expect((await bad.settle())._unsafeUnwrapErr()).toBe(failure)
    expect(bad.state).toBe('rejected')
  })

  it('should not run a task cancelled before it started', async () => {
    const task = vi.fn()
    const onCancel = vi.fn()
    const future = new TaskFuture(task, { onCancel })

    expect(future.cancel()).toBe(true)
    await future.run()

    expect(task).not.toHaveBeenCalled()
    expect(onCancel).toHaveBeenCalledTimes(1)
    expect(future.state).toBe('cancelled')
  })

  it('should refuse to cancel a finished task', async () => {
    const future = new TaskFuture(() => 'done')
    await future.run()

    expect(future.cancel(true)).toBe(false)
    expect(future.isCancelled()).toBe(false)
  })

  it('should reject with a TaskCancelledError naming the task', async () => {
    const future = new TaskFuture(function syncInventory() {})

    future.cancel()

    const reason = await future.promise.catch((error: unknown) => error)
    expect(isTaskCancelledError(reason)).toBe(true)
    expect(reason instanceof Error ? reason.message : '').toBe('Task syncInventory was cancelled')
  })

  it('should keep the cancellation when a cancelled task finishes anyway', async () => {
    let finish: () => void = () => {}
    const future = new TaskFuture(() => new Promise<void>((resolve) => {
      finish = resolve
    }))

    const running = future.run()
    future.cancel()
    finish()
    await running

    expect(future.state).toBe('cancelled')
    expect(future.signal.aborted).toBe(false)
  })

  it('should abort the signal on interrupt without cancelling', () => {
    const future = new TaskFuture(() => undefined)

    future.interrupt()

    expect(future.signal.aborted).toBe(true)
    expect(future.signal.reason).toBeInstanceOf(TaskCancelledError)
    expect(future.isCancelled()).toBe(false)
  })
})

describe('ScheduledTaskFuture', () => {
  it('should return to pending after a successful periodic firing', async () => {
    const onRepeat = vi.fn()
    const future = new ScheduledTaskFuture(() => 'tick', {
      mode: 'fixed-rate',
      firstRunAt: Date.now(),
      interval: 1_000,
      onRepeat
    })

    await future.run()

    expect(future.state).toBe('pending')
    expect(future.executions).toBe(1)
    expect(onRepeat).toHaveBeenCalledWith(future)
    expect(future.getDelay()).toBeGreaterThan(0)
    expect(future.getDelay()).toBeLessThanOrEqual(1_000)
  })

  it('should complete a one-shot schedule after its single firing', async () => {
    const onRepeat = vi.fn()
    const future = new ScheduledTaskFuture(() => 'once', {
      mode: 'once',
      firstRunAt: Date.now(),
      interval: 0,
      onRepeat
    })

    await future.run()

    expect(future.state).toBe('fulfilled')
    expect(future.getDelay()).toBe(0)
    expect(onRepeat).not.toHaveBeenCalled()
  })
})
