// timer-scheduler.test.ts
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { ConfigurationError, RejectedTaskError, TaskCancelledError } from '../src/errors'
import { TimerScheduler } from '../src/timer-scheduler'

describe('TimerScheduler', () => {
  let scheduler: TimerScheduler

  beforeEach(() => {
    vi.useFakeTimers()
    scheduler = new TimerScheduler({ dispatch: 'microtask' })
  })

  afterEach(() => {
    scheduler.shutdownNow()
    vi.useRealTimers()
  })

  describe('schedule', () => {
    it('should run the task once the delay has passed', async () => {
      const task = vi.fn(() => 'ran')

      const future = scheduler.schedule(task, 100)
      await vi.advanceTimersByTimeAsync(99)
      expect(task).not.toHaveBeenCalled()
      await vi.advanceTimersByTimeAsync(1)

      await expect(future.promise).resolves.toBe('ran')
      expect(future.executions).toBe(1)
      expect(future.periodic).toBe(false)
    })

    it('should count down the delay', async () => {
      const future = scheduler.schedule(() => undefined, 100)

      expect(future.getDelay()).toBe(100)
      await vi.advanceTimersByTimeAsync(40)
      expect(future.getDelay()).toBe(60)
    })

    it('should treat a negative delay as zero', async () => {
      const future = scheduler.schedule(() => 'now', -50)

      expect(future.getDelay()).toBe(0)
      await vi.advanceTimersByTimeAsync(0)
      await expect(future.promise).resolves.toBe('now')
    })

    it('should reject a delay that is not a finite number', () => {
      expect(() => scheduler.schedule(() => 1, Number.NaN)).toThrow(ConfigurationError)
      expect(() => scheduler.schedule(() => 1, Number.POSITIVE_INFINITY)).toThrow(
        'delay must be a finite number of milliseconds, got Infinity'
      )
    })

    it('should never run a task cancelled before its delay', async () => {
      const task = vi.fn()

      const future = scheduler.schedule(task, 50)
      future.cancel()
      await vi.advanceTimersByTimeAsync(100)

      expect(task).not.toHaveBeenCalled()
      await expect(future.promise).rejects.toBeInstanceOf(TaskCancelledError)
    })
  })

  describe('scheduleAtFixedRate', () => {
    it('should fire at initialDelay + n * period', async () => {
      const firedAt: number[] = []
      const start = Date.now()

      const future = scheduler.scheduleAtFixedRate(() => {
        firedAt.push(Date.now() - start)
      }, 10, 20)
      await vi.advanceTimersByTimeAsync(75)

      expect(firedAt).toEqual([10, 30, 50, 70])
      expect(future.executions).toBe(4)
      expect(future.periodic).toBe(true)
      expect(future.getDelay()).toBe(15)
    })

    it('should not overlap a firing that runs late', async () => {
      let running = 0
      let overlapped = false
      const startedAt: number[] = []
      const start = Date.now()

      scheduler.scheduleAtFixedRate(async () => {
        startedAt.push(Date.now() - start)
        running++
        overlapped = overlapped || running > 1
        await new Promise((resolve) => setTimeout(resolve, 25))
        running--
      }, 0, 10)
      await vi.advanceTimersByTimeAsync(60)

      expect(overlapped).toBe(false)
      expect(startedAt).toHaveLength(3)
      expect(startedAt[1] - startedAt[0]).toBeGreaterThanOrEqual(25)
      expect(startedAt[2] - startedAt[1]).toBeGreaterThanOrEqual(25)
    })

    it('should stop and reject with the error when a firing fails', async () => {
      const failure = new Error('third firing failed')
      let calls = 0

      const future = scheduler.scheduleAtFixedRate(() => {
        calls++
        if (calls === 3) throw failure
      }, 0, 10)
      await vi.advanceTimersByTimeAsync(100)

      expect(calls).toBe(3)
      expect(future.executions).toBe(3)
      await expect(future.promise).rejects.toBe(failure)
    })

    it('should stop firing once cancelled', async () => {
      const task = vi.fn()

      const future = scheduler.scheduleAtFixedRate(task, 0, 10)
      await vi.advanceTimersByTimeAsync(25)
      future.cancel()
      await vi.advanceTimersByTimeAsync(100)

      expect(task).toHaveBeenCalledTimes(3)
      expect(future.isCancelled()).toBe(true)
    })

    it('should reject a period that is not positive', () => {
      expect(() => scheduler.scheduleAtFixedRate(() => 1, 0, 0)).toThrow('period must be greater than 0, got 0')
    })
  })

  describe('scheduleWithFixedDelay', () => {
    it('should wait the delay after each firing finishes', async () => {
      const startedAt: number[] = []
      const start = Date.now()

      scheduler.scheduleWithFixedDelay(async () => {
        startedAt.push(Date.now() - start)
        await new Promise((resolve) => setTimeout(resolve, 5))
      }, 10, 20)
      await vi.advanceTimersByTimeAsync(70)

      expect(startedAt).toEqual([10, 35, 60])
    })

    it('should reject a delay that is not positive', () => {
      expect(() => scheduler.scheduleWithFixedDelay(() => 1, 0, -5)).toThrow(ConfigurationError)
    })
  })

  describe('shutdown', () => {
    it('should cancel periodic schedules but still fire delayed tasks', async () => {
      const delayed = vi.fn(() => 'fired')
      const periodic = scheduler.scheduleAtFixedRate(() => undefined, 10, 10)
      const oneShot = scheduler.schedule(delayed, 30)

      scheduler.shutdown()

      expect(periodic.isCancelled()).toBe(true)
      expect(scheduler.isTerminated()).toBe(false)
      expect(() => scheduler.schedule(() => 1, 10)).toThrow(RejectedTaskError)
      await vi.advanceTimersByTimeAsync(30)
      await expect(oneShot.promise).resolves.toBe('fired')
      await expect(scheduler.awaitTermination(100)).resolves.toBe(true)
    })

    it('should stop a periodic task that is running when shutdown is requested', async () => {
      let calls = 0
      const future = scheduler.scheduleAtFixedRate(async () => {
        calls++
        await new Promise((resolve) => setTimeout(resolve, 5))
      }, 0, 10)

      await vi.advanceTimersByTimeAsync(2)
      scheduler.shutdown()
      await vi.advanceTimersByTimeAsync(50)

      expect(calls).toBe(1)
      expect(future.isCancelled()).toBe(true)
      expect(scheduler.isTerminated()).toBe(true)
    })

    it('should hand back every pending schedule on shutdownNow', async () => {
      const later = () => 'later'
      const every = () => 'every'
      const oneShot = scheduler.schedule(later, 50)
      const periodic = scheduler.scheduleWithFixedDelay(every, 50, 50)

      const neverStarted = scheduler.shutdownNow()

      expect(neverStarted).toEqual([later, every])
      expect(oneShot.isCancelled()).toBe(true)
      expect(periodic.isCancelled()).toBe(true)
      expect(scheduler.isTerminated()).toBe(true)
      await expect(scheduler.awaitTermination(0)).resolves.toBe(true)
    })
  })
})
