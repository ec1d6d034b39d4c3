// helpers.ts
import { vi } from 'vitest'
import type { RetryContext } from '../src/context-registry'
import type { Logger } from '../src/logger'

export function retryContext(retryCount: number, lastError?: unknown): RetryContext {
  return { retryCount, lastError }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * A promise the test opens by hand.
 */
export function gate(): { opened: Promise<void>; open: () => void } {
  let release: () => void = () => {}
  const opened = new Promise<void>((resolve) => {
    release = resolve
  })
  return { opened, open: () => release() }
}

/**
 * Resolves once `signal` is aborted, with its reason.
 */
export function aborted(signal: AbortSignal): Promise<unknown> {
  return new Promise((resolve) => {
    if (signal.aborted) return resolve(signal.reason)
    signal.addEventListener('abort', () => resolve(signal.reason), { once: true })
  })
}

export function recordingLogger() {
  return {
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>()
  }
}
