import { describeError, type Logger } from '@fleetwise/core'

export const MAX_BACKOFF_MS = 60_000

export type FatalHandler = (error: Error) => void

/** Failure bookkeeping shared by the fleet's timer loops. */
export type WorkerHealth = {
  consecutiveErrors: number
  halted: boolean
  lastError: string | null
  /** Epoch ms before which ticks are skipped */
  nextAttemptAt: number
}

export function createWorkerHealth(): WorkerHealth {
  return { consecutiveErrors: 0, halted: false, lastError: null, nextAttemptAt: 0 }
}

/** min(pollInterval × 2^(n-1), 60s) */
export function backoffDelayMs(pollIntervalMs: number, consecutiveErrors: number): number {
  const exponent = Math.max(0, consecutiveErrors - 1)
  return Math.min(pollIntervalMs * 2 ** exponent, MAX_BACKOFF_MS)
}

export function canAttempt(health: WorkerHealth, now = Date.now()): boolean {
  return !health.halted && now >= health.nextAttemptAt
}

export function recordTickSuccess(health: WorkerHealth): void {
  health.consecutiveErrors = 0
  health.lastError = null
  health.nextAttemptAt = 0
}

/**
 * Counts a failed tick. Past `maxConsecutiveErrors` the loop halts and the
 * operator alert fires; before that the next attempt is pushed back.
 *
 * `attempts` is how often the failing item itself has been tried. A message
 * that keeps failing between healthy ticks is counted by its deliveries.
 */
export function recordTickFailure(
  health: WorkerHealth,
  error: unknown,
  options: {
    log: Logger
    pollIntervalMs: number
    maxConsecutiveErrors: number
    onFatal?: FatalHandler
    attempts?: number
  }
): void {
  health.consecutiveErrors = Math.max(health.consecutiveErrors + 1, options.attempts ?? 0)
  health.lastError = describeError(error)

  if (health.consecutiveErrors >= options.maxConsecutiveErrors) {
    health.halted = true
    options.log.error(
      `Halted after ${health.consecutiveErrors} consecutive errors; operator attention required`,
      error
    )
    if (options.onFatal) {
      try {
        options.onFatal(error instanceof Error ? error : new Error(health.lastError))
      } catch (hookError) {
        options.log.error('onFatal handler failed', hookError)
      }
    }
    return
  }

  const delay = backoffDelayMs(options.pollIntervalMs, health.consecutiveErrors)
  health.nextAttemptAt = Date.now() + delay
  options.log.warn('Tick failed; backing off', {
    consecutiveErrors: health.consecutiveErrors,
    retryInMs: delay,
    error: health.lastError,
  })
}

export function resetWorkerHealth(health: WorkerHealth): void {
  health.halted = false
  recordTickSuccess(health)
}
