import type { LearnerSettings } from '@fleetwise/config'
import { complexityLevelSchema, createLogger, type ScoreUpdateMessage } from '@fleetwise/core'
import {
  compareAndSetModelScore,
  findModelScore,
  listAggregatedMetrics,
  restoreModelScore,
  type AggregatedMetric,
  type ModelScore,
} from '@fleetwise/database'
import type { ScoreUpdatePublisher } from './model-score-updater'
import {
  canAttempt,
  createWorkerHealth,
  recordTickFailure,
  recordTickSuccess,
  resetWorkerHealth,
  type FatalHandler,
  type WorkerHealth,
} from './worker-health'

const WORKER_STATE_KEY = '__fleetwiseComplexityScoreLearner'

const log = createLogger('ComplexityScoreLearner')

export const DEFAULT_LEARNER_SETTINGS: LearnerSettings = {
  learningIntervalMs: 60_000,
  minSampleThreshold: 100,
  scoreMin: 0,
  scoreMax: 5,
  defaultScore: 2.5,
  suppressionEpsilon: 0.1,
  maxConsecutiveErrors: 5,
}

const HIGH_SUCCESS_RATE = 0.95
const LOW_SUCCESS_RATE = 0.85
const FAST_RESPONSE_MS = 500
const SLOW_RESPONSE_MS = 2000
const SUCCESS_DELTA = 0.2
const LATENCY_DELTA = 0.1

export type LearnerMetric = Pick<
  AggregatedMetric,
  'usage_count' | 'success_count' | 'avg_response_time_ms'
>

export interface ScoreAdjustment {
  oldScore: number
  newScore: number
  successRate: number
  reasons: string[]
  /** False when the change is within the suppression epsilon */
  emit: boolean
}

function round6(value: number): number {
  return Math.round(value * 1e6) / 1e6
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value))
}

function percent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`
}

/**
 * Bounded score step for one (model, complexity) pair. The success and
 * latency deltas are evaluated independently and summed; the result is
 * clamped to the score range.
 */
export function computeScoreAdjustment(
  metric: LearnerMetric,
  oldScore: number,
  settings: Pick<LearnerSettings, 'scoreMin' | 'scoreMax' | 'suppressionEpsilon'>
): ScoreAdjustment {
  const successRate = metric.usage_count > 0 ? metric.success_count / metric.usage_count : 0
  const reasons: string[] = []
  let delta = 0

  if (successRate > HIGH_SUCCESS_RATE) {
    delta += SUCCESS_DELTA
    reasons.push(`high success rate (${percent(successRate)})`)
  } else if (successRate < LOW_SUCCESS_RATE) {
    delta -= SUCCESS_DELTA
    reasons.push(`low success rate (${percent(successRate)})`)
  }

  const avg = metric.avg_response_time_ms
  if (avg !== null && avg < FAST_RESPONSE_MS) {
    delta += LATENCY_DELTA
    reasons.push(`fast responses (${Math.round(avg)}ms)`)
  } else if (avg !== null && avg > SLOW_RESPONSE_MS) {
    delta -= LATENCY_DELTA
    reasons.push(`slow responses (${Math.round(avg)}ms)`)
  }

  const newScore = round6(clamp(oldScore + delta, settings.scoreMin, settings.scoreMax))
  const change = round6(Math.abs(newScore - oldScore))

  return {
    oldScore,
    newScore,
    successRate,
    reasons,
    emit: change > settings.suppressionEpsilon,
  }
}

export interface LearningCycleResult {
  evaluated: number
  events: ScoreUpdateMessage[]
  published: number
}

type ClaimedUpdate = {
  event: ScoreUpdateMessage
  previous: ModelScore | null
}

/**
 * One pass over every pair with enough samples. Each new score is claimed
 * with a compare-and-set against the score it was computed from, so two
 * learners never apply the same step twice. Claimed scores are then
 * published; if publishing fails they are put back, and the next cycle
 * recomputes and retries them.
 */
export async function runLearningCycle(
  settings: LearnerSettings,
  publish?: ScoreUpdatePublisher
): Promise<LearningCycleResult> {
  const metrics = await listAggregatedMetrics({ minUsageCount: settings.minSampleThreshold })
  const claimed: ClaimedUpdate[] = []

  for (const metric of metrics) {
    const complexity = complexityLevelSchema.safeParse(metric.complexity_level)
    if (!complexity.success) {
      log.warn('Skipping aggregate with unknown complexity level', {
        model: metric.model_name,
        complexity: metric.complexity_level,
      })
      continue
    }

    const stored = await findModelScore(metric.model_name, metric.complexity_level)
    const adjustment = computeScoreAdjustment(
      metric,
      stored?.score ?? settings.defaultScore,
      settings
    )
    if (!adjustment.emit) continue

    const moved = await compareAndSetModelScore({
      modelName: metric.model_name,
      complexityLevel: metric.complexity_level,
      expected: stored?.score ?? null,
      score: adjustment.newScore,
      basedOnSamples: metric.usage_count,
    })
    if (!moved) {
      log.warn('Score changed by another learner; skipping', {
        model: metric.model_name,
        complexity: metric.complexity_level,
      })
      continue
    }

    claimed.push({
      previous: stored,
      event: {
        model: metric.model_name,
        complexity: complexity.data,
        old_score: adjustment.oldScore,
        new_score: adjustment.newScore,
        reason: adjustment.reasons.join(', '),
        confidence: adjustment.successRate,
        based_on_samples: metric.usage_count,
        timestamp: new Date().toISOString(),
      },
    })
  }

  const events = claimed.map((update) => update.event)
  let published = 0
  if (publish && events.length > 0) {
    try {
      published = await publish(events)
    } catch (error) {
      for (const { event, previous } of claimed) {
        await restoreModelScore(
          { modelName: event.model, complexityLevel: event.complexity, score: event.new_score },
          previous
        )
      }
      throw error
    }
  }

  if (events.length > 0) {
    log.info('Learning cycle emitted score updates', {
      evaluated: metrics.length,
      updates: events.length,
      published,
    })
  }
  return { evaluated: metrics.length, events, published }
}

export interface ComplexityScoreLearnerOptions {
  settings?: Partial<LearnerSettings>
  publish?: ScoreUpdatePublisher
  onFatal?: FatalHandler
  keepAlive?: boolean
}

export interface ComplexityScoreLearnerStatus {
  started: boolean
  running: boolean
  halted: boolean
  consecutiveErrors: number
  lastError: string | null
  cycles: number
  lastCycleAt: Date | null
}

type WorkerState = {
  started: boolean
  running: boolean
  draining: boolean
  timer?: NodeJS.Timeout
  settings: LearnerSettings
  health: WorkerHealth
  cycles: number
  lastCycleAt: Date | null
  onFatal?: FatalHandler
  processFn?: () => Promise<LearningCycleResult>
}

function getState(): WorkerState {
  const globalState = globalThis as typeof globalThis & {
    [WORKER_STATE_KEY]?: WorkerState
  }

  const existing = globalState[WORKER_STATE_KEY]
  if (existing) {
    return existing
  }

  const created: WorkerState = {
    started: false,
    running: false,
    draining: false,
    settings: { ...DEFAULT_LEARNER_SETTINGS },
    health: createWorkerHealth(),
    cycles: 0,
    lastCycleAt: null,
  }
  globalState[WORKER_STATE_KEY] = created
  return created
}

export function ensureComplexityScoreLearner(options: ComplexityScoreLearnerOptions = {}): void {
  const state = getState()

  state.settings = { ...DEFAULT_LEARNER_SETTINGS, ...options.settings }
  state.onFatal = options.onFatal
  state.processFn = () => runLearningCycle(state.settings, options.publish)

  if (state.started) return

  state.started = true
  state.draining = false

  const tick = async () => {
    const processFn = state.processFn
    if (state.running || state.draining || !processFn) return
    if (!canAttempt(state.health)) return
    state.running = true
    try {
      await processFn()
      recordTickSuccess(state.health)
      state.cycles += 1
      state.lastCycleAt = new Date()
    } catch (error) {
      recordTickFailure(state.health, error, {
        log,
        pollIntervalMs: state.settings.learningIntervalMs,
        maxConsecutiveErrors: state.settings.maxConsecutiveErrors,
        onFatal: state.onFatal,
      })
    } finally {
      state.running = false
    }
  }

  state.timer = setInterval(() => {
    void tick()
  }, state.settings.learningIntervalMs)

  if (!options.keepAlive && typeof state.timer.unref === 'function') {
    state.timer.unref()
  }

  log.info('Started', { learningIntervalMs: state.settings.learningIntervalMs })
}

export function stopComplexityScoreLearner(): void {
  const state = getState()
  state.draining = true
  state.started = false
  if (state.timer) {
    clearInterval(state.timer)
    state.timer = undefined
  }
}

export function isComplexityScoreLearnerBusy(): boolean {
  return getState().running
}

export function getComplexityScoreLearnerStatus(): ComplexityScoreLearnerStatus {
  const state = getState()
  return {
    started: state.started,
    running: state.running,
    halted: state.health.halted,
    consecutiveErrors: state.health.consecutiveErrors,
    lastError: state.health.lastError,
    cycles: state.cycles,
    lastCycleAt: state.lastCycleAt,
  }
}

export function resumeComplexityScoreLearner(): void {
  const state = getState()
  if (state.health.halted) {
    log.info('Resuming after halt', { lastError: state.health.lastError })
  }
  resetWorkerHealth(state.health)
}

/** Test helper: forget counters and health between cases. */
export function resetComplexityScoreLearnerState(): void {
  stopComplexityScoreLearner()
  const state = getState()
  state.health = createWorkerHealth()
  state.cycles = 0
  state.lastCycleAt = null
}
