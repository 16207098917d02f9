import type { ConsumerSettings } from '@fleetwise/config'
import {
  QUEUES,
  ValidationError,
  createLogger,
  describeError,
  routingDecisionMessageSchema,
  type DequeuedMessage,
  type DurableQueue,
  type RoutingDecisionMessage,
} from '@fleetwise/core'
import {
  recordRoutingDecision,
  type AggregatedMetric,
  type RecordRoutingDecisionInput,
  type RecordRoutingDecisionResult,
} from '@fleetwise/database'
import {
  canAttempt,
  createWorkerHealth,
  recordTickFailure,
  recordTickSuccess,
  resetWorkerHealth,
  type FatalHandler,
  type WorkerHealth,
} from './worker-health'

const WORKER_STATE_KEY = '__fleetwiseRoutingEventConsumer'

const log = createLogger('RoutingEventConsumer')

export const DEFAULT_CONSUMER_SETTINGS: ConsumerSettings = {
  pollIntervalMs: 5000,
  batchSize: 10,
  maxConsecutiveErrors: 5,
}

/** A routing decision that could not be handled; it stays unacked. */
export class RoutingMessageError extends Error {
  readonly messageId: string
  readonly deliveryCount: number

  constructor(messageId: string, deliveryCount: number, cause: unknown) {
    super(
      `Routing decision ${messageId} failed on delivery ${deliveryCount}: ${describeError(cause)}`,
      { cause }
    )
    this.name = 'RoutingMessageError'
    this.messageId = messageId
    this.deliveryCount = deliveryCount
  }
}

export type AggregateObserver = (metric: AggregatedMetric) => void

export interface RoutingBatchResult {
  received: number
  recorded: number
  duplicates: number
}

export interface RoutingEventConsumerOptions {
  queue: DurableQueue
  settings?: Partial<ConsumerSettings>
  /** Called after each ack with the updated aggregate; must not throw */
  analyze?: AggregateObserver
  onFatal?: FatalHandler
  /** Keep the event loop alive while the consumer runs */
  keepAlive?: boolean
}

export interface RoutingEventConsumerStatus {
  started: boolean
  running: boolean
  halted: boolean
  consecutiveErrors: number
  lastError: string | null
  totalRecorded: number
  totalDuplicates: number
  lastBatchAt: Date | null
}

type WorkerState = {
  started: boolean
  running: boolean
  draining: boolean
  timer?: NodeJS.Timeout
  settings: ConsumerSettings
  health: WorkerHealth
  totalRecorded: number
  totalDuplicates: number
  lastBatchAt: Date | null
  onFatal?: FatalHandler
  processFn?: () => Promise<RoutingBatchResult>
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
    settings: { ...DEFAULT_CONSUMER_SETTINGS },
    health: createWorkerHealth(),
    totalRecorded: 0,
    totalDuplicates: 0,
    lastBatchAt: null,
  }
  globalState[WORKER_STATE_KEY] = created
  return created
}

function toUnixSeconds(timestamp: string | undefined): number {
  const ms = timestamp ? Date.parse(timestamp) : Date.now()
  return Math.floor((Number.isNaN(ms) ? Date.now() : ms) / 1000)
}

export function toRoutingDecisionRecord(
  messageId: string,
  message: RoutingDecisionMessage
): RecordRoutingDecisionInput {
  return {
    message_id: messageId,
    instance_id: message.instance_id,
    complexity_level: message.complexity,
    model_name: message.model,
    provider: message.provider,
    score: message.score,
    outcome: message.outcome,
    response_time_ms: message.response_time_ms ?? null,
    capabilities_required: message.capabilities_required
      ? JSON.stringify(message.capabilities_required)
      : null,
    preference: message.preference ?? null,
    timestamp: toUnixSeconds(message.timestamp),
  }
}

async function recordMessage(
  queue: DurableQueue,
  item: DequeuedMessage
): Promise<RecordRoutingDecisionResult> {
  const parsed = routingDecisionMessageSchema.safeParse(item.message)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const detail = issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'
    throw new ValidationError(
      'invalid_message',
      `Malformed routing decision ${item.messageId}: ${detail}`
    )
  }

  const recorded = await recordRoutingDecision(toRoutingDecisionRecord(item.messageId, parsed.data))
  await queue.ack(QUEUES.routingDecisions, item.ackToken)
  return recorded
}

/**
 * Dequeues up to `batchSize` routing decisions and handles them in order:
 * record + aggregate in one transaction, ack, then analyze. The first failure
 * aborts the batch with a `RoutingMessageError`; that message and the rest
 * stay unacked and are delivered again after their lease.
 */
export async function processRoutingEventBatch(
  queue: DurableQueue,
  batchSize: number,
  analyze?: AggregateObserver
): Promise<RoutingBatchResult> {
  const batch = await queue.dequeue(QUEUES.routingDecisions, batchSize)
  const result: RoutingBatchResult = { received: batch.length, recorded: 0, duplicates: 0 }

  for (const item of batch) {
    let recorded: RecordRoutingDecisionResult
    try {
      recorded = await recordMessage(queue, item)
    } catch (error) {
      throw new RoutingMessageError(item.messageId, item.deliveryCount, error)
    }

    if (!recorded.inserted) {
      result.duplicates += 1
      log.debug('Duplicate routing decision skipped', { messageId: item.messageId })
      continue
    }
    result.recorded += 1

    if (analyze && recorded.metric) {
      try {
        analyze(recorded.metric)
      } catch (error) {
        log.warn('Analyzer threw; continuing', {
          error: error instanceof Error ? error.message : String(error),
        })
      }
    }
  }

  return result
}

export function ensureRoutingEventConsumer(options: RoutingEventConsumerOptions): void {
  const state = getState()

  state.settings = { ...DEFAULT_CONSUMER_SETTINGS, ...options.settings }
  state.onFatal = options.onFatal
  state.processFn = () =>
    processRoutingEventBatch(options.queue, state.settings.batchSize, options.analyze)

  if (state.started) return

  state.started = true
  state.draining = false

  const tick = async () => {
    const processFn = state.processFn
    if (state.running || state.draining || !processFn) return
    if (!canAttempt(state.health)) return
    state.running = true
    try {
      const result = await processFn()
      recordTickSuccess(state.health)
      state.totalRecorded += result.recorded
      state.totalDuplicates += result.duplicates
      if (result.received > 0) {
        state.lastBatchAt = new Date()
        log.debug('Batch processed', { ...result })
      }
    } catch (error) {
      const failed = error instanceof RoutingMessageError ? error : null
      recordTickFailure(state.health, failed ? failed.cause : error, {
        log,
        pollIntervalMs: state.settings.pollIntervalMs,
        maxConsecutiveErrors: state.settings.maxConsecutiveErrors,
        onFatal: state.onFatal,
        attempts: failed?.deliveryCount,
      })
    } finally {
      state.running = false
    }
  }

  void tick()
  state.timer = setInterval(() => {
    void tick()
  }, state.settings.pollIntervalMs)

  if (!options.keepAlive && typeof state.timer.unref === 'function') {
    state.timer.unref()
  }

  log.info('Started', {
    pollIntervalMs: state.settings.pollIntervalMs,
    batchSize: state.settings.batchSize,
  })
}

export function stopRoutingEventConsumer(): void {
  const state = getState()
  state.draining = true
  state.started = false
  if (state.timer) {
    clearInterval(state.timer)
    state.timer = undefined
  }
}

export function isRoutingEventConsumerBusy(): boolean {
  return getState().running
}

export function getRoutingEventConsumerStatus(): RoutingEventConsumerStatus {
  const state = getState()
  return {
    started: state.started,
    running: state.running,
    halted: state.health.halted,
    consecutiveErrors: state.health.consecutiveErrors,
    lastError: state.health.lastError,
    totalRecorded: state.totalRecorded,
    totalDuplicates: state.totalDuplicates,
    lastBatchAt: state.lastBatchAt,
  }
}

/** Clears a halt so the next tick consumes again. */
export function resumeRoutingEventConsumer(): void {
  const state = getState()
  if (state.health.halted) {
    log.info('Resuming after halt', { lastError: state.health.lastError })
  }
  resetWorkerHealth(state.health)
}

/** Test helper: forget counters and health between cases. */
export function resetRoutingEventConsumerState(): void {
  stopRoutingEventConsumer()
  const state = getState()
  state.health = createWorkerHealth()
  state.totalRecorded = 0
  state.totalDuplicates = 0
  state.lastBatchAt = null
}
