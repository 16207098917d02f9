import { getLoopSettings, loadConfig, type LoopSettings } from '@fleetwise/config'
import { createLogger, type DurableQueue } from '@fleetwise/core'
import { DatabaseDurableQueue, closeDb } from '@fleetwise/database'
import {
  ensureComplexityScoreLearner,
  isComplexityScoreLearnerBusy,
  stopComplexityScoreLearner,
} from './complexity-score-learner'
import { createModelScoreUpdater } from './model-score-updater'
import { createPerformanceAnalyzer, type AdvisorySink } from './performance-analyzer'
import {
  ensureRoutingEventConsumer,
  isRoutingEventConsumerBusy,
  stopRoutingEventConsumer,
} from './routing-event-consumer'
import type { FatalHandler } from './worker-health'

const STATE_KEY = '__fleetwiseFleetWorkers'
const DEFAULT_DRAIN_MS = 25_000
const DRAIN_POLL_MS = 250

const log = createLogger('FleetWorkers')

export interface FleetWorkersOptions {
  settings?: LoopSettings
  queue?: DurableQueue
  /** Broadcast list for score updates; defaults to the instances seen so far */
  instanceIds?: readonly string[]
  advisorySink?: AdvisorySink
  onFatal?: FatalHandler
  keepAlive?: boolean
  /** Register SIGTERM/SIGINT handlers that drain and exit */
  handleSignals?: boolean
}

type FleetState = {
  started: boolean
  shuttingDown: boolean
  signalHandlersRegistered: boolean
}

function getState(): FleetState {
  const globalState = globalThis as typeof globalThis & {
    [STATE_KEY]?: FleetState
  }

  const existing = globalState[STATE_KEY]
  if (existing) {
    return existing
  }

  const created: FleetState = {
    started: false,
    shuttingDown: false,
    signalHandlersRegistered: false,
  }
  globalState[STATE_KEY] = created
  return created
}

export function isFleetWorkersBusy(): boolean {
  return isRoutingEventConsumerBusy() || isComplexityScoreLearnerBusy()
}

export function stopFleetWorkers(): void {
  stopRoutingEventConsumer()
  stopComplexityScoreLearner()
  getState().started = false
}

/**
 * Stops claiming new work, then resolves once in-flight ticks finish or the
 * deadline passes. Resolves true when everything drained.
 */
export function drainFleetWorkers(drainMs = DEFAULT_DRAIN_MS): Promise<boolean> {
  stopFleetWorkers()
  const deadline = Date.now() + drainMs

  return new Promise((resolve) => {
    const poll = () => {
      if (!isFleetWorkersBusy()) {
        resolve(true)
        return
      }
      if (Date.now() >= deadline) {
        resolve(false)
        return
      }
      setTimeout(poll, DRAIN_POLL_MS).unref()
    }
    poll()
  })
}

function registerSignalHandlers(): void {
  const state = getState()
  if (state.signalHandlersRegistered) return
  state.signalHandlersRegistered = true

  const shutdown = (signal: string) => {
    const current = getState()
    if (current.shuttingDown) return
    current.shuttingDown = true

    log.info(`Received ${signal}; stopping new claims and draining...`)

    const drainMs = Number(process.env.SHUTDOWN_DRAIN_MS ?? DEFAULT_DRAIN_MS)
    void drainFleetWorkers(drainMs)
      .then(async (drained) => {
        log.info(drained ? 'In-flight work drained; exiting' : 'Drain timeout elapsed; exiting')
        await closeDb()
      })
      .catch((error: unknown) => {
        log.error('Shutdown failed', error)
      })
      .finally(() => {
        process.exit(0)
      })
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'))
  process.on('SIGINT', () => shutdown('SIGINT'))
}

/** Starts the routing-event consumer and the score learner. */
export function ensureFleetWorkers(options: FleetWorkersOptions = {}): void {
  const state = getState()
  const settings = options.settings ?? getLoopSettings(loadConfig())
  const queue = options.queue ?? new DatabaseDurableQueue({ leaseMs: settings.queueLeaseMs })

  ensureRoutingEventConsumer({
    queue,
    settings: settings.consumer,
    analyze: createPerformanceAnalyzer(options.advisorySink),
    onFatal: options.onFatal,
    keepAlive: options.keepAlive,
  })
  ensureComplexityScoreLearner({
    settings: settings.learner,
    publish: createModelScoreUpdater(queue, { instanceIds: options.instanceIds }),
    onFatal: options.onFatal,
    keepAlive: options.keepAlive,
  })

  if (options.handleSignals) {
    registerSignalHandlers()
  }

  if (state.started) return
  state.started = true
  state.shuttingDown = false
  log.info('Started', { instanceId: settings.instanceId })
}
