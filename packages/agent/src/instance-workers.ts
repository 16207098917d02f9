import { createLogger } from '@fleetwise/core'
import type { AgentCoordinator } from './agent-coordinator'
import type { MetricsReporter } from './metrics-reporter'
import type { ModelScoreCache } from './model-score-cache'

const WORKER_STATE_KEY = '__fleetwiseInstanceWorkers'
const DEFAULT_TICK_MS = 1000

const log = createLogger('InstanceWorkers')

export interface InstanceWorkerContext {
  coordinator: AgentCoordinator
  scoreCache: ModelScoreCache
  reporter: MetricsReporter
}

type WorkerState = {
  started: boolean
  running: boolean
  draining: boolean
  timer?: NodeJS.Timeout
  reporter?: MetricsReporter
  /** Swappable so a re-ensure with a new context takes effect on the next tick */
  processFn?: () => Promise<void>
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
  }
  globalState[WORKER_STATE_KEY] = created
  return created
}

/** One pass over every inbound queue an instance listens on. */
export async function processInstanceQueues(context: InstanceWorkerContext): Promise<void> {
  const rollbacks = await context.coordinator.pollRollbackEvents()
  const responses = await context.coordinator.pollConsensusResponses()
  const scores = await context.scoreCache.poll()
  if (rollbacks + responses + scores > 0) {
    log.debug('Instance queues drained', { rollbacks, responses, scores })
  }
}

export function ensureInstanceWorkers(
  context: InstanceWorkerContext,
  options: { tickMs?: number } = {}
): void {
  const state = getState()

  state.processFn = () => processInstanceQueues(context)

  if (state.started) return

  state.started = true
  state.draining = false
  state.reporter = context.reporter
  context.reporter.start()

  const tick = async () => {
    const processFn = state.processFn
    if (state.running || state.draining || !processFn) return
    state.running = true
    try {
      await processFn()
    } catch (error) {
      log.warn('Tick failed', { error: error instanceof Error ? error.message : String(error) })
    } finally {
      state.running = false
    }
  }

  void tick()
  state.timer = setInterval(() => {
    void tick()
  }, options.tickMs ?? DEFAULT_TICK_MS)

  if (typeof state.timer.unref === 'function') {
    state.timer.unref()
  }

  log.info('Started')
}

/** Stops ticking and flushes the reporter's remaining metrics. */
export async function stopInstanceWorkers(): Promise<void> {
  const state = getState()
  state.draining = true
  state.started = false
  if (state.timer) {
    clearInterval(state.timer)
    state.timer = undefined
  }
  const reporter = state.reporter
  state.reporter = undefined
  if (!reporter) return

  const flushed = await reporter.stop()
  if (!flushed.ok) {
    log.warn('Final metrics flush failed', { error: flushed.error.message })
  }
}

export function isInstanceWorkersBusy(): boolean {
  return getState().running
}
