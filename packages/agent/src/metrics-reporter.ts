import type { MetricsSettings } from '@fleetwise/config'
import {
  QUEUES,
  QueueUnavailableError,
  createLogger,
  err,
  ok,
  type AgentMetricsBatch,
  type DurableQueue,
  type Result,
} from '@fleetwise/core'

const log = createLogger('MetricsReporter')

const DEFAULT_SETTINGS: MetricsSettings = {
  instanceId: 'instance_default',
  flushIntervalMs: 60_000,
  bufferCapacity: 10_000,
}

const RECENT_VALUES_PER_METRIC = 100

type BufferedMetric = {
  seq: number
  agentType: string
  metricName: string
  value: number
  timestamp: Date
}

export interface MetricsReporterStats {
  totalBatchesSent: number
  totalMetricsRecorded: number
  totalMetricsSent: number
  failedFlushes: number
  droppedMetrics: number
  bufferSize: number
  lastFlushAt: Date | null
}

export interface MetricsReporterOptions {
  queue: DurableQueue
  settings?: Partial<MetricsSettings>
}

/**
 * Buffers agent execution metrics and ships them to the fleet in batches.
 *
 * Entries leave the buffer only after the batch carrying them was accepted by
 * the queue, so a failed flush is retried on the next one. The buffer is
 * bounded; past capacity the oldest entries are dropped.
 */
export class MetricsReporter {
  private readonly queue: DurableQueue
  private readonly settings: MetricsSettings
  private buffer: BufferedMetric[] = []
  private nextSeq = 1
  private inFlight: Promise<Result<{ sent: number }, QueueUnavailableError>> | null = null
  private timer?: NodeJS.Timeout
  private recent: Map<string, Map<string, number[]>> = new Map()
  private stats: Omit<MetricsReporterStats, 'bufferSize'> = {
    totalBatchesSent: 0,
    totalMetricsRecorded: 0,
    totalMetricsSent: 0,
    failedFlushes: 0,
    droppedMetrics: 0,
    lastFlushAt: null,
  }

  constructor(options: MetricsReporterOptions) {
    this.queue = options.queue
    this.settings = { ...DEFAULT_SETTINGS, ...options.settings }
  }

  /** Returns false when the value was rejected. */
  recordMetric(agentType: string, metricName: string, value: number): boolean {
    if (!Number.isFinite(value)) {
      log.warn('Rejected non-finite metric value', { agentType, metricName, value })
      return false
    }

    this.buffer.push({
      seq: this.nextSeq++,
      agentType,
      metricName,
      value,
      timestamp: new Date(),
    })
    this.stats.totalMetricsRecorded += 1
    this.remember(agentType, metricName, value)
    this.enforceCapacity()
    return true
  }

  /** Records every entry of `metrics`; returns how many were accepted. */
  recordMetrics(agentType: string, metrics: Record<string, number>): number {
    let accepted = 0
    for (const [metricName, value] of Object.entries(metrics)) {
      if (this.recordMetric(agentType, metricName, value)) accepted += 1
    }
    return accepted
  }

  /**
   * Sends everything buffered so far as one batch. Concurrent callers share
   * the flush already in progress.
   */
  flush(): Promise<Result<{ sent: number }, QueueUnavailableError>> {
    if (this.inFlight) return this.inFlight

    this.inFlight = this.sendBuffered().finally(() => {
      this.inFlight = null
    })
    return this.inFlight
  }

  getStats(): MetricsReporterStats {
    return { ...this.stats, bufferSize: this.buffer.length }
  }

  /** Last values recorded per metric name, oldest first. */
  getRecentMetrics(agentType: string): Record<string, number[]> {
    const byName = this.recent.get(agentType)
    if (!byName) return {}
    return Object.fromEntries(
      Array.from(byName.entries(), ([name, values]) => [name, [...values]])
    )
  }

  start(): void {
    if (this.timer) return
    this.timer = setInterval(() => {
      void this.flush().then((result) => {
        if (!result.ok) {
          log.warn('Scheduled flush failed; buffer retained', { error: result.error.message })
        }
      })
    }, this.settings.flushIntervalMs)

    if (typeof this.timer.unref === 'function') {
      this.timer.unref()
    }
    log.info('Started', { flushIntervalMs: this.settings.flushIntervalMs })
  }

  /** Stops the timer and sends whatever is still buffered. */
  stop(): Promise<Result<{ sent: number }, QueueUnavailableError>> {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = undefined
    }
    return this.flush()
  }

  private async sendBuffered(): Promise<Result<{ sent: number }, QueueUnavailableError>> {
    const snapshot = [...this.buffer]
    const last = snapshot[snapshot.length - 1]
    if (!last) {
      return ok({ sent: 0 })
    }

    const batch: AgentMetricsBatch = {
      instance_id: this.settings.instanceId,
      sent_at: new Date().toISOString(),
      metrics: snapshot.map((entry) => ({
        agent_type: entry.agentType,
        metric_name: entry.metricName,
        value: entry.value,
        timestamp: entry.timestamp.toISOString(),
      })),
    }

    try {
      await this.queue.enqueue(QUEUES.agentMetrics, batch)
    } catch (error) {
      this.stats.failedFlushes += 1
      log.warn('Metrics flush failed; keeping buffer', {
        buffered: this.buffer.length,
        error: error instanceof Error ? error.message : String(error),
      })
      return err(
        error instanceof QueueUnavailableError
          ? error
          : new QueueUnavailableError(QUEUES.agentMetrics, error)
      )
    }

    // Entries recorded while the send was in flight carry a higher seq and stay
    this.buffer = this.buffer.filter((entry) => entry.seq > last.seq)
    this.stats.totalBatchesSent += 1
    this.stats.totalMetricsSent += snapshot.length
    this.stats.lastFlushAt = new Date()
    log.debug('Metrics flushed', { sent: snapshot.length })
    return ok({ sent: snapshot.length })
  }

  private enforceCapacity(): void {
    const overflow = this.buffer.length - this.settings.bufferCapacity
    if (overflow <= 0) return

    this.buffer.splice(0, overflow)
    this.stats.droppedMetrics += overflow
    log.warn('Metrics buffer over capacity; dropped oldest entries', {
      dropped: overflow,
      capacity: this.settings.bufferCapacity,
    })
  }

  private remember(agentType: string, metricName: string, value: number): void {
    let byName = this.recent.get(agentType)
    if (!byName) {
      byName = new Map()
      this.recent.set(agentType, byName)
    }
    const values = byName.get(metricName) ?? []
    values.push(value)
    if (values.length > RECENT_VALUES_PER_METRIC) {
      values.shift()
    }
    byName.set(metricName, values)
  }
}
