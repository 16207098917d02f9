import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
  InMemoryDurableQueue,
  QUEUES,
  QueueUnavailableError,
  agentMetricsBatchSchema,
} from '@fleetwise/core'
import { MetricsReporter } from './metrics-reporter'

class FlakyQueue extends InMemoryDurableQueue {
  failing = true

  override enqueue(queue: string, message: unknown): Promise<string> {
    if (this.failing) return Promise.reject(new Error('broker down'))
    return super.enqueue(queue, message)
  }
}

describe('MetricsReporter', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
    vi.useRealTimers()
  })

  it('sends buffered metrics as one batch', async () => {
    const queue = new InMemoryDurableQueue()
    const reporter = new MetricsReporter({ queue, settings: { instanceId: 'instance_a' } })

    reporter.recordMetric('guardian', 'latency_ms', 120)
    reporter.recordMetric('guardian', 'success', 1)

    expect(await reporter.flush()).toEqual({ ok: true, value: { sent: 2 } })
    const [batch] = queue.peek(QUEUES.agentMetrics)
    const parsed = agentMetricsBatchSchema.parse(batch)
    expect(parsed.instance_id).toBe('instance_a')
    expect(parsed.metrics.map((metric) => [metric.metric_name, metric.value])).toEqual([
      ['latency_ms', 120],
      ['success', 1],
    ])
    expect(reporter.getStats()).toMatchObject({
      totalBatchesSent: 1,
      totalMetricsSent: 2,
      bufferSize: 0,
    })
  })

  it('does not enqueue anything for an empty buffer', async () => {
    const queue = new InMemoryDurableQueue()
    const reporter = new MetricsReporter({ queue })

    expect(await reporter.flush()).toEqual({ ok: true, value: { sent: 0 } })
    expect(queue.depth(QUEUES.agentMetrics)).toBe(0)
  })

  it('rejects non-finite values', () => {
    const reporter = new MetricsReporter({ queue: new InMemoryDurableQueue() })

    expect(reporter.recordMetric('guardian', 'latency_ms', Number.NaN)).toBe(false)
    expect(reporter.recordMetrics('guardian', { a: 1, b: Infinity, c: 3 })).toBe(2)
    expect(reporter.getStats().bufferSize).toBe(2)
  })

  it('keeps the buffer when the queue is unavailable', async () => {
    const queue = new FlakyQueue()
    const reporter = new MetricsReporter({ queue })
    reporter.recordMetric('guardian', 'latency_ms', 120)

    const failed = await reporter.flush()

    expect(failed.ok).toBe(false)
    if (failed.ok) return
    expect(failed.error).toBeInstanceOf(QueueUnavailableError)
    expect(reporter.getStats()).toMatchObject({ failedFlushes: 1, bufferSize: 1 })

    queue.failing = false
    expect(await reporter.flush()).toEqual({ ok: true, value: { sent: 1 } })
    expect(reporter.getStats().bufferSize).toBe(0)
  })

  it('drops the oldest entries past capacity', async () => {
    const queue = new InMemoryDurableQueue()
    const reporter = new MetricsReporter({ queue, settings: { bufferCapacity: 2 } })

    reporter.recordMetric('guardian', 'n', 1)
    reporter.recordMetric('guardian', 'n', 2)
    reporter.recordMetric('guardian', 'n', 3)

    expect(reporter.getStats()).toMatchObject({ droppedMetrics: 1, bufferSize: 2 })
    await reporter.flush()
    const parsed = agentMetricsBatchSchema.parse(queue.peek(QUEUES.agentMetrics)[0])
    expect(parsed.metrics.map((metric) => metric.value)).toEqual([2, 3])
  })

  it('shares a flush already in progress', async () => {
    const queue = new InMemoryDurableQueue()
    const reporter = new MetricsReporter({ queue })
    reporter.recordMetric('guardian', 'n', 1)

    const [first, second] = await Promise.all([reporter.flush(), reporter.flush()])

    expect(first).toEqual(second)
    expect(queue.depth(QUEUES.agentMetrics)).toBe(1)
  })

  it('keeps the last 100 values per metric', () => {
    const reporter = new MetricsReporter({ queue: new InMemoryDurableQueue() })
    for (let i = 1; i <= 105; i++) {
      reporter.recordMetric('guardian', 'n', i)
    }

    const recent = reporter.getRecentMetrics('guardian').n ?? []
    expect(recent).toHaveLength(100)
    expect(recent[0]).toBe(6)
    expect(recent[99]).toBe(105)
    expect(reporter.getRecentMetrics('other')).toEqual({})
  })

  it('flushes on its interval once started', async () => {
    vi.useFakeTimers()
    const queue = new InMemoryDurableQueue()
    const reporter = new MetricsReporter({ queue, settings: { flushIntervalMs: 1_000 } })
    reporter.recordMetric('guardian', 'n', 1)

    reporter.start()
    await vi.advanceTimersByTimeAsync(1_000)
    await reporter.stop()

    expect(queue.depth(QUEUES.agentMetrics)).toBe(1)
    expect(reporter.getStats().totalBatchesSent).toBe(1)
  })

  it('sends what is still buffered when stopped', async () => {
    vi.useFakeTimers()
    const queue = new InMemoryDurableQueue()
    const reporter = new MetricsReporter({ queue, settings: { flushIntervalMs: 60_000 } })
    reporter.start()
    reporter.recordMetric('guardian', 'latency_p95_ms', 180)

    const result = await reporter.stop()

    expect(result).toEqual({ ok: true, value: { sent: 1 } })
    expect(queue.depth(QUEUES.agentMetrics)).toBe(1)
    expect(reporter.getStats().bufferSize).toBe(0)

    await vi.advanceTimersByTimeAsync(120_000)
    expect(queue.depth(QUEUES.agentMetrics)).toBe(1)
  })
})
