import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { InMemoryDurableQueue, QUEUES, ValidationError } from '@fleetwise/core'

const { mockRecordRoutingDecision } = vi.hoisted(() => ({
  mockRecordRoutingDecision: vi.fn(),
}))

vi.mock('@fleetwise/database', () => ({
  recordRoutingDecision: mockRecordRoutingDecision,
}))

import {
  ensureRoutingEventConsumer,
  getRoutingEventConsumerStatus,
  processRoutingEventBatch,
  resetRoutingEventConsumerState,
  resumeRoutingEventConsumer,
  RoutingMessageError,
  toRoutingDecisionRecord,
} from './routing-event-consumer'
import { backoffDelayMs } from './worker-health'

function decision(model: string, overrides: Record<string, unknown> = {}) {
  return {
    instance_id: 'instance_a',
    complexity: 'complex',
    model,
    provider: 'provider-x',
    score: 4.1,
    outcome: 'success',
    response_time_ms: 450,
    ...overrides,
  }
}

function metric(model: string) {
  return {
    id: `metric-${model}`,
    model_name: model,
    complexity_level: 'complex',
    usage_count: 1,
    success_count: 1,
    avg_response_time_ms: 450,
    response_time_samples: 1,
    created_at: 1,
    updated_at: 1,
  }
}

function recordedModels(): unknown[] {
  return mockRecordRoutingDecision.mock.calls.map((call: unknown[]) => {
    const input = call[0]
    return typeof input === 'object' && input !== null && 'model_name' in input
      ? input.model_name
      : undefined
  })
}

describe('routing event consumer', () => {
  beforeEach(() => {
    mockRecordRoutingDecision.mockReset()
    mockRecordRoutingDecision.mockImplementation((input: { model_name: string }) =>
      Promise.resolve({ inserted: true, metric: metric(input.model_name) })
    )
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    resetRoutingEventConsumerState()
    vi.useRealTimers()
    vi.restoreAllMocks()
  })

  describe('processRoutingEventBatch', () => {
    it('handles a single message per batch', async () => {
      const queue = new InMemoryDurableQueue()
      await queue.enqueue(QUEUES.routingDecisions, decision('model-a'))
      await queue.enqueue(QUEUES.routingDecisions, decision('model-b'))

      const result = await processRoutingEventBatch(queue, 1)

      expect(result).toEqual({ received: 1, recorded: 1, duplicates: 0 })
      expect(recordedModels()).toEqual(['model-a'])
      expect(queue.depth(QUEUES.routingDecisions)).toBe(1)
    })

    it('handles several messages in order', async () => {
      const queue = new InMemoryDurableQueue()
      for (const model of ['model-a', 'model-b', 'model-c']) {
        await queue.enqueue(QUEUES.routingDecisions, decision(model))
      }

      const result = await processRoutingEventBatch(queue, 10)

      expect(result).toEqual({ received: 3, recorded: 3, duplicates: 0 })
      expect(recordedModels()).toEqual(['model-a', 'model-b', 'model-c'])
      expect(queue.depth(QUEUES.routingDecisions)).toBe(0)
    })

    it('acks duplicates without analyzing them', async () => {
      const queue = new InMemoryDurableQueue()
      const analyze = vi.fn()
      mockRecordRoutingDecision.mockResolvedValueOnce({ inserted: false, metric: null })
      await queue.enqueue(QUEUES.routingDecisions, decision('model-a'))

      const result = await processRoutingEventBatch(queue, 10, analyze)

      expect(result).toEqual({ received: 1, recorded: 0, duplicates: 1 })
      expect(analyze).not.toHaveBeenCalled()
      expect(queue.depth(QUEUES.routingDecisions)).toBe(0)
    })

    it('passes each updated aggregate to the analyzer', async () => {
      const queue = new InMemoryDurableQueue()
      const analyze = vi.fn()
      await queue.enqueue(QUEUES.routingDecisions, decision('model-a'))

      await processRoutingEventBatch(queue, 10, analyze)

      expect(analyze).toHaveBeenCalledWith(metric('model-a'))
    })

    it('stops the batch at a malformed message and leaves the rest unacked', async () => {
      const queue = new InMemoryDurableQueue()
      await queue.enqueue(QUEUES.routingDecisions, decision('model-a'))
      await queue.enqueue(QUEUES.routingDecisions, decision('model-b', { outcome: 'maybe' }))
      await queue.enqueue(QUEUES.routingDecisions, decision('model-c'))

      const error: unknown = await processRoutingEventBatch(queue, 10).catch((e: unknown) => e)

      expect(error).toBeInstanceOf(RoutingMessageError)
      if (!(error instanceof RoutingMessageError)) return
      expect(error.deliveryCount).toBe(1)
      expect(error.cause).toBeInstanceOf(ValidationError)

      expect(recordedModels()).toEqual(['model-a'])
      expect(queue.depth(QUEUES.routingDecisions)).toBe(2)
    })

    it('maps a message onto an audit row', () => {
      expect(
        toRoutingDecisionRecord('msg-1', {
          instance_id: 'instance_a',
          complexity: 'simple',
          model: 'model-a',
          provider: 'provider-x',
          score: 3.5,
          outcome: 'routed',
          capabilities_required: ['code'],
          preference: 'speed',
          timestamp: '2026-03-01T00:00:00.000Z',
        })
      ).toEqual({
        message_id: 'msg-1',
        instance_id: 'instance_a',
        complexity_level: 'simple',
        model_name: 'model-a',
        provider: 'provider-x',
        score: 3.5,
        outcome: 'routed',
        response_time_ms: null,
        capabilities_required: '["code"]',
        preference: 'speed',
        timestamp: 1_772_323_200,
      })
    })
  })

  describe('worker loop', () => {
    it('halts after the configured number of consecutive errors', async () => {
      vi.useFakeTimers()
      const queue = new InMemoryDurableQueue({ leaseMs: 10 })
      const onFatal = vi.fn()
      mockRecordRoutingDecision.mockRejectedValue(new Error('database is locked'))
      await queue.enqueue(QUEUES.routingDecisions, decision('model-a'))

      ensureRoutingEventConsumer({
        queue,
        settings: { pollIntervalMs: 1000, batchSize: 1, maxConsecutiveErrors: 3 },
        onFatal,
      })
      await vi.advanceTimersByTimeAsync(3000)

      expect(getRoutingEventConsumerStatus()).toMatchObject({
        halted: true,
        consecutiveErrors: 3,
        lastError: 'database is locked',
      })
      expect(onFatal).toHaveBeenCalledTimes(1)

      await vi.advanceTimersByTimeAsync(10_000)
      expect(mockRecordRoutingDecision).toHaveBeenCalledTimes(3)
    })

    it('halts on a poisoned message even when healthy empty ticks run in between', async () => {
      vi.useFakeTimers()
      const queue = new InMemoryDurableQueue()
      const onFatal = vi.fn()
      await queue.enqueue(QUEUES.routingDecisions, { garbage: true })

      ensureRoutingEventConsumer({
        queue,
        settings: { pollIntervalMs: 5000, batchSize: 10, maxConsecutiveErrors: 3 },
        onFatal,
      })

      // The message is hidden for its 30s lease, so the ticks in between see an empty queue
      await vi.advanceTimersByTimeAsync(30_000)
      expect(getRoutingEventConsumerStatus()).toMatchObject({
        halted: false,
        consecutiveErrors: 2,
      })

      await vi.advanceTimersByTimeAsync(30 * 60_000)

      expect(getRoutingEventConsumerStatus().halted).toBe(true)
      expect(onFatal).toHaveBeenCalledTimes(1)
      expect(onFatal.mock.calls[0]?.[0]).toBeInstanceOf(ValidationError)
      expect(mockRecordRoutingDecision).not.toHaveBeenCalled()
    })

    it('backs off between failed attempts', async () => {
      vi.useFakeTimers()
      const queue = new InMemoryDurableQueue({ leaseMs: 10 })
      mockRecordRoutingDecision.mockRejectedValue(new Error('database is locked'))
      await queue.enqueue(QUEUES.routingDecisions, decision('model-a'))

      ensureRoutingEventConsumer({
        queue,
        settings: { pollIntervalMs: 1000, batchSize: 1, maxConsecutiveErrors: 10 },
      })
      await vi.advanceTimersByTimeAsync(0)
      expect(mockRecordRoutingDecision).toHaveBeenCalledTimes(1)

      await vi.advanceTimersByTimeAsync(1000)
      expect(mockRecordRoutingDecision).toHaveBeenCalledTimes(2)

      // Second failure waits 2s, so the 2s tick is skipped
      await vi.advanceTimersByTimeAsync(1000)
      expect(mockRecordRoutingDecision).toHaveBeenCalledTimes(2)

      await vi.advanceTimersByTimeAsync(1000)
      expect(mockRecordRoutingDecision).toHaveBeenCalledTimes(3)
    })

    it('resumes after a halt and resets the error count on success', async () => {
      vi.useFakeTimers()
      const queue = new InMemoryDurableQueue({ leaseMs: 10 })
      mockRecordRoutingDecision.mockRejectedValueOnce(new Error('database is locked'))
      await queue.enqueue(QUEUES.routingDecisions, decision('model-a'))

      ensureRoutingEventConsumer({
        queue,
        settings: { pollIntervalMs: 1000, batchSize: 1, maxConsecutiveErrors: 1 },
      })
      await vi.advanceTimersByTimeAsync(0)
      expect(getRoutingEventConsumerStatus().halted).toBe(true)

      resumeRoutingEventConsumer()
      await vi.advanceTimersByTimeAsync(1000)

      expect(getRoutingEventConsumerStatus()).toMatchObject({
        halted: false,
        consecutiveErrors: 0,
        totalRecorded: 1,
      })
      expect(queue.depth(QUEUES.routingDecisions)).toBe(0)
    })
  })
})

describe('backoffDelayMs', () => {
  it('doubles per consecutive error up to one minute', () => {
    expect(backoffDelayMs(5000, 1)).toBe(5000)
    expect(backoffDelayMs(5000, 2)).toBe(10_000)
    expect(backoffDelayMs(5000, 4)).toBe(40_000)
    expect(backoffDelayMs(5000, 5)).toBe(60_000)
  })
})
