import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { InMemoryDurableQueue, scoreUpdateQueueFor } from '../src'

describe('InMemoryDurableQueue', () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date('2026-03-01T00:00:00.000Z'))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('delivers in FIFO order up to the batch size', async () => {
    const queue = new InMemoryDurableQueue()
    await queue.enqueue('q', { n: 1 })
    await queue.enqueue('q', { n: 2 })
    await queue.enqueue('q', { n: 3 })

    const batch = await queue.dequeue('q', 2)
    expect(batch.map((item) => item.message)).toEqual([{ n: 1 }, { n: 2 }])
    expect(batch[0]?.deliveryCount).toBe(1)
  })

  it('hides leased messages until acked', async () => {
    const queue = new InMemoryDurableQueue()
    await queue.enqueue('q', { n: 1 })

    const [first] = await queue.dequeue('q', 10)
    expect(await queue.dequeue('q', 10)).toEqual([])
    expect(await queue.ack('q', first?.ackToken ?? '')).toBe(true)
    expect(queue.depth('q')).toBe(0)
  })

  it('redelivers after the lease expires', async () => {
    const queue = new InMemoryDurableQueue({ leaseMs: 1_000 })
    await queue.enqueue('q', { n: 1 })

    const [first] = await queue.dequeue('q', 10)
    vi.advanceTimersByTime(1_001)

    const [second] = await queue.dequeue('q', 10)
    expect(second?.messageId).toBe(first?.messageId)
    expect(second?.deliveryCount).toBe(2)
    expect(await queue.ack('q', first?.ackToken ?? '')).toBe(false)
    expect(await queue.ack('q', second?.ackToken ?? '')).toBe(true)
  })

  it('keeps queues separate', async () => {
    const queue = new InMemoryDurableQueue()
    await queue.enqueue(scoreUpdateQueueFor('a'), { n: 1 })
    expect(await queue.dequeue(scoreUpdateQueueFor('b'), 10)).toEqual([])
    expect(queue.peek('score-updates:a')).toEqual([{ n: 1 }])
  })
})
