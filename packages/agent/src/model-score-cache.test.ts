import { beforeEach, describe, expect, it, vi } from 'vitest'
import { InMemoryDurableQueue, scoreUpdateQueueFor, type ScoreUpdateMessage } from '@fleetwise/core'
import { ModelScoreCache } from './model-score-cache'

function update(overrides: Partial<ScoreUpdateMessage> = {}): ScoreUpdateMessage {
  return {
    model: 'model-a',
    complexity: 'medium',
    old_score: 2.5,
    new_score: 2.8,
    reason: 'success rate 98%',
    confidence: 1,
    based_on_samples: 100,
    timestamp: '2026-03-01T12:00:00.000Z',
    ...overrides,
  }
}

describe('ModelScoreCache', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  it('overwrites the score for a model and complexity', () => {
    const cache = new ModelScoreCache({ queue: new InMemoryDurableQueue(), instanceId: 'a' })

    cache.apply(update())
    cache.apply(update({ new_score: 3.1, timestamp: '2026-03-01T13:00:00.000Z' }))

    expect(cache.getScore('model-a', 'medium')).toBe(3.1)
    expect(cache.getScore('model-a', 'simple')).toBeNull()
  })

  it('is unchanged by applying the same event twice', () => {
    const cache = new ModelScoreCache({ queue: new InMemoryDurableQueue(), instanceId: 'a' })

    cache.apply(update())
    const before = cache.list()
    cache.apply(update())

    expect(cache.list()).toEqual(before)
  })

  it('ignores an event older than the cached one', () => {
    const cache = new ModelScoreCache({ queue: new InMemoryDurableQueue(), instanceId: 'a' })

    cache.apply(update({ new_score: 3.1, timestamp: '2026-03-01T13:00:00.000Z' }))
    const applied = cache.apply(update({ new_score: 2.0 }))

    expect(applied).toBe(false)
    expect(cache.getScore('model-a', 'medium')).toBe(3.1)
  })

  it('drains its own instance queue and acks every message', async () => {
    const queue = new InMemoryDurableQueue()
    const cache = new ModelScoreCache({ queue, instanceId: 'instance_a' })
    await queue.enqueue(scoreUpdateQueueFor('instance_a'), update())
    await queue.enqueue(scoreUpdateQueueFor('instance_a'), { model: 'broken' })
    await queue.enqueue(scoreUpdateQueueFor('instance_b'), update({ new_score: 4 }))

    expect(await cache.poll()).toBe(2)

    expect(cache.getScore('model-a', 'medium')).toBe(2.8)
    expect(queue.depth(scoreUpdateQueueFor('instance_a'))).toBe(0)
    expect(queue.depth(scoreUpdateQueueFor('instance_b'))).toBe(1)
  })
})
