import {
  createLogger,
  scoreUpdateMessageSchema,
  scoreUpdateQueueFor,
  type ComplexityLevel,
  type DurableQueue,
  type ScoreUpdateMessage,
} from '@fleetwise/core'

const log = createLogger('ModelScoreCache')

export interface CachedScore {
  model: string
  complexity: ComplexityLevel
  score: number
  confidence: number
  basedOnSamples: number
  updatedAt: Date
}

export interface ModelScoreCacheOptions {
  queue: DurableQueue
  instanceId: string
  batchSize?: number
}

function keyOf(model: string, complexity: string): string {
  return `${model}\u0000${complexity}`
}

/**
 * Instance-side view of the fleet's learned routing scores.
 *
 * Updates are overwrites keyed by (model, complexity): applying the same
 * event twice leaves the cache as it was, and an event older than the one
 * already applied is ignored.
 */
export class ModelScoreCache {
  private readonly queue: DurableQueue
  private readonly queueName: string
  private readonly batchSize: number
  private scores: Map<string, CachedScore> = new Map()

  constructor(options: ModelScoreCacheOptions) {
    this.queue = options.queue
    this.queueName = scoreUpdateQueueFor(options.instanceId)
    this.batchSize = options.batchSize ?? 50
  }

  /** Returns false when the event was older than the cached score. */
  apply(event: ScoreUpdateMessage): boolean {
    const key = keyOf(event.model, event.complexity)
    const updatedAt = new Date(event.timestamp)
    const current = this.scores.get(key)
    if (current && current.updatedAt.getTime() > updatedAt.getTime()) {
      return false
    }

    this.scores.set(key, {
      model: event.model,
      complexity: event.complexity,
      score: event.new_score,
      confidence: event.confidence,
      basedOnSamples: event.based_on_samples,
      updatedAt,
    })
    return true
  }

  getScore(model: string, complexity: ComplexityLevel): number | null {
    return this.scores.get(keyOf(model, complexity))?.score ?? null
  }

  list(): CachedScore[] {
    return Array.from(this.scores.values(), (entry) => ({ ...entry }))
  }

  /** Drains one batch of score updates for this instance. Returns messages handled. */
  async poll(): Promise<number> {
    const batch = await this.queue.dequeue(this.queueName, this.batchSize)
    for (const item of batch) {
      const parsed = scoreUpdateMessageSchema.safeParse(item.message)
      if (parsed.success) {
        const applied = this.apply(parsed.data)
        log.debug(applied ? 'Score update applied' : 'Stale score update ignored', {
          model: parsed.data.model,
          complexity: parsed.data.complexity,
          score: parsed.data.new_score,
        })
      } else {
        log.warn('Dropping malformed score update', { messageId: item.messageId })
      }
      await this.queue.ack(this.queueName, item.ackToken)
    }
    return batch.length
  }
}
