import { generateUuidV7 } from './ids'

export const QUEUES = {
  routingDecisions: 'routing-decisions',
  scoreUpdates: 'score-updates',
  agentMetrics: 'agent-metrics',
  consensusRequests: 'consensus-requests',
  consensusResponses: 'consensus-responses',
  learnedPatterns: 'learned-patterns',
  rollbackEvents: 'rollback-events',
} as const

/** Score updates are broadcast on one queue per fleet instance. */
export function scoreUpdateQueueFor(instanceId: string): string {
  return `${QUEUES.scoreUpdates}:${instanceId}`
}

export interface DequeuedMessage {
  ackToken: string
  messageId: string
  /** Parsed JSON payload; validate before use */
  message: unknown
  deliveryCount: number
}

/**
 * At-least-once queue contract. A dequeued message stays invisible until it
 * is acked or its lease expires, after which it is delivered again.
 */
export interface DurableQueue {
  enqueue(queue: string, message: unknown): Promise<string>
  dequeue(queue: string, maxBatch: number): Promise<DequeuedMessage[]>
  /** Returns false when the token is unknown or its lease already expired. */
  ack(queue: string, ackToken: string): Promise<boolean>
}

type StoredMessage = {
  id: string
  payload: string
  visibleAt: number
  ackToken: string | null
  deliveryCount: number
}

export interface InMemoryDurableQueueOptions {
  leaseMs?: number
}

export class InMemoryDurableQueue implements DurableQueue {
  private queues: Map<string, StoredMessage[]> = new Map()
  private readonly leaseMs: number

  constructor(options?: InMemoryDurableQueueOptions) {
    this.leaseMs = options?.leaseMs ?? 30_000
  }

  enqueue(queue: string, message: unknown): Promise<string> {
    const id = generateUuidV7()
    const stored: StoredMessage = {
      id,
      payload: JSON.stringify(message),
      visibleAt: 0,
      ackToken: null,
      deliveryCount: 0,
    }
    this.messagesFor(queue).push(stored)
    return Promise.resolve(id)
  }

  dequeue(queue: string, maxBatch: number): Promise<DequeuedMessage[]> {
    const now = Date.now()
    const batch: DequeuedMessage[] = []
    for (const stored of this.messagesFor(queue)) {
      if (batch.length >= maxBatch) break
      if (stored.visibleAt > now) continue

      stored.ackToken = generateUuidV7()
      stored.visibleAt = now + this.leaseMs
      stored.deliveryCount += 1
      batch.push({
        ackToken: stored.ackToken,
        messageId: stored.id,
        message: JSON.parse(stored.payload) as unknown,
        deliveryCount: stored.deliveryCount,
      })
    }
    return Promise.resolve(batch)
  }

  ack(queue: string, ackToken: string): Promise<boolean> {
    const messages = this.messagesFor(queue)
    const index = messages.findIndex(
      (stored) => stored.ackToken === ackToken && stored.visibleAt > Date.now()
    )
    if (index < 0) return Promise.resolve(false)
    messages.splice(index, 1)
    return Promise.resolve(true)
  }

  /** Messages not yet acked, leased or not. */
  depth(queue: string): number {
    return this.messagesFor(queue).length
  }

  peek(queue: string): unknown[] {
    return this.messagesFor(queue).map((stored) => JSON.parse(stored.payload) as unknown)
  }

  private messagesFor(queue: string): StoredMessage[] {
    let messages = this.queues.get(queue)
    if (!messages) {
      messages = []
      this.queues.set(queue, messages)
    }
    return messages
  }
}
