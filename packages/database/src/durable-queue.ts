import type { DequeuedMessage, DurableQueue } from '@fleetwise/core'
import type { QueueMessage } from './types'
import { QueueUnavailableError } from '@fleetwise/core'
import {
  ackQueueMessage,
  claimQueueMessages,
  enqueueQueueMessage,
} from './repositories/queue-messages'

export interface DatabaseDurableQueueOptions {
  /** Visibility timeout for a delivered, unacked message. */
  leaseMs?: number
}

/**
 * DurableQueue backed by the queue_messages table. Errors from the store are
 * surfaced as QueueUnavailableError.
 */
export class DatabaseDurableQueue implements DurableQueue {
  private readonly leaseMs: number

  constructor(options?: DatabaseDurableQueueOptions) {
    this.leaseMs = options?.leaseMs ?? 30_000
  }

  async enqueue(queue: string, message: unknown): Promise<string> {
    try {
      const row = await enqueueQueueMessage(queue, JSON.stringify(message))
      return row.id
    } catch (error) {
      throw new QueueUnavailableError(queue, error)
    }
  }

  async dequeue(queue: string, maxBatch: number): Promise<DequeuedMessage[]> {
    let rows: QueueMessage[]
    try {
      rows = await claimQueueMessages(queue, maxBatch, this.leaseMs)
    } catch (error) {
      throw new QueueUnavailableError(queue, error)
    }

    const messages: DequeuedMessage[] = []
    for (const row of rows) {
      if (!row.ack_token) continue
      messages.push({
        ackToken: row.ack_token,
        messageId: row.id,
        message: JSON.parse(row.payload) as unknown,
        deliveryCount: row.delivery_count,
      })
    }
    return messages
  }

  async ack(queue: string, ackToken: string): Promise<boolean> {
    try {
      return await ackQueueMessage(queue, ackToken)
    } catch (error) {
      throw new QueueUnavailableError(queue, error)
    }
  }
}
