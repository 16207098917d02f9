import { generateUuidV7 } from '@fleetwise/core'
import { getDb } from '../db'
import type { QueueMessage } from '../types'

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000)
}

export async function enqueueQueueMessage(
  queueName: string,
  payload: string
): Promise<QueueMessage> {
  const db = getDb()
  const ts = Date.now()
  return db
    .insertInto('queue_messages')
    .values({
      id: generateUuidV7(),
      queue_name: queueName,
      payload,
      status: 'pending',
      enqueued_at_ms: ts,
      visible_at_ms: ts,
      ack_token: null,
      acked_at: null,
    })
    .returningAll()
    .executeTakeFirstOrThrow()
}

/**
 * Leases up to `limit` visible messages. Each claimed row gets a fresh ack
 * token and stays hidden until `leaseMs` elapses or it is acked.
 */
export async function claimQueueMessages(
  queueName: string,
  limit: number,
  leaseMs: number
): Promise<QueueMessage[]> {
  if (limit <= 0) return []
  const db = getDb()
  const ts = Date.now()

  return db.transaction().execute(async (trx) => {
    const candidates = await trx
      .selectFrom('queue_messages')
      .selectAll()
      .where('queue_name', '=', queueName)
      .where('status', '=', 'pending')
      .where('visible_at_ms', '<=', ts)
      .orderBy('enqueued_at_ms', 'asc')
      .orderBy('id', 'asc')
      .limit(limit)
      .execute()

    const claimed: QueueMessage[] = []
    for (const candidate of candidates) {
      const ackToken = generateUuidV7()
      const result = await trx
        .updateTable('queue_messages')
        .set({
          ack_token: ackToken,
          visible_at_ms: ts + leaseMs,
          delivery_count: candidate.delivery_count + 1,
        })
        .where('id', '=', candidate.id)
        .where('status', '=', 'pending')
        .where('visible_at_ms', '=', candidate.visible_at_ms)
        .executeTakeFirst()

      if (Number(result.numUpdatedRows ?? 0) === 0) continue

      claimed.push({
        ...candidate,
        ack_token: ackToken,
        visible_at_ms: ts + leaseMs,
        delivery_count: candidate.delivery_count + 1,
      })
    }
    return claimed
  })
}

/** Marks the message acked if the token still holds an unexpired lease. */
export async function ackQueueMessage(queueName: string, ackToken: string): Promise<boolean> {
  const db = getDb()
  const result = await db
    .updateTable('queue_messages')
    .set({ status: 'acked', ack_token: null, acked_at: nowSeconds() })
    .where('queue_name', '=', queueName)
    .where('ack_token', '=', ackToken)
    .where('status', '=', 'pending')
    .where('visible_at_ms', '>', Date.now())
    .executeTakeFirst()

  return Number(result.numUpdatedRows ?? 0) > 0
}

export async function countPendingQueueMessages(queueName: string): Promise<number> {
  const db = getDb()
  const result = await db
    .selectFrom('queue_messages')
    .select((eb) => eb.fn.count<string>('id').as('count'))
    .where('queue_name', '=', queueName)
    .where('status', '=', 'pending')
    .executeTakeFirst()
  return Number(result?.count ?? 0)
}

export async function listPendingQueueMessages(queueName: string): Promise<QueueMessage[]> {
  const db = getDb()
  return db
    .selectFrom('queue_messages')
    .selectAll()
    .where('queue_name', '=', queueName)
    .where('status', '=', 'pending')
    .orderBy('enqueued_at_ms', 'asc')
    .orderBy('id', 'asc')
    .execute()
}
