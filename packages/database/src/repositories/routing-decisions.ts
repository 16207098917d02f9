import { generateUuidV7 } from '@fleetwise/core'
import { getDb } from '../db'
import type { AggregatedMetric, NewRoutingDecision, RoutingDecision } from '../types'
import { applyOutcomeToAggregate } from './aggregated-metrics'

export type RecordRoutingDecisionInput = Omit<NewRoutingDecision, 'id' | 'created_at'>

export interface RecordRoutingDecisionResult {
  /** False when this message id was already recorded */
  inserted: boolean
  metric: AggregatedMetric | null
}

/**
 * Appends the audit row and folds it into the aggregate for its
 * (model, complexity) pair in one transaction. A redelivered message id
 * leaves both tables untouched.
 */
export async function recordRoutingDecision(
  input: RecordRoutingDecisionInput
): Promise<RecordRoutingDecisionResult> {
  const db = getDb()
  return db.transaction().execute(async (trx) => {
    const result = await trx
      .insertInto('routing_decisions')
      .values({ id: generateUuidV7(), ...input })
      .onConflict((oc) => oc.column('message_id').doNothing())
      .executeTakeFirst()

    if (Number(result.numInsertedOrUpdatedRows ?? 0) === 0) {
      return { inserted: false, metric: null }
    }

    const metric = await applyOutcomeToAggregate(trx, {
      modelName: input.model_name,
      complexityLevel: input.complexity_level,
      success: input.outcome === 'success',
      responseTimeMs: input.response_time_ms ?? null,
    })
    return { inserted: true, metric }
  })
}

export async function findRoutingDecisionByMessageId(
  messageId: string
): Promise<RoutingDecision | null> {
  const db = getDb()
  const row = await db
    .selectFrom('routing_decisions')
    .selectAll()
    .where('message_id', '=', messageId)
    .executeTakeFirst()
  return row ?? null
}

export async function listRoutingDecisions(opts?: {
  instanceId?: string
  since?: number
  limit?: number
}): Promise<RoutingDecision[]> {
  const db = getDb()
  let query = db.selectFrom('routing_decisions').selectAll()
  if (typeof opts?.since === 'number') {
    query = query.where('timestamp', '>=', opts.since)
  }
  if (opts?.instanceId) {
    query = query.where('instance_id', '=', opts.instanceId)
  }
  query = query.orderBy('timestamp', 'asc').orderBy('id', 'asc')
  if (typeof opts?.limit === 'number') {
    query = query.limit(opts.limit)
  }
  return query.execute()
}

export async function countRoutingDecisions(): Promise<number> {
  const db = getDb()
  const result = await db
    .selectFrom('routing_decisions')
    .select((eb) => eb.fn.count<string>('id').as('count'))
    .executeTakeFirst()
  return Number(result?.count ?? 0)
}

/** Instances that have reported at least one routing decision. */
export async function listKnownInstanceIds(): Promise<string[]> {
  const db = getDb()
  const rows = await db
    .selectFrom('routing_decisions')
    .select('instance_id')
    .distinct()
    .orderBy('instance_id', 'asc')
    .execute()
  return rows.map((row) => row.instance_id)
}
