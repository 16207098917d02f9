import type { Kysely } from 'kysely'
import { generateUuidV7 } from '@fleetwise/core'
import { getDatabaseType, getDb } from '../db'
import type { AggregatedMetric, Database } from '../types'

function now(): number {
  return Math.floor(Date.now() / 1000)
}

export interface AggregateSample {
  modelName: string
  complexityLevel: string
  success: boolean
  responseTimeMs: number | null
}

/**
 * Folds one outcome into the aggregate for its (model, complexity) pair.
 * Callers run it inside a transaction. The row is created first if missing,
 * then read under a row lock (Postgres; SQLite serializes writers), so
 * concurrent consumers never lose an update to the counts or the mean.
 */
export async function applyOutcomeToAggregate(
  trx: Kysely<Database>,
  sample: AggregateSample
): Promise<AggregatedMetric> {
  const ts = now()
  await trx
    .insertInto('aggregated_metrics')
    .values({
      id: generateUuidV7(),
      model_name: sample.modelName,
      complexity_level: sample.complexityLevel,
      usage_count: 0,
      success_count: 0,
      avg_response_time_ms: null,
      response_time_samples: 0,
      created_at: ts,
      updated_at: ts,
    })
    .onConflict((oc) => oc.columns(['model_name', 'complexity_level']).doNothing())
    .execute()

  const existing = await trx
    .selectFrom('aggregated_metrics')
    .selectAll()
    .where('model_name', '=', sample.modelName)
    .where('complexity_level', '=', sample.complexityLevel)
    .$if(getDatabaseType() === 'postgres', (qb) => qb.forUpdate())
    .executeTakeFirstOrThrow()

  const { avg, samples } = foldResponseTime(
    existing.avg_response_time_ms,
    existing.response_time_samples,
    sample.responseTimeMs
  )

  return trx
    .updateTable('aggregated_metrics')
    .set((eb) => ({
      usage_count: eb('usage_count', '+', 1),
      success_count: eb('success_count', '+', sample.success ? 1 : 0),
      avg_response_time_ms: avg,
      response_time_samples: samples,
      updated_at: ts,
    }))
    .where('id', '=', existing.id)
    .returningAll()
    .executeTakeFirstOrThrow()
}

/** Incremental mean: avg' = avg + (sample - avg) / n. */
export function foldResponseTime(
  avg: number | null,
  samples: number,
  sample: number | null
): { avg: number | null; samples: number } {
  if (sample === null) {
    return { avg, samples }
  }
  const count = samples + 1
  if (avg === null) {
    return { avg: sample, samples: count }
  }
  return { avg: avg + (sample - avg) / count, samples: count }
}

export async function findAggregatedMetric(
  modelName: string,
  complexityLevel: string
): Promise<AggregatedMetric | null> {
  const db = getDb()
  const row = await db
    .selectFrom('aggregated_metrics')
    .selectAll()
    .where('model_name', '=', modelName)
    .where('complexity_level', '=', complexityLevel)
    .executeTakeFirst()
  return row ?? null
}

export async function listAggregatedMetrics(opts?: {
  minUsageCount?: number
}): Promise<AggregatedMetric[]> {
  const db = getDb()
  let query = db.selectFrom('aggregated_metrics').selectAll()
  if (typeof opts?.minUsageCount === 'number') {
    query = query.where('usage_count', '>=', opts.minUsageCount)
  }
  return query.orderBy('model_name', 'asc').orderBy('complexity_level', 'asc').execute()
}
