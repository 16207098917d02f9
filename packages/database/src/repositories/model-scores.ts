import { generateUuidV7 } from '@fleetwise/core'
import { getDb } from '../db'
import type { ModelScore } from '../types'

function now(): number {
  return Math.floor(Date.now() / 1000)
}

export async function findModelScore(
  modelName: string,
  complexityLevel: string
): Promise<ModelScore | null> {
  const db = getDb()
  const row = await db
    .selectFrom('model_scores')
    .selectAll()
    .where('model_name', '=', modelName)
    .where('complexity_level', '=', complexityLevel)
    .executeTakeFirst()
  return row ?? null
}

export async function listModelScores(): Promise<ModelScore[]> {
  const db = getDb()
  return db
    .selectFrom('model_scores')
    .selectAll()
    .orderBy('model_name', 'asc')
    .orderBy('complexity_level', 'asc')
    .execute()
}

export async function upsertModelScore(data: {
  modelName: string
  complexityLevel: string
  score: number
  basedOnSamples: number
}): Promise<ModelScore> {
  const db = getDb()
  const ts = now()
  return db
    .insertInto('model_scores')
    .values({
      id: generateUuidV7(),
      model_name: data.modelName,
      complexity_level: data.complexityLevel,
      score: data.score,
      based_on_samples: data.basedOnSamples,
      created_at: ts,
      updated_at: ts,
    })
    .onConflict((oc) =>
      oc.columns(['model_name', 'complexity_level']).doUpdateSet({
        score: data.score,
        based_on_samples: data.basedOnSamples,
        updated_at: ts,
      })
    )
    .returningAll()
    .executeTakeFirstOrThrow()
}

/**
 * Moves a score only while it still holds `expected` (null: no row yet).
 * Returns null when another writer changed it first.
 */
export async function compareAndSetModelScore(data: {
  modelName: string
  complexityLevel: string
  expected: number | null
  score: number
  basedOnSamples: number
}): Promise<ModelScore | null> {
  const db = getDb()
  const ts = now()

  if (data.expected === null) {
    const inserted = await db
      .insertInto('model_scores')
      .values({
        id: generateUuidV7(),
        model_name: data.modelName,
        complexity_level: data.complexityLevel,
        score: data.score,
        based_on_samples: data.basedOnSamples,
        created_at: ts,
        updated_at: ts,
      })
      .onConflict((oc) => oc.columns(['model_name', 'complexity_level']).doNothing())
      .returningAll()
      .executeTakeFirst()
    return inserted ?? null
  }

  const updated = await db
    .updateTable('model_scores')
    .set({ score: data.score, based_on_samples: data.basedOnSamples, updated_at: ts })
    .where('model_name', '=', data.modelName)
    .where('complexity_level', '=', data.complexityLevel)
    .where('score', '=', data.expected)
    .returningAll()
    .executeTakeFirst()
  return updated ?? null
}

/**
 * Undoes a `compareAndSetModelScore` that moved the pair to `score`, putting
 * back `previous` (or removing the row it created). Returns false when the
 * score has moved on since.
 */
export async function restoreModelScore(
  current: { modelName: string; complexityLevel: string; score: number },
  previous: Pick<ModelScore, 'score' | 'based_on_samples'> | null
): Promise<boolean> {
  const db = getDb()

  if (previous === null) {
    const result = await db
      .deleteFrom('model_scores')
      .where('model_name', '=', current.modelName)
      .where('complexity_level', '=', current.complexityLevel)
      .where('score', '=', current.score)
      .executeTakeFirst()
    return Number(result.numDeletedRows) > 0
  }

  const result = await db
    .updateTable('model_scores')
    .set({
      score: previous.score,
      based_on_samples: previous.based_on_samples,
      updated_at: now(),
    })
    .where('model_name', '=', current.modelName)
    .where('complexity_level', '=', current.complexityLevel)
    .where('score', '=', current.score)
    .executeTakeFirst()
  return Number(result.numUpdatedRows) > 0
}
