import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

import { afterAll, beforeAll, describe, expect, it } from 'vitest'

import { closeDb, getDb } from '../db'
import { migrateToLatest } from '../migrate'
import {
  compareAndSetModelScore,
  findModelScore,
  listModelScores,
  restoreModelScore,
  upsertModelScore,
} from './model-scores'

let testDir = ''

beforeAll(async () => {
  testDir = mkdtempSync(join(tmpdir(), 'fleetwise-model-scores-'))
  process.env.DATABASE_URL = join(testDir, 'test.sqlite')
  await migrateToLatest(getDb())
})

afterAll(async () => {
  await closeDb()
  delete process.env.DATABASE_URL
  if (testDir) {
    rmSync(testDir, { recursive: true, force: true })
  }
})

describe('model scores', () => {
  it('returns null for an unscored pair', async () => {
    expect(await findModelScore('model-x', 'medium')).toBeNull()
  })

  it('overwrites the score for an existing pair', async () => {
    await upsertModelScore({
      modelName: 'model-x',
      complexityLevel: 'simple',
      score: 3.1,
      basedOnSamples: 120,
    })
    await upsertModelScore({
      modelName: 'model-x',
      complexityLevel: 'simple',
      score: 3.4,
      basedOnSamples: 150,
    })

    const score = await findModelScore('model-x', 'simple')
    expect(score?.score).toBeCloseTo(3.4, 10)
    expect(score?.based_on_samples).toBe(150)
    expect(await listModelScores()).toHaveLength(1)
  })

  it('lets only one of two concurrent learners create a score', async () => {
    const move = (score: number) =>
      compareAndSetModelScore({
        modelName: 'model-y',
        complexityLevel: 'complex',
        expected: null,
        score,
        basedOnSamples: 100,
      })

    const results = await Promise.all([move(2.8), move(2.9)])

    expect(results.filter((row) => row !== null)).toHaveLength(1)
    expect((await findModelScore('model-y', 'complex'))?.score).toBe(2.8)
  })

  it('lets only one of two concurrent learners move an existing score', async () => {
    await upsertModelScore({
      modelName: 'model-z',
      complexityLevel: 'medium',
      score: 2.5,
      basedOnSamples: 100,
    })
    const move = (score: number) =>
      compareAndSetModelScore({
        modelName: 'model-z',
        complexityLevel: 'medium',
        expected: 2.5,
        score,
        basedOnSamples: 120,
      })

    const [first, second] = await Promise.all([move(2.8), move(2.2)])

    expect(first?.score).toBe(2.8)
    expect(second).toBeNull()
    expect((await findModelScore('model-z', 'medium'))?.score).toBe(2.8)
  })

  it('restores the previous score, or removes a row it created', async () => {
    await upsertModelScore({
      modelName: 'model-r',
      complexityLevel: 'simple',
      score: 3,
      basedOnSamples: 100,
    })
    await compareAndSetModelScore({
      modelName: 'model-r',
      complexityLevel: 'simple',
      expected: 3,
      score: 3.3,
      basedOnSamples: 140,
    })

    const current = { modelName: 'model-r', complexityLevel: 'simple', score: 3.3 }
    expect(await restoreModelScore(current, { score: 3, based_on_samples: 100 })).toBe(true)
    expect(await findModelScore('model-r', 'simple')).toMatchObject({
      score: 3,
      based_on_samples: 100,
    })
    expect(await restoreModelScore(current, { score: 3, based_on_samples: 100 })).toBe(false)

    await compareAndSetModelScore({
      modelName: 'model-n',
      complexityLevel: 'simple',
      expected: null,
      score: 2.8,
      basedOnSamples: 100,
    })
    const created = { modelName: 'model-n', complexityLevel: 'simple', score: 2.8 }
    expect(await restoreModelScore(created, null)).toBe(true)
    expect(await findModelScore('model-n', 'simple')).toBeNull()
  })
})
