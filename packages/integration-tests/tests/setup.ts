import { beforeAll, beforeEach, afterAll, vi } from 'vitest'
import { setupTestDb, resetTestDb, teardownTestDb } from './helpers/db'

beforeAll(async () => {
  vi.spyOn(console, 'log').mockImplementation(() => {})
  vi.spyOn(console, 'warn').mockImplementation(() => {})
  await setupTestDb()
})

beforeEach(async () => {
  await resetTestDb()
})

afterAll(async () => {
  await teardownTestDb()
  vi.restoreAllMocks()
})
