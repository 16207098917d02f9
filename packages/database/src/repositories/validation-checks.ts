import { generateUuidV7 } from '@fleetwise/core'
import { getDb } from '../db'
import type { NewValidationCheckRecord, ValidationCheckRecord } from '../types'

export async function insertValidationCheckRecord(
  data: Omit<NewValidationCheckRecord, 'id' | 'created_at'>
): Promise<ValidationCheckRecord> {
  const db = getDb()
  return db
    .insertInto('validation_check_records')
    .values({ id: generateUuidV7(), ...data })
    .returningAll()
    .executeTakeFirstOrThrow()
}

export async function listValidationCheckRecords(opts: {
  since: number
  checkId?: string
}): Promise<ValidationCheckRecord[]> {
  const db = getDb()
  let query = db
    .selectFrom('validation_check_records')
    .selectAll()
    .where('timestamp', '>=', opts.since)
  if (opts.checkId) {
    query = query.where('check_id', '=', opts.checkId)
  }
  return query.orderBy('timestamp', 'asc').orderBy('id', 'asc').execute()
}
