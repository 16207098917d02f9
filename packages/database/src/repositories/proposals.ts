import { getDb } from '../db'
import type { NewProposalRow, ProposalRow, ProposalRowUpdate } from '../types'

function now(): number {
  return Math.floor(Date.now() / 1000)
}

export async function insertProposal(
  data: Omit<NewProposalRow, 'created_at' | 'updated_at'>
): Promise<ProposalRow> {
  const db = getDb()
  const ts = now()
  return db
    .insertInto('proposals')
    .values({ ...data, created_at: ts, updated_at: ts })
    .returningAll()
    .executeTakeFirstOrThrow()
}

export async function findProposalById(id: string): Promise<ProposalRow | null> {
  const db = getDb()
  const row = await db.selectFrom('proposals').selectAll().where('id', '=', id).executeTakeFirst()
  return row ?? null
}

export async function listProposalRows(opts?: {
  status?: string
  limit?: number
}): Promise<ProposalRow[]> {
  const db = getDb()
  let query = db.selectFrom('proposals').selectAll()
  if (opts?.status) {
    query = query.where('status', '=', opts.status)
  }
  query = query.orderBy('created_at', 'asc').orderBy('id', 'asc')
  if (typeof opts?.limit === 'number') {
    query = query.limit(Math.max(0, opts.limit))
  }
  return query.execute()
}

/**
 * Moves a proposal to `status` only while it is still in one of `fromStatuses`.
 * Returns null when no row matched, meaning another writer got there first.
 */
export async function transitionProposalRow(
  id: string,
  fromStatuses: readonly string[],
  status: string,
  set: Omit<ProposalRowUpdate, 'id' | 'status' | 'updated_at'> = {}
): Promise<ProposalRow | null> {
  if (fromStatuses.length === 0) return null
  const db = getDb()
  const result = await db
    .updateTable('proposals')
    .set({ ...set, status, updated_at: now() })
    .where('id', '=', id)
    .where('status', 'in', [...fromStatuses])
    .executeTakeFirst()

  if (Number(result.numUpdatedRows ?? 0) === 0) {
    return null
  }
  return findProposalById(id)
}

export async function updateProposalRow(
  id: string,
  set: Omit<ProposalRowUpdate, 'id' | 'status' | 'updated_at'>
): Promise<ProposalRow | null> {
  const db = getDb()
  const result = await db
    .updateTable('proposals')
    .set({ ...set, updated_at: now() })
    .where('id', '=', id)
    .executeTakeFirst()

  if (Number(result.numUpdatedRows ?? 0) === 0) {
    return null
  }
  return findProposalById(id)
}
