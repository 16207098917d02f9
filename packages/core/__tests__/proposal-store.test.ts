import { describe, expect, it } from 'vitest'
import {
  DEFAULT_SAFETY_PROFILE,
  InMemoryProposalStore,
  ProposalStatus,
  type CreateProposalInput,
} from '../src'

function input(id: string): CreateProposalInput {
  return {
    id,
    instanceId: 'instance_a',
    agentType: 'prompt_tuner',
    agentId: null,
    change: { type: 'prompt_update', prompt: 'v2' },
    metadata: {},
    safetyProfile: { ...DEFAULT_SAFETY_PROFILE },
    impactScore: 5,
    riskScore: 5,
    metricsBefore: null,
  }
}

describe('InMemoryProposalStore', () => {
  it('creates pending proposals', async () => {
    const store = new InMemoryProposalStore()
    const created = await store.create(input('p1'))
    expect(created.status).toBe(ProposalStatus.PENDING)
    expect(created.consensusVotes).toEqual({})
    expect(created.appliedAt).toBeNull()
    expect(await store.get('p1')).toEqual(created)
    expect(await store.get('missing')).toBeNull()
  })

  it('rejects duplicate ids', async () => {
    const store = new InMemoryProposalStore()
    await store.create(input('p1'))
    await expect(store.create(input('p1'))).rejects.toThrow('Proposal already exists: p1')
  })

  it('transitions with compare-and-set semantics', async () => {
    const store = new InMemoryProposalStore()
    await store.create(input('p1'))

    const sent = await store.transition('p1', { to: ProposalStatus.SENT_FOR_CONSENSUS })
    expect(sent?.status).toBe(ProposalStatus.SENT_FOR_CONSENSUS)
    expect(sent?.sentForConsensusAt).toBeInstanceOf(Date)

    const stale = await store.transition('p1', {
      to: ProposalStatus.EXECUTING,
      from: [ProposalStatus.CONSENSUS_REACHED],
    })
    expect(stale).toBeNull()
    expect((await store.get('p1'))?.status).toBe(ProposalStatus.SENT_FOR_CONSENSUS)
  })

  it('refuses illegal moves by default', async () => {
    const store = new InMemoryProposalStore()
    await store.create(input('p1'))
    expect(await store.transition('p1', { to: ProposalStatus.EXECUTING })).toBeNull()
    expect(await store.transition('missing', { to: ProposalStatus.ROLLED_BACK })).toBeNull()
  })

  it('applies the patch with the transition', async () => {
    const store = new InMemoryProposalStore()
    await store.create(input('p1'))
    const rolledBack = await store.transition('p1', {
      to: ProposalStatus.ROLLED_BACK,
      patch: { rollbackReason: 'manual' },
    })
    expect(rolledBack?.rollbackReason).toBe('manual')
    expect(rolledBack?.rolledBackAt).toBeInstanceOf(Date)
  })

  it('returns copies that do not alias stored state', async () => {
    const store = new InMemoryProposalStore()
    const created = await store.create(input('p1'))
    created.change.prompt = 'mutated'
    expect((await store.get('p1'))?.change.prompt).toBe('v2')
  })

  it('lists by status with a limit', async () => {
    const store = new InMemoryProposalStore()
    await store.create(input('p1'))
    await store.create(input('p2'))
    await store.create(input('p3'))
    await store.transition('p2', { to: ProposalStatus.ROLLED_BACK })

    const pending = await store.list({ status: ProposalStatus.PENDING })
    expect(pending.map((p) => p.id)).toEqual(['p1', 'p3'])
    expect(await store.list({ limit: 1 })).toHaveLength(1)
  })

  it('updates non-status fields', async () => {
    const store = new InMemoryProposalStore()
    await store.create(input('p1'))
    const updated = await store.update('p1', { metricsAfter: { error_rate: 0.01 } })
    expect(updated?.metricsAfter).toEqual({ error_rate: 0.01 })
    expect(updated?.status).toBe(ProposalStatus.PENDING)
    expect(await store.update('missing', {})).toBeNull()
  })
})
