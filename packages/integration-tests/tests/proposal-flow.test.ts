import { describe, it, expect, vi } from 'vitest'
import { AgentCoordinator, SafetyProfileRegistry, type RollbackHook } from '@fleetwise/agent'
import { DEFAULT_SAFETY_PROFILE, ProposalStatus, QUEUES } from '@fleetwise/core'
import { DatabaseDurableQueue, DatabaseProposalStore } from '@fleetwise/database'

function setup(onRollbackTriggered?: RollbackHook) {
  const queue = new DatabaseDurableQueue()
  const store = new DatabaseProposalStore()
  const coordinator = new AgentCoordinator({
    store,
    queue,
    profiles: new SafetyProfileRegistry({
      guardian: { ...DEFAULT_SAFETY_PROFILE, needsConsensus: true },
    }),
    settings: { instanceId: 'instance_a', consensusPollIntervalMs: 5 },
    onRollbackTriggered,
  })
  return { queue, store, coordinator }
}

describe('proposal flow against the database', () => {
  it('carries a consensus-gated change through approval and execution', async () => {
    const { queue, store, coordinator } = setup()

    const proposed = await coordinator.proposeChange(
      'guardian',
      { type: 'threshold_update', value: 0.9 },
      { impactScore: 7, riskScore: 3 }
    )
    if (!proposed.ok) throw proposed.error
    const id = proposed.value.id
    expect(proposed.value.status).toBe(ProposalStatus.SENT_FOR_CONSENSUS)

    const [request] = await queue.dequeue(QUEUES.consensusRequests, 10)
    expect(request?.message).toMatchObject({ proposal_id: id, agent_type: 'guardian' })

    await queue.enqueue(QUEUES.consensusResponses, {
      proposal_id: id,
      decision: 'approved',
      votes: { instance_b: 'approve' },
      consensus_score: 0.8,
    })
    expect(await coordinator.awaitConsensus(id, 1_000)).toEqual({ ok: true, value: 'approved' })

    const executed = await coordinator.executeApproved(id, async () => ({ latency_p95_ms: 120 }))
    if (!executed.ok) throw executed.error
    expect(executed.value.status).toBe(ProposalStatus.APPLIED)

    const persisted = await store.get(id)
    expect(persisted?.status).toBe(ProposalStatus.APPLIED)
    expect(persisted?.metricsAfter).toEqual({ latency_p95_ms: 120 })
    expect(persisted?.consensusReachedAt).toBeInstanceOf(Date)
  })

  it('rolls back an applied change once and reports it', async () => {
    const hook = vi.fn<RollbackHook>()
    const { coordinator } = setup(hook)

    const proposed = await coordinator.proposeChange('relaxed_agent', { type: 'cache_ttl' })
    if (!proposed.ok) throw proposed.error
    const id = proposed.value.id
    expect(proposed.value.status).toBe(ProposalStatus.APPLIED)

    expect(await coordinator.handleRollback(id, 'error rate spike')).toEqual({
      ok: true,
      value: 'rolled_back',
    })
    expect(await coordinator.handleRollback(id, 'error rate spike')).toEqual({
      ok: true,
      value: 'rolled_back',
    })

    expect(hook).toHaveBeenCalledTimes(1)
    expect(await coordinator.getChangeStatus(id)).toEqual({
      ok: true,
      value: ProposalStatus.ROLLED_BACK,
    })
    const proposal = await coordinator.getProposal(id)
    expect(proposal?.rollbackReason).toBe('error rate spike')
  })

  it('applies rollback events published by another instance', async () => {
    const { queue, coordinator } = setup()
    const proposed = await coordinator.proposeChange('relaxed_agent', { type: 'cache_ttl' })
    if (!proposed.ok) throw proposed.error

    await queue.enqueue(QUEUES.rollbackEvents, {
      proposal_id: proposed.value.id,
      reason: 'guardian veto',
    })

    expect(await coordinator.pollRollbackEvents()).toBe(1)
    expect(await coordinator.getChangeStatus(proposed.value.id)).toEqual({
      ok: true,
      value: ProposalStatus.ROLLED_BACK,
    })
  })
})
