import {
  createLogger,
  scoreUpdateQueueFor,
  type DurableQueue,
  type ScoreUpdateMessage,
} from '@fleetwise/core'
import { listKnownInstanceIds } from '@fleetwise/database'

const log = createLogger('ModelScoreUpdater')

export interface ModelScoreUpdaterOptions {
  /** Fixed broadcast list; defaults to every instance seen in routing decisions */
  instanceIds?: readonly string[]
}

export type ScoreUpdatePublisher = (events: ScoreUpdateMessage[]) => Promise<number>

/**
 * Enqueues every event onto each instance's score-update queue. Returns the
 * number of messages published. Delivery is at-least-once; instances apply
 * events as overwrites.
 */
export async function publishScoreUpdates(
  queue: DurableQueue,
  events: ScoreUpdateMessage[],
  options: ModelScoreUpdaterOptions = {}
): Promise<number> {
  if (events.length === 0) return 0

  const instanceIds = options.instanceIds ?? (await listKnownInstanceIds())
  if (instanceIds.length === 0) {
    log.warn('No known instances; score updates not broadcast', { events: events.length })
    return 0
  }

  let published = 0
  for (const instanceId of instanceIds) {
    const queueName = scoreUpdateQueueFor(instanceId)
    for (const event of events) {
      await queue.enqueue(queueName, event)
      published += 1
    }
  }

  log.info('Score updates published', {
    events: events.length,
    instances: instanceIds.length,
    published,
  })
  return published
}

export function createModelScoreUpdater(
  queue: DurableQueue,
  options: ModelScoreUpdaterOptions = {}
): ScoreUpdatePublisher {
  return (events) => publishScoreUpdates(queue, events, options)
}
