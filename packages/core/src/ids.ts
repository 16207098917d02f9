import { v7 as uuidv7 } from 'uuid'

export function generateUuidV7(date?: Date): string {
  return date ? uuidv7({ msecs: date.getTime() }) : uuidv7()
}

/**
 * Proposal ids carry the originating instance so a fleet-side reader can tell
 * where a change came from without a lookup. The UUIDv7 suffix keeps them
 * time-sortable and unique across restarts.
 */
export function generateProposalId(instanceId: string, date?: Date): string {
  return `change-${instanceId}-${generateUuidV7(date)}`
}
