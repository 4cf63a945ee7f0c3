import { EventEmitter } from 'node:events'
import type { StatusUpdatePayload, VoteUpdatePayload } from '@campus-voice/schema'

/**
 * Committed complaint mutations.
 *
 * The vote ledger and status workflow publish one of these after their
 * atomic unit commits; the realtime bridge turns them into socket frames.
 */
export type ComplaintEvent =
  | { eventType: 'vote.changed'; complaintId: string; timestamp: string; payload: VoteUpdatePayload }
  | { eventType: 'status.changed'; complaintId: string; timestamp: string; payload: StatusUpdatePayload }

type DistributiveOmit<T, K extends keyof T> = T extends unknown ? Omit<T, K> : never

export type ComplaintEventInput = DistributiveOmit<ComplaintEvent, 'timestamp'>

export type ComplaintEventBus = {
  publish(event: ComplaintEventInput): void
  subscribe(listener: (event: ComplaintEvent) => void): () => void
}

const EVENT_NAME = 'complaint.event'

export function createComplaintEventBus(): ComplaintEventBus {
  const emitter = new EventEmitter()

  return {
    publish(event) {
      emitter.emit(EVENT_NAME, {
        ...event,
        timestamp: new Date().toISOString(),
      } satisfies ComplaintEvent)
    },
    subscribe(listener) {
      emitter.on(EVENT_NAME, listener)
      return () => emitter.off(EVENT_NAME, listener)
    },
  }
}
