import type { StatusChange } from '@campus-voice/db'
import { complaintStatusValues, type ComplaintStatus, type StatusUpdateResult } from '@campus-voice/schema'
import { InvalidInputError, NotFoundError, errorMessage } from '../lib/errors.js'
import { createLogger } from '../lib/logger.js'
import type { ComplaintEventBus } from './complaint-events.js'
import type { ComplaintStore } from './complaint-store.js'

const logger = createLogger('status')

export type StatusWorkflowDeps = {
  store: ComplaintStore
  events: ComplaintEventBus
  now?: () => Date
}

function isStatus(value: string): value is ComplaintStatus {
  return complaintStatusValues.some((status) => status === value)
}

/**
 * `resolved_at` for a transition: stamped whenever the new status is `closed`,
 * untouched otherwise. Reopening keeps the last resolution time.
 */
export function nextResolvedAt(newStatus: ComplaintStatus, resolvedAt: Date | null, now: Date): Date | null {
  return newStatus === 'closed' ? now : resolvedAt
}

export class StatusWorkflow {
  private readonly now: () => Date

  constructor(private readonly deps: StatusWorkflowDeps) {
    this.now = deps.now ?? (() => new Date())
  }

  /**
   * Any status may follow any other, including itself; every call leaves a
   * StatusChange behind.
   */
  async updateStatus(
    complaintId: string,
    newStatus: string,
    actor: string,
    reason?: string | null,
  ): Promise<StatusUpdateResult> {
    if (!isStatus(newStatus)) {
      throw new InvalidInputError('INVALID_STATUS', `new_status must be one of: ${complaintStatusValues.join(', ')}`, {
        received: newStatus,
      })
    }

    const result = await this.deps.store.withComplaintLock(complaintId, async (tx) => {
      const oldStatus = tx.complaint.status
      const resolvedAt = nextResolvedAt(newStatus, tx.complaint.resolvedAt, this.now())

      await tx.updateComplaint({ status: newStatus, resolvedAt })
      await tx.appendStatusChange({ oldStatus, newStatus, actor, reason: reason ?? null })

      return {
        complaint_id: complaintId,
        old_status: oldStatus,
        new_status: newStatus,
        updated_by: actor,
        resolved_at: resolvedAt ? resolvedAt.toISOString() : null,
      }
    })

    logger.info(`${complaintId}: ${result.old_status} -> ${result.new_status} by ${actor}`)

    try {
      this.deps.events.publish({
        eventType: 'status.changed',
        complaintId,
        payload: {
          old_status: result.old_status,
          new_status: result.new_status,
          updated_by: actor,
          reason: reason ?? null,
        },
      })
    } catch (error) {
      logger.error(`Failed to publish status event for ${complaintId}: ${errorMessage(error)}`)
    }

    return result
  }

  /** Audit trail, oldest first. */
  async getStatusHistory(complaintId: string): Promise<StatusChange[]> {
    const complaint = await this.deps.store.getComplaint(complaintId)
    if (!complaint) throw new NotFoundError('Complaint not found', { complaintId })
    return this.deps.store.listStatusChanges(complaintId)
  }
}
