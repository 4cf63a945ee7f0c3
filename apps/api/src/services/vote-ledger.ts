import {
  voteTypeValues,
  type ComplaintPriority,
  type VoteAction,
  type VoteResult,
  type VoteStats,
  type VoteType,
} from '@campus-voice/schema'
import { ConflictError, InvalidInputError, NotFoundError, errorMessage } from '../lib/errors.js'
import { createLogger } from '../lib/logger.js'
import type { ComplaintEventBus } from './complaint-events.js'
import type { ComplaintStore, ComplaintTransaction, VoterRecord } from './complaint-store.js'
import { placeholderProfile } from './participants.js'
import { scorePriority } from './priority.js'

const logger = createLogger('votes')

export type VoteLedgerDeps = {
  store: ComplaintStore
  events: ComplaintEventBus
  /** Domain for placeholder emails of auto-created voters. */
  emailDomain: string
}

export type VoterLists = {
  upvoters: VoterRecord[]
  downvoters: VoterRecord[]
}

export type PriorityRecalculation = {
  complaint_id: string
  old_priority: ComplaintPriority
  new_priority: ComplaintPriority
  priority_score: number
  priority_updated: boolean
}

type Counters = { upvotes: number; downvotes: number }

function isVoteType(value: string): value is VoteType {
  return voteTypeValues.some((type) => type === value)
}

function counterKey(voteType: VoteType): keyof Counters {
  return voteType === 'upvote' ? 'upvotes' : 'downvotes'
}

function adjust(counters: Counters, voteType: VoteType, delta: 1 | -1): Counters {
  const key = counterKey(voteType)
  return { ...counters, [key]: Math.max(0, counters[key] + delta) }
}

/**
 * One vote per (complaint, voter) with toggle semantics.
 *
 *   none     -> vote       created
 *   same     -> none       deleted
 *   opposite -> opposite   updated
 *
 * Counters and the priority score change in the same atomic unit as the vote
 * row. Subscribers hear about it only after that unit commits.
 */
export class VoteLedger {
  constructor(private readonly deps: VoteLedgerDeps) {}

  async vote(complaintId: string, voterIdentifier: string, voteType: string): Promise<VoteResult> {
    if (!isVoteType(voteType)) {
      throw new InvalidInputError('INVALID_VOTE_TYPE', "vote_type must be 'upvote' or 'downvote'", {
        received: voteType,
      })
    }

    await this.requireComplaint(complaintId)
    const voter = await this.deps.store.ensureParticipant(
      placeholderProfile(voterIdentifier, this.deps.emailDomain),
    )

    const unit = (tx: ComplaintTransaction) => applyVote(tx, voter.id, voteType)
    let result: VoteResult
    try {
      result = await this.deps.store.withComplaintLock(complaintId, unit)
    } catch (error) {
      if (!(error instanceof ConflictError)) throw error
      logger.warn(`Vote conflict on ${complaintId} for ${voterIdentifier}, retrying once`)
      result = await this.deps.store.withComplaintLock(complaintId, unit)
    }

    logger.info(
      `${voterIdentifier} ${result.action} ${voteType} on ${complaintId} (${result.upvotes}/${result.downvotes})`,
    )
    if (result.priority_updated) {
      logger.info(`Priority of ${complaintId}: ${result.old_priority} -> ${result.new_priority}`)
    }

    this.publish(complaintId, voteType, result)
    return result
  }

  async getVoteStats(complaintId: string): Promise<VoteStats> {
    const complaint = await this.requireComplaint(complaintId)
    return {
      upvotes: complaint.upvotes,
      downvotes: complaint.downvotes,
      total: complaint.upvotes + complaint.downvotes,
      net_votes: complaint.upvotes - complaint.downvotes,
    }
  }

  /** The voter's current vote, or `null` when they have none. */
  async getVoterVote(complaintId: string, voterIdentifier: string): Promise<VoteType | null> {
    await this.requireComplaint(complaintId)
    const voter = await this.deps.store.findParticipant(voterIdentifier)
    if (!voter) return null
    const vote = await this.deps.store.getVote(complaintId, voter.id)
    return vote?.voteType ?? null
  }

  async listVoters(complaintId: string): Promise<VoterLists> {
    await this.requireComplaint(complaintId)
    const voters = await this.deps.store.listVoters(complaintId)
    return {
      upvoters: voters.filter((voter) => voter.voteType === 'upvote'),
      downvoters: voters.filter((voter) => voter.voteType === 'downvote'),
    }
  }

  /** Recomputes the score from the stored classification and counters. Never re-classifies. */
  async recalculatePriority(complaintId: string): Promise<PriorityRecalculation> {
    return this.deps.store.withComplaintLock(complaintId, async (tx) => {
      const { classification, upvotes, downvotes, priority } = tx.complaint
      const { score, label } = scorePriority(classification, upvotes, downvotes)
      const changed = label !== priority
      await tx.updateComplaint(changed ? { priorityScore: score, priority: label } : { priorityScore: score })
      return {
        complaint_id: complaintId,
        old_priority: priority,
        new_priority: label,
        priority_score: score,
        priority_updated: changed,
      }
    })
  }

  private async requireComplaint(complaintId: string) {
    const complaint = await this.deps.store.getComplaint(complaintId)
    if (!complaint) throw new NotFoundError('Complaint not found', { complaintId })
    return complaint
  }

  private publish(complaintId: string, voteType: VoteType, result: VoteResult) {
    try {
      this.deps.events.publish({
        eventType: 'vote.changed',
        complaintId,
        payload: {
          upvotes: result.upvotes,
          downvotes: result.downvotes,
          total_votes: result.upvotes + result.downvotes,
          action: result.action,
          vote_type: voteType,
          priority_updated: result.priority_updated,
          ...(result.new_priority ? { new_priority: result.new_priority } : {}),
        },
      })
    } catch (error) {
      logger.error(`Failed to publish vote event for ${complaintId}: ${errorMessage(error)}`)
    }
  }
}

async function applyVote(tx: ComplaintTransaction, voterId: string, voteType: VoteType): Promise<VoteResult> {
  const existing = await tx.findVote(voterId)
  let counters: Counters = { upvotes: tx.complaint.upvotes, downvotes: tx.complaint.downvotes }
  let action: VoteAction

  if (!existing) {
    await tx.insertVote(voterId, voteType)
    counters = adjust(counters, voteType, 1)
    action = 'created'
  } else if (existing.voteType === voteType) {
    await tx.deleteVote(existing.id)
    counters = adjust(counters, voteType, -1)
    action = 'deleted'
  } else {
    await tx.updateVoteType(existing.id, voteType)
    counters = adjust(adjust(counters, existing.voteType, -1), voteType, 1)
    action = 'updated'
  }

  const oldPriority = tx.complaint.priority
  const { score, label } = scorePriority(tx.complaint.classification, counters.upvotes, counters.downvotes)
  const priorityUpdated = label !== oldPriority

  await tx.updateComplaint({
    ...counters,
    priorityScore: score,
    ...(priorityUpdated ? { priority: label } : {}),
  })

  return {
    complaint_id: tx.complaint.id,
    action,
    upvotes: counters.upvotes,
    downvotes: counters.downvotes,
    net_votes: counters.upvotes - counters.downvotes,
    priority_score: score,
    priority_updated: priorityUpdated,
    ...(priorityUpdated ? { old_priority: oldPriority, new_priority: label } : {}),
  }
}
