import {
  generateId,
  type Complaint,
  type ComplaintSubmissionMeta,
  type Participant,
  type StatusChange,
  type Vote,
} from '@campus-voice/db'
import type { VoteType } from '@campus-voice/schema'
import { ConflictError, NotFoundError } from '../lib/errors.js'
import { KeyedMutex } from '../lib/keyed-mutex.js'
import { withRetry, type RetryOptions } from '../lib/retry.js'
import {
  emptyStats,
  type ComplaintDraft,
  type ComplaintFilter,
  type ComplaintPatch,
  type ComplaintStore,
  type ComplaintTransaction,
  type OverallStats,
  type ParticipantProfile,
  type StatusChangeDraft,
  type SubmissionMetaDraft,
  type VoterRecord,
} from './complaint-store.js'

type MemoryStoreOptions = {
  retry?: Pick<RetryOptions, 'attempts' | 'baseDelayMs' | 'sleep'>
  now?: () => Date
}

/**
 * Staged writes for one complaint. Nothing reaches the store until
 * `commit()`; a unit that throws is simply discarded.
 */
class MemoryTransaction implements ComplaintTransaction {
  complaint: Complaint
  private readonly stagedVotes = new Map<string, Vote | null>()
  private readonly stagedChanges: StatusChange[] = []

  constructor(
    private readonly store: MemoryComplaintStore,
    complaint: Complaint,
    private readonly now: () => Date,
  ) {
    this.complaint = { ...complaint }
  }

  async findVote(voterId: string) {
    if (this.stagedVotes.has(voterId)) return this.stagedVotes.get(voterId) ?? null
    return this.store.committedVote(this.complaint.id, voterId)
  }

  async insertVote(voterId: string, voteType: VoteType) {
    if (await this.findVote(voterId)) {
      throw new ConflictError('Vote already exists for this voter', {
        complaintId: this.complaint.id,
        voterId,
      })
    }
    const timestamp = this.now()
    const vote: Vote = {
      id: generateId('vote'),
      complaintId: this.complaint.id,
      voterId,
      voteType,
      createdAt: timestamp,
      updatedAt: timestamp,
    }
    this.stagedVotes.set(voterId, vote)
    return vote
  }

  async updateVoteType(voteId: string, voteType: VoteType) {
    const current = await this.voteById(voteId)
    const updated: Vote = { ...current, voteType, updatedAt: this.now() }
    this.stagedVotes.set(current.voterId, updated)
    return updated
  }

  async deleteVote(voteId: string) {
    const current = await this.voteById(voteId)
    this.stagedVotes.set(current.voterId, null)
  }

  async updateComplaint(patch: ComplaintPatch) {
    this.complaint = { ...this.complaint, ...patch, updatedAt: this.now() }
    return this.complaint
  }

  async appendStatusChange(change: StatusChangeDraft) {
    const record: StatusChange = {
      id: generateId('status_change'),
      complaintId: this.complaint.id,
      ...change,
      createdAt: this.now(),
    }
    this.stagedChanges.push(record)
    return record
  }

  commit() {
    this.store.apply(this.complaint, this.stagedVotes, this.stagedChanges)
  }

  private async voteById(voteId: string) {
    for (const vote of this.stagedVotes.values()) {
      if (vote?.id === voteId) return vote
    }
    const committed = this.store.committedVoteById(voteId)
    if (!committed || committed.complaintId !== this.complaint.id || this.stagedVotes.has(committed.voterId)) {
      throw new NotFoundError('Vote not found', { voteId })
    }
    return committed
  }
}

function byNewest(a: Complaint, b: Complaint) {
  return b.submittedAt.getTime() - a.submittedAt.getTime()
}

/**
 * Process-local ComplaintStore. Units on one complaint are serialized with a
 * keyed mutex; used by tests and by `STORAGE_DRIVER=memory`.
 */
export class MemoryComplaintStore implements ComplaintStore {
  private readonly mutex = new KeyedMutex()
  private readonly participants = new Map<string, Participant>()
  private readonly participantIds = new Map<string, string>()
  private readonly complaints = new Map<string, Complaint>()
  private readonly submissionMeta: ComplaintSubmissionMeta[] = []
  private readonly votes = new Map<string, Vote>()
  private readonly voteKeys = new Map<string, string>()
  private readonly statusChanges: StatusChange[] = []
  private readonly retry: Pick<RetryOptions, 'attempts' | 'baseDelayMs' | 'sleep'>
  private readonly now: () => Date

  constructor(options: MemoryStoreOptions = {}) {
    this.retry = options.retry ?? { attempts: 3, baseDelayMs: 0 }
    this.now = options.now ?? (() => new Date())
  }

  async upsertParticipant(profile: ParticipantProfile) {
    return this.writeParticipant(profile, true)
  }

  async ensureParticipant(profile: ParticipantProfile) {
    return this.writeParticipant(profile, false)
  }

  async findParticipant(identifier: string) {
    const id = this.participantIds.get(identifier)
    return id ? this.participants.get(id) ?? null : null
  }

  async createComplaint(draft: ComplaintDraft, meta: SubmissionMetaDraft) {
    if (!this.participants.has(draft.submitterId)) {
      throw new NotFoundError('Submitter not found', { submitterId: draft.submitterId })
    }
    const timestamp = this.now()
    const complaint: Complaint = {
      ...draft,
      id: generateId('complaint'),
      upvotes: 0,
      downvotes: 0,
      status: 'raised',
      submittedAt: timestamp,
      updatedAt: timestamp,
      resolvedAt: null,
    }
    this.complaints.set(complaint.id, complaint)
    this.submissionMeta.push({
      id: generateId('submission_meta'),
      complaintId: complaint.id,
      source: meta.source ?? 'campus-voice-api',
      userAgent: meta.userAgent,
      clientAddress: meta.clientAddress,
      createdAt: timestamp,
    })
    return { ...complaint }
  }

  async getComplaint(complaintId: string) {
    const complaint = this.complaints.get(complaintId)
    return complaint ? { ...complaint } : null
  }

  async listComplaints(filter: ComplaintFilter) {
    const submitterId =
      filter.submitterIdentifier === undefined ? undefined : this.participantIds.get(filter.submitterIdentifier)
    if (filter.submitterIdentifier !== undefined && submitterId === undefined) return []

    return [...this.complaints.values()]
      .reverse()
      .sort(byNewest)
      .filter((complaint) =>
        (filter.visibility === undefined || complaint.visibility === filter.visibility) &&
        (filter.status === undefined || complaint.status === filter.status) &&
        (filter.priority === undefined || complaint.priority === filter.priority) &&
        (filter.category === undefined || complaint.category === filter.category) &&
        (filter.assignedAuthority === undefined || complaint.assignedAuthority === filter.assignedAuthority) &&
        (submitterId === undefined || complaint.submitterId === submitterId))
      .slice(filter.offset, filter.offset + filter.limit)
      .map((complaint) => ({ ...complaint }))
  }

  async getVote(complaintId: string, voterId: string) {
    return this.committedVote(complaintId, voterId)
  }

  async listVoters(complaintId: string) {
    const voters: VoterRecord[] = []
    for (const vote of this.votes.values()) {
      if (vote.complaintId !== complaintId) continue
      const participant = this.participants.get(vote.voterId)
      voters.push({
        voteType: vote.voteType,
        identifier: participant?.identifier ?? vote.voterId,
        name: participant?.name ?? 'Unknown',
        votedAt: vote.createdAt,
      })
    }
    return voters
  }

  async listStatusChanges(complaintId: string) {
    return this.statusChanges
      .filter((change) => change.complaintId === complaintId)
      .map((change) => ({ ...change }))
  }

  async getOverallStats(): Promise<OverallStats> {
    const stats = emptyStats()
    stats.totalParticipants = this.participants.size
    stats.totalComplaints = this.complaints.size
    stats.totalVotes = this.votes.size
    for (const complaint of this.complaints.values()) {
      stats.complaintsByStatus[complaint.status] += 1
      stats.complaintsByPriority[complaint.priority] += 1
      stats.complaintsByCategory[complaint.category] += 1
    }
    return stats
  }

  async withComplaintLock<T>(complaintId: string, work: (tx: ComplaintTransaction) => Promise<T>) {
    return withRetry(
      () =>
        this.mutex.runExclusive(complaintId, async () => {
          const complaint = this.complaints.get(complaintId)
          if (!complaint) throw new NotFoundError('Complaint not found', { complaintId })

          const tx = new MemoryTransaction(this, complaint, this.now)
          const result = await work(tx)
          tx.commit()
          return result
        }),
      { ...this.retry, operation: `complaint ${complaintId}` },
    )
  }

  async close() {
    this.participants.clear()
    this.participantIds.clear()
    this.complaints.clear()
    this.submissionMeta.length = 0
    this.votes.clear()
    this.voteKeys.clear()
    this.statusChanges.length = 0
  }

  /** Submission metadata recorded for a complaint. */
  submissionMetaFor(complaintId: string) {
    return this.submissionMeta.find((meta) => meta.complaintId === complaintId) ?? null
  }

  committedVote(complaintId: string, voterId: string) {
    const id = this.voteKeys.get(voteKey(complaintId, voterId))
    const vote = id ? this.votes.get(id) : undefined
    return vote ? { ...vote } : null
  }

  committedVoteById(voteId: string) {
    const vote = this.votes.get(voteId)
    return vote ? { ...vote } : null
  }

  apply(complaint: Complaint, stagedVotes: Map<string, Vote | null>, stagedChanges: StatusChange[]) {
    for (const [voterId, vote] of stagedVotes) {
      const key = voteKey(complaint.id, voterId)
      const existingId = this.voteKeys.get(key)
      if (vote === null) {
        if (existingId) this.votes.delete(existingId)
        this.voteKeys.delete(key)
        continue
      }
      if (existingId && existingId !== vote.id) this.votes.delete(existingId)
      this.votes.set(vote.id, vote)
      this.voteKeys.set(key, vote.id)
    }
    this.statusChanges.push(...stagedChanges)
    this.complaints.set(complaint.id, { ...complaint })
  }

  private writeParticipant(profile: ParticipantProfile, overwrite: boolean) {
    const timestamp = this.now()
    const existingId = this.participantIds.get(profile.identifier)
    const existing = existingId ? this.participants.get(existingId) : undefined

    if (existing) {
      if (!overwrite) return { ...existing }
      const refreshed: Participant = { ...existing, ...profile, updatedAt: timestamp }
      this.participants.set(existing.id, refreshed)
      return { ...refreshed }
    }

    const participant: Participant = {
      id: generateId('participant'),
      ...profile,
      createdAt: timestamp,
      updatedAt: timestamp,
    }
    this.participants.set(participant.id, participant)
    this.participantIds.set(participant.identifier, participant.id)
    return { ...participant }
  }
}

function voteKey(complaintId: string, voterId: string) {
  return `${complaintId}:${voterId}`
}
