import type { Complaint, Participant, StatusChange, Vote } from '@campus-voice/db'
import type {
  ComplaintCategory,
  ComplaintPriority,
  ComplaintStatus,
  ComplaintVisibility,
  VoteType,
} from '@campus-voice/schema'

export type ParticipantProfile = {
  identifier: string
  name: string
  email: string
  department: string
  stayType: string | null
}

export type ComplaintDraft = Pick<
  Complaint,
  | 'submitterId'
  | 'title'
  | 'description'
  | 'visibility'
  | 'imageUrl'
  | 'priority'
  | 'priorityScore'
  | 'category'
  | 'assignedAuthority'
  | 'authorityEmail'
  | 'authorityDepartment'
  | 'classification'
>

export type SubmissionMetaDraft = {
  source?: string
  userAgent: string | null
  clientAddress: string | null
}

export type ComplaintFilter = {
  visibility?: ComplaintVisibility
  status?: ComplaintStatus
  priority?: ComplaintPriority
  category?: ComplaintCategory
  submitterIdentifier?: string
  assignedAuthority?: string
  limit: number
  offset: number
}

export type ComplaintPatch = Partial<
  Pick<Complaint, 'upvotes' | 'downvotes' | 'priority' | 'priorityScore' | 'status' | 'resolvedAt'>
>

export type StatusChangeDraft = {
  oldStatus: ComplaintStatus
  newStatus: ComplaintStatus
  actor: string
  reason: string | null
}

export type VoterRecord = {
  voteType: VoteType
  identifier: string
  name: string
  votedAt: Date
}

export type OverallStats = {
  totalParticipants: number
  totalComplaints: number
  totalVotes: number
  complaintsByStatus: Record<ComplaintStatus, number>
  complaintsByPriority: Record<ComplaintPriority, number>
  complaintsByCategory: Record<ComplaintCategory, number>
}

/**
 * View of one complaint inside its atomic unit. Writes become visible to
 * other units only when `withComplaintLock` resolves; if the work throws,
 * none of them are kept.
 */
export interface ComplaintTransaction {
  /** Row as read when the lock was taken, updated by `updateComplaint`. */
  readonly complaint: Complaint
  findVote(voterId: string): Promise<Vote | null>
  insertVote(voterId: string, voteType: VoteType): Promise<Vote>
  updateVoteType(voteId: string, voteType: VoteType): Promise<Vote>
  deleteVote(voteId: string): Promise<void>
  updateComplaint(patch: ComplaintPatch): Promise<Complaint>
  appendStatusChange(change: StatusChangeDraft): Promise<StatusChange>
}

/**
 * Persistence boundary for complaints, votes, the status audit trail and
 * participants.
 *
 * Implementations retry transient failures themselves and surface
 * PersistenceFailureError once retries run out. A unique-key violation on a
 * vote surfaces as ConflictError.
 */
export interface ComplaintStore {
  /** Insert, or refresh the profile of an existing identifier. */
  upsertParticipant(profile: ParticipantProfile): Promise<Participant>
  /** Insert with `profile` only when the identifier is new; never overwrites. */
  ensureParticipant(profile: ParticipantProfile): Promise<Participant>
  findParticipant(identifier: string): Promise<Participant | null>

  createComplaint(draft: ComplaintDraft, meta: SubmissionMetaDraft): Promise<Complaint>
  getComplaint(complaintId: string): Promise<Complaint | null>
  /** Newest first. */
  listComplaints(filter: ComplaintFilter): Promise<Complaint[]>

  getVote(complaintId: string, voterId: string): Promise<Vote | null>
  /** Oldest vote first. */
  listVoters(complaintId: string): Promise<VoterRecord[]>
  /** Oldest first. */
  listStatusChanges(complaintId: string): Promise<StatusChange[]>
  getOverallStats(): Promise<OverallStats>

  /**
   * Runs `work` as the single atomic read-modify-write unit for one
   * complaint. Units on the same complaint never interleave. Throws
   * NotFoundError when the complaint does not exist.
   */
  withComplaintLock<T>(complaintId: string, work: (tx: ComplaintTransaction) => Promise<T>): Promise<T>

  close(): Promise<void>
}

export function emptyStats(): OverallStats {
  return {
    totalParticipants: 0,
    totalComplaints: 0,
    totalVotes: 0,
    complaintsByStatus: { raised: 0, opened: 0, reviewed: 0, closed: 0 },
    complaintsByPriority: { low: 0, medium: 0, high: 0, critical: 0 },
    complaintsByCategory: { food: 0, infrastructure: 0, academic: 0, hostel: 0, transport: 0, other: 0 },
  }
}
