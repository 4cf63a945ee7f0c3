import { and, asc, count, desc, eq, inArray, sql, type SQL } from 'drizzle-orm'
import dbPackage, { type Complaint, type Database, type DatabaseHandle, type StatusChange, type Vote } from '@campus-voice/db'
import type { VoteType } from '@campus-voice/schema'
import { ConflictError, NotFoundError, TransientPersistenceError, errorMessage } from '../lib/errors.js'
import { createLogger } from '../lib/logger.js'
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
} from './complaint-store.js'

const { participants, complaints, complaintSubmissionMeta, votes, statusChanges } = dbPackage

const logger = createLogger('store')

type Tx = Parameters<Parameters<Database['transaction']>[0]>[0]

const TRANSIENT_CODES = new Set([
  '40001', // serialization_failure
  '40P01', // deadlock_detected
  '57P01', // admin_shutdown
  '57P03', // cannot_connect_now
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
])

function errorCode(error: unknown): string | null {
  let current: unknown = error
  for (let depth = 0; depth < 3 && current instanceof Error; depth += 1) {
    if ('code' in current && typeof current.code === 'string') return current.code
    current = current.cause
  }
  return null
}

/**
 * Maps driver errors onto the store's error taxonomy. Unique violations
 * become ConflictError; serialization failures, deadlocks and connection
 * loss become TransientPersistenceError. Anything else is returned as-is.
 */
export function translateDatabaseError(error: unknown): unknown {
  const code = errorCode(error)
  if (code === null) return error
  if (code === '23505') {
    return new ConflictError('Unique constraint violated', { cause: errorMessage(error) })
  }
  if (TRANSIENT_CODES.has(code) || code.startsWith('08')) {
    return new TransientPersistenceError(`Database unavailable (${code})`, { cause: error })
  }
  return error
}

class DrizzleTransaction implements ComplaintTransaction {
  constructor(
    private readonly tx: Tx,
    public complaint: Complaint,
  ) {}

  async findVote(voterId: string) {
    const [vote] = await this.tx
      .select()
      .from(votes)
      .where(and(eq(votes.complaintId, this.complaint.id), eq(votes.voterId, voterId)))
      .limit(1)
    return vote ?? null
  }

  async insertVote(voterId: string, voteType: VoteType) {
    const [vote] = await this.tx
      .insert(votes)
      .values({ complaintId: this.complaint.id, voterId, voteType })
      .returning()
    return vote
  }

  async updateVoteType(voteId: string, voteType: VoteType) {
    const [vote] = await this.tx
      .update(votes)
      .set({ voteType, updatedAt: new Date() })
      .where(and(eq(votes.id, voteId), eq(votes.complaintId, this.complaint.id)))
      .returning()
    if (!vote) throw new NotFoundError('Vote not found', { voteId })
    return vote
  }

  async deleteVote(voteId: string) {
    await this.tx
      .delete(votes)
      .where(and(eq(votes.id, voteId), eq(votes.complaintId, this.complaint.id)))
  }

  async updateComplaint(patch: ComplaintPatch) {
    const [row] = await this.tx
      .update(complaints)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(complaints.id, this.complaint.id))
      .returning()
    if (!row) throw new NotFoundError('Complaint not found', { complaintId: this.complaint.id })
    this.complaint = row
    return row
  }

  async appendStatusChange(change: StatusChangeDraft): Promise<StatusChange> {
    const [record] = await this.tx
      .insert(statusChanges)
      .values({ complaintId: this.complaint.id, ...change })
      .returning()
    return record
  }
}

/**
 * PostgreSQL ComplaintStore. Each atomic unit is one transaction that starts
 * with `SELECT ... FOR UPDATE` on the complaint row.
 */
export class DrizzleComplaintStore implements ComplaintStore {
  private readonly db: Database

  constructor(
    private readonly handle: DatabaseHandle,
    private readonly retry: Pick<RetryOptions, 'attempts' | 'baseDelayMs'>,
  ) {
    this.db = handle.db
  }

  private run<T>(operation: string, work: () => Promise<T>) {
    return withRetry(async () => {
      try {
        return await work()
      } catch (error) {
        throw translateDatabaseError(error)
      }
    }, { ...this.retry, operation })
  }

  upsertParticipant(profile: ParticipantProfile) {
    return this.run('upsert participant', async () => {
      const [participant] = await this.db
        .insert(participants)
        .values(profile)
        .onConflictDoUpdate({
          target: participants.identifier,
          set: {
            name: profile.name,
            email: profile.email,
            department: profile.department,
            stayType: profile.stayType,
            updatedAt: new Date(),
          },
        })
        .returning()
      return participant
    })
  }

  ensureParticipant(profile: ParticipantProfile) {
    return this.run('ensure participant', async () => {
      // A no-op update so RETURNING yields the existing row in one statement.
      const [participant] = await this.db
        .insert(participants)
        .values(profile)
        .onConflictDoUpdate({
          target: participants.identifier,
          set: { identifier: sql`excluded.identifier` },
        })
        .returning()
      return participant
    })
  }

  findParticipant(identifier: string) {
    return this.run('find participant', async () => {
      const [participant] = await this.db
        .select()
        .from(participants)
        .where(eq(participants.identifier, identifier))
        .limit(1)
      return participant ?? null
    })
  }

  createComplaint(draft: ComplaintDraft, meta: SubmissionMetaDraft) {
    return this.run('create complaint', () =>
      this.db.transaction(async (tx) => {
        const [complaint] = await tx.insert(complaints).values(draft).returning()
        await tx.insert(complaintSubmissionMeta).values({
          complaintId: complaint.id,
          source: meta.source,
          userAgent: meta.userAgent,
          clientAddress: meta.clientAddress,
        })
        return complaint
      }),
    )
  }

  getComplaint(complaintId: string) {
    return this.run('get complaint', async () => {
      const [complaint] = await this.db
        .select()
        .from(complaints)
        .where(eq(complaints.id, complaintId))
        .limit(1)
      return complaint ?? null
    })
  }

  listComplaints(filter: ComplaintFilter) {
    const conditions: SQL[] = []
    if (filter.visibility) conditions.push(eq(complaints.visibility, filter.visibility))
    if (filter.status) conditions.push(eq(complaints.status, filter.status))
    if (filter.priority) conditions.push(eq(complaints.priority, filter.priority))
    if (filter.category) conditions.push(eq(complaints.category, filter.category))
    if (filter.assignedAuthority) conditions.push(eq(complaints.assignedAuthority, filter.assignedAuthority))
    if (filter.submitterIdentifier !== undefined) {
      conditions.push(
        inArray(
          complaints.submitterId,
          this.db
            .select({ id: participants.id })
            .from(participants)
            .where(eq(participants.identifier, filter.submitterIdentifier)),
        ),
      )
    }

    return this.run('list complaints', () =>
      this.db
        .select()
        .from(complaints)
        .where(conditions.length > 0 ? and(...conditions) : undefined)
        .orderBy(desc(complaints.submittedAt))
        .limit(filter.limit)
        .offset(filter.offset),
    )
  }

  getVote(complaintId: string, voterId: string) {
    return this.run('get vote', async (): Promise<Vote | null> => {
      const [vote] = await this.db
        .select()
        .from(votes)
        .where(and(eq(votes.complaintId, complaintId), eq(votes.voterId, voterId)))
        .limit(1)
      return vote ?? null
    })
  }

  listVoters(complaintId: string) {
    return this.run('list voters', () =>
      this.db
        .select({
          voteType: votes.voteType,
          identifier: participants.identifier,
          name: participants.name,
          votedAt: votes.createdAt,
        })
        .from(votes)
        .innerJoin(participants, eq(votes.voterId, participants.id))
        .where(eq(votes.complaintId, complaintId))
        .orderBy(asc(votes.createdAt)),
    )
  }

  listStatusChanges(complaintId: string) {
    return this.run('list status changes', () =>
      this.db
        .select()
        .from(statusChanges)
        .where(eq(statusChanges.complaintId, complaintId))
        .orderBy(asc(statusChanges.createdAt)),
    )
  }

  getOverallStats() {
    return this.run('overall stats', async (): Promise<OverallStats> => {
      const stats = emptyStats()

      const [[participantTotal], [complaintTotal], [voteTotal]] = await Promise.all([
        this.db.select({ value: count() }).from(participants),
        this.db.select({ value: count() }).from(complaints),
        this.db.select({ value: count() }).from(votes),
      ])
      stats.totalParticipants = participantTotal?.value ?? 0
      stats.totalComplaints = complaintTotal?.value ?? 0
      stats.totalVotes = voteTotal?.value ?? 0

      const [byStatus, byPriority, byCategory] = await Promise.all([
        this.db.select({ key: complaints.status, value: count() }).from(complaints).groupBy(complaints.status),
        this.db.select({ key: complaints.priority, value: count() }).from(complaints).groupBy(complaints.priority),
        this.db.select({ key: complaints.category, value: count() }).from(complaints).groupBy(complaints.category),
      ])
      for (const row of byStatus) stats.complaintsByStatus[row.key] = row.value
      for (const row of byPriority) stats.complaintsByPriority[row.key] = row.value
      for (const row of byCategory) stats.complaintsByCategory[row.key] = row.value

      return stats
    })
  }

  withComplaintLock<T>(complaintId: string, work: (tx: ComplaintTransaction) => Promise<T>) {
    return this.run(`complaint ${complaintId}`, () =>
      this.db.transaction(async (tx) => {
        const [complaint] = await tx
          .select()
          .from(complaints)
          .where(eq(complaints.id, complaintId))
          .for('update')
        if (!complaint) throw new NotFoundError('Complaint not found', { complaintId })
        return work(new DrizzleTransaction(tx, complaint))
      }),
    )
  }

  async close() {
    logger.info('Closing database pool')
    await this.handle.pool.end()
  }
}
