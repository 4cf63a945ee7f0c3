import { sql } from 'drizzle-orm'
import { check, index, integer, jsonb, pgTable, text, timestamp, uniqueIndex, varchar } from 'drizzle-orm/pg-core'
import type { Classification } from '@campus-voice/schema'
import { createdAt, idRef, idWithTag, updatedAt } from './_common'
import {
  complaintCategoryEnum,
  complaintPriorityEnum,
  complaintStatusEnum,
  complaintVisibilityEnum,
  voteTypeEnum,
} from './enums'
import { participants } from './participants'

/**
 * complaints
 *
 * Vote counters, priority and status live on the row and are only changed
 * inside a transaction that holds `SELECT ... FOR UPDATE` on it. Counters must
 * always equal the number of matching `votes` rows.
 */
export const complaints = pgTable('complaints', {
  id: idWithTag('complaint'),

  submitterId: idRef('submitter_id')
    .references(() => participants.id, { onDelete: 'cascade' })
    .notNull(),

  title: varchar('title', { length: 200 }).notNull(),
  description: text('description').notNull(),
  visibility: complaintVisibilityEnum('visibility').default('public').notNull(),
  imageUrl: varchar('image_url', { length: 500 }),

  upvotes: integer('upvotes').default(0).notNull(),
  downvotes: integer('downvotes').default(0).notNull(),

  status: complaintStatusEnum('status').default('raised').notNull(),
  priority: complaintPriorityEnum('priority').default('medium').notNull(),

  /** 0-2000; recomputed from `classification` and the vote counters. */
  priorityScore: integer('priority_score').default(0).notNull(),

  category: complaintCategoryEnum('category').default('other').notNull(),
  assignedAuthority: varchar('assigned_authority', { length: 100 }).notNull(),
  authorityEmail: varchar('authority_email', { length: 255 }).notNull(),
  authorityDepartment: varchar('authority_department', { length: 100 }).notNull(),

  /** Classifier output captured once at submission; never re-classified. */
  classification: jsonb('classification').$type<Classification>().notNull(),

  submittedAt: timestamp('submitted_at', { withTimezone: true }).defaultNow().notNull(),
  updatedAt: updatedAt(),

  /** Stamped each time the complaint is closed; kept if it is reopened. */
  resolvedAt: timestamp('resolved_at', { withTimezone: true }),
}, (table) => ({
  complaintsSubmitterIdx: index('complaints_submitter_idx').on(table.submitterId),
  complaintsStatusIdx: index('complaints_status_idx').on(table.status),
  complaintsPriorityIdx: index('complaints_priority_idx').on(table.priority),
  complaintsAuthorityIdx: index('complaints_authority_idx').on(table.assignedAuthority),
  complaintsVisibilitySubmittedIdx: index('complaints_visibility_submitted_idx').on(
    table.visibility,
    table.submittedAt,
  ),
  complaintsCountersNonNegative: check(
    'complaints_counters_non_negative',
    sql`${table.upvotes} >= 0 AND ${table.downvotes} >= 0`,
  ),
  complaintsPriorityScoreRange: check(
    'complaints_priority_score_range',
    sql`${table.priorityScore} BETWEEN 0 AND 2000`,
  ),
}))

/**
 * complaint_submission_meta
 *
 * Where a submission came from. Written once, next to the complaint insert.
 */
export const complaintSubmissionMeta = pgTable('complaint_submission_meta', {
  id: idWithTag('submission_meta'),
  complaintId: idRef('complaint_id')
    .references(() => complaints.id, { onDelete: 'cascade' })
    .notNull(),
  source: varchar('source', { length: 100 }).default('campus-voice-api').notNull(),
  userAgent: varchar('user_agent', { length: 500 }),
  clientAddress: varchar('client_address', { length: 64 }),
  createdAt: createdAt(),
}, (table) => ({
  complaintSubmissionMetaComplaintIdx: index('complaint_submission_meta_complaint_idx').on(table.complaintId),
}))

/**
 * votes
 *
 * One row per (complaint, voter). The unique index is the last line of
 * defence; the vote ledger already serializes per complaint.
 */
export const votes = pgTable('votes', {
  id: idWithTag('vote'),
  complaintId: idRef('complaint_id')
    .references(() => complaints.id, { onDelete: 'cascade' })
    .notNull(),
  voterId: idRef('voter_id')
    .references(() => participants.id, { onDelete: 'cascade' })
    .notNull(),
  voteType: voteTypeEnum('vote_type').notNull(),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
}, (table) => ({
  votesComplaintVoterUnique: uniqueIndex('votes_complaint_voter_unique').on(table.complaintId, table.voterId),
  votesComplaintIdx: index('votes_complaint_idx').on(table.complaintId),
  votesVoterIdx: index('votes_voter_idx').on(table.voterId),
}))

/**
 * status_changes
 *
 * Append-only audit trail. Rows are never updated or deleted by the API.
 */
export const statusChanges = pgTable('status_changes', {
  id: idWithTag('status_change'),
  complaintId: idRef('complaint_id')
    .references(() => complaints.id, { onDelete: 'cascade' })
    .notNull(),
  oldStatus: complaintStatusEnum('old_status').notNull(),
  newStatus: complaintStatusEnum('new_status').notNull(),

  /** Caller-supplied actor identifier. */
  actor: varchar('actor', { length: 100 }).notNull(),
  reason: text('reason'),
  createdAt: createdAt(),
}, (table) => ({
  statusChangesComplaintCreatedIdx: index('status_changes_complaint_created_idx').on(
    table.complaintId,
    table.createdAt,
  ),
}))

export type Complaint = typeof complaints.$inferSelect
export type NewComplaint = typeof complaints.$inferInsert
export type ComplaintSubmissionMeta = typeof complaintSubmissionMeta.$inferSelect
export type NewComplaintSubmissionMeta = typeof complaintSubmissionMeta.$inferInsert
export type Vote = typeof votes.$inferSelect
export type StatusChange = typeof statusChanges.$inferSelect
