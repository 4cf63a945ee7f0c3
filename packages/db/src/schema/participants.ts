import { index, pgTable, uniqueIndex, varchar } from 'drizzle-orm/pg-core'
import { createdAt, idWithTag, updatedAt } from './_common'

/**
 * participants
 *
 * Identity behind a caller-supplied identifier (student roll number or staff
 * id). Rows are only ever written through an insert-on-conflict upsert keyed
 * by `identifier`, so two concurrent first votes never race on creation.
 */
export const participants = pgTable('participants', {
  id: idWithTag('participant'),

  /** Caller-supplied identifier; trusted as-is. */
  identifier: varchar('identifier', { length: 40 }).notNull(),

  name: varchar('name', { length: 100 }).notNull(),
  email: varchar('email', { length: 255 }).notNull(),
  department: varchar('department', { length: 50 }).notNull(),

  /** Hostel / day scholar; unknown for auto-created voters. */
  stayType: varchar('stay_type', { length: 20 }),

  createdAt: createdAt(),
  updatedAt: updatedAt(),
}, (table) => ({
  participantsIdentifierUnique: uniqueIndex('participants_identifier_unique').on(table.identifier),
  participantsDepartmentIdx: index('participants_department_idx').on(table.department),
}))

export type Participant = typeof participants.$inferSelect
export type NewParticipant = typeof participants.$inferInsert
