import { z } from 'zod'

// Vocabularies (shared with the pg enums in @campus-voice/db)
export const complaintStatusValues = ['raised', 'opened', 'reviewed', 'closed'] as const
export const complaintPriorityValues = ['low', 'medium', 'high', 'critical'] as const
export const complaintVisibilityValues = ['public', 'private'] as const
export const complaintCategoryValues = [
  'food',
  'infrastructure',
  'academic',
  'hostel',
  'transport',
  'other',
] as const
export const voteTypeValues = ['upvote', 'downvote'] as const
export const voteActionValues = ['created', 'updated', 'deleted'] as const
export const impactLevelValues = ['individual', 'group', 'campus-wide'] as const
export const sentimentValues = ['negative', 'neutral', 'positive'] as const

export const complaintStatusSchema = z.enum(complaintStatusValues)
export const complaintPrioritySchema = z.enum(complaintPriorityValues)
export const complaintVisibilitySchema = z.enum(complaintVisibilityValues)
export const complaintCategorySchema = z.enum(complaintCategoryValues)
export const voteTypeSchema = z.enum(voteTypeValues)
export const voteActionSchema = z.enum(voteActionValues)
export const impactLevelSchema = z.enum(impactLevelValues)
export const sentimentSchema = z.enum(sentimentValues)

export type ComplaintStatus = z.infer<typeof complaintStatusSchema>
export type ComplaintPriority = z.infer<typeof complaintPrioritySchema>
export type ComplaintVisibility = z.infer<typeof complaintVisibilitySchema>
export type ComplaintCategory = z.infer<typeof complaintCategorySchema>
export type VoteType = z.infer<typeof voteTypeSchema>
export type VoteAction = z.infer<typeof voteActionSchema>
export type ImpactLevel = z.infer<typeof impactLevelSchema>
export type Sentiment = z.infer<typeof sentimentSchema>

/**
 * Lower-cases and trims a string before enum matching. Model output is not
 * consistent about casing.
 */
const normalizedText = (value: unknown) => (typeof value === 'string' ? value.trim().toLowerCase() : value)

// Classification
export const classificationSchema = z.object({
  priority: z.preprocess(normalizedText, complaintPrioritySchema),
  category: z.preprocess(normalizedText, complaintCategorySchema.catch('other')),
  sentiment: z.preprocess(normalizedText, sentimentSchema.catch('neutral')),
  /** 0-100, rounded; out-of-range values are clamped, a missing one reads as 50. */
  urgency_score: z.preprocess(
    (value) => value ?? 50,
    z.coerce
      .number()
      .finite()
      .transform((value) => Math.min(100, Math.max(0, Math.round(value)))),
  ),
  impact_level: z.preprocess(normalizedText, impactLevelSchema.catch('individual')),
  summary: z
    .string()
    .trim()
    .min(1)
    .transform((value) => value.slice(0, 500)),
  key_issues: z
    .array(z.string().trim().min(1))
    .default([])
    .transform((issues) => issues.slice(0, 10)),
  suggested_authority: z.string().trim().min(1).max(120).catch('Student Affairs Officer'),
})

export type Classification = z.infer<typeof classificationSchema>

// Complaint submission
export const complaintSubmissionSchema = z.object({
  name: z.string().trim().min(2).max(100),
  register_number: z.string().trim().min(3).max(40),
  department: z.string().trim().min(2).max(50),
  stay_type: z.string().trim().max(20).optional(),
  visibility: z.preprocess(normalizedText, complaintVisibilitySchema).default('public'),
  title: z.string().trim().min(5).max(200),
  description: z.string().trim().min(10).max(2000),
  image_url: z.string().trim().max(500).optional(),
})

export type ComplaintSubmission = z.infer<typeof complaintSubmissionSchema>

export const complaintSubmissionResultSchema = z.object({
  complaint_id: z.string(),
  title: z.string(),
  status: complaintStatusSchema,
  priority: complaintPrioritySchema,
  priority_score: z.number().int(),
  detected_priority: complaintPrioritySchema,
  category: complaintCategorySchema,
  urgency_score: z.number().int(),
  assigned_to: z.string(),
  authority_email: z.string(),
  summary: z.string(),
  classification_source: z.enum(['model', 'fallback']),
})

export type ComplaintSubmissionResult = z.infer<typeof complaintSubmissionResultSchema>

export const complaintListQuerySchema = z.object({
  status: complaintStatusSchema.optional(),
  priority: complaintPrioritySchema.optional(),
  limit: z.coerce.number().int().min(1).max(100).default(50),
  offset: z.coerce.number().int().min(0).default(0),
})

// Voting
/**
 * `vote_type` stays a plain string here: the vote ledger owns the check so
 * that every caller gets the same INVALID_VOTE_TYPE failure.
 */
export const voteRequestSchema = z.object({
  complaint_id: z.string().trim().min(1),
  voter_id: z.string().trim().min(1).max(40),
  vote_type: z.string(),
})

export type VoteRequest = z.infer<typeof voteRequestSchema>

export const voteResultSchema = z.object({
  complaint_id: z.string(),
  action: voteActionSchema,
  upvotes: z.number().int().min(0),
  downvotes: z.number().int().min(0),
  net_votes: z.number().int(),
  priority_score: z.number().int(),
  priority_updated: z.boolean(),
  old_priority: complaintPrioritySchema.optional(),
  new_priority: complaintPrioritySchema.optional(),
})

export type VoteResult = z.infer<typeof voteResultSchema>

export const voteStatsSchema = z.object({
  upvotes: z.number().int().min(0),
  downvotes: z.number().int().min(0),
  total: z.number().int().min(0),
  net_votes: z.number().int(),
})

export type VoteStats = z.infer<typeof voteStatsSchema>

// Status workflow
/** `new_status` is checked by the status workflow, mirroring `vote_type`. */
export const statusUpdateRequestSchema = z.object({
  complaint_id: z.string().trim().min(1),
  new_status: z.string(),
  actor: z.string().trim().min(1).max(100),
  reason: z.string().trim().max(1000).optional(),
})

export type StatusUpdateRequest = z.infer<typeof statusUpdateRequestSchema>

export const statusUpdateResultSchema = z.object({
  complaint_id: z.string(),
  old_status: complaintStatusSchema,
  new_status: complaintStatusSchema,
  updated_by: z.string(),
  resolved_at: z.string().datetime().nullable(),
})

export type StatusUpdateResult = z.infer<typeof statusUpdateResultSchema>

// Realtime events (server -> client)
export type ConnectionEvent = {
  type: 'connection'
  complaint_id: string
  message: string
  timestamp: string
}

export type VoteUpdatePayload = {
  upvotes: number
  downvotes: number
  total_votes: number
  action: VoteAction
  vote_type: VoteType
  priority_updated: boolean
  new_priority?: ComplaintPriority
}

export type VoteUpdateEvent = VoteUpdatePayload & {
  type: 'vote_update'
  complaint_id: string
  timestamp: string
}

export type StatusUpdatePayload = {
  old_status: ComplaintStatus
  new_status: ComplaintStatus
  updated_by: string
  reason: string | null
}

export type StatusUpdateEvent = StatusUpdatePayload & {
  type: 'status_update'
  complaint_id: string
  timestamp: string
}

export type PongEvent = {
  type: 'pong'
  timestamp: string
}

export type RealtimeServerEvent =
  | ConnectionEvent
  | VoteUpdateEvent
  | StatusUpdateEvent
  | PongEvent
