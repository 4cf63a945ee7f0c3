import type { Complaint } from '@campus-voice/db'
import type {
  ComplaintPriority,
  ComplaintStatus,
  ComplaintSubmission,
  ComplaintSubmissionResult,
} from '@campus-voice/schema'
import { InvalidInputError, NotFoundError } from '../lib/errors.js'
import { createLogger } from '../lib/logger.js'
import { AUTHORITY_TYPES, authorityForType, resolveAuthority, type Authority } from './authorities.js'
import type { ClassificationGateway } from './classification.js'
import type { ComplaintStore, OverallStats } from './complaint-store.js'
import { participantEmail } from './participants.js'
import { scorePriority } from './priority.js'

const logger = createLogger('complaints')

export type ComplaintIntakeDeps = {
  store: ComplaintStore
  classifier: ClassificationGateway
  emailDomain: string
}

export type SubmissionContext = {
  source?: string
  userAgent: string | null
  clientAddress: string | null
}

export type ListOptions = {
  status?: ComplaintStatus
  priority?: ComplaintPriority
  limit: number
  offset: number
}

export class ComplaintIntake {
  constructor(private readonly deps: ComplaintIntakeDeps) {}

  /**
   * Classifies, routes and stores a new complaint. Classification runs before
   * anything is written and never fails the submission; a fallback record is
   * stored instead.
   */
  async submit(input: ComplaintSubmission, context: SubmissionContext): Promise<ComplaintSubmissionResult> {
    const outcome = await this.deps.classifier.classify(input.title, input.description)
    const { classification } = outcome
    if (outcome.source === 'fallback') {
      logger.warn(`Using fallback classification for "${input.title}" (${outcome.reason})`)
    }

    const authority = resolveAuthority(classification.category, this.deps.emailDomain)
    const submitter = await this.deps.store.upsertParticipant({
      identifier: input.register_number,
      name: input.name,
      email: participantEmail(input.register_number, this.deps.emailDomain),
      department: input.department,
      stayType: input.stay_type ?? null,
    })

    // Stored label is the model's; the first vote may move it to the scorer's.
    const initial = scorePriority(classification, 0, 0)
    const complaint = await this.deps.store.createComplaint(
      {
        submitterId: submitter.id,
        title: input.title,
        description: input.description,
        visibility: input.visibility,
        imageUrl: input.image_url ?? null,
        priority: classification.priority,
        priorityScore: initial.score,
        category: classification.category,
        assignedAuthority: authority.authority,
        authorityEmail: authority.email,
        authorityDepartment: authority.department,
        classification,
      },
      context,
    )

    logger.info(`Created ${complaint.id} (${complaint.category}, ${complaint.priority}) -> ${authority.authority}`)

    return {
      complaint_id: complaint.id,
      title: complaint.title,
      status: complaint.status,
      priority: complaint.priority,
      priority_score: complaint.priorityScore,
      detected_priority: classification.priority,
      category: complaint.category,
      urgency_score: classification.urgency_score,
      assigned_to: authority.authority,
      authority_email: authority.email,
      summary: classification.summary,
      classification_source: outcome.source,
    }
  }

  async getComplaint(complaintId: string): Promise<Complaint> {
    const complaint = await this.deps.store.getComplaint(complaintId)
    if (!complaint) throw new NotFoundError('Complaint not found', { complaintId })
    return complaint
  }

  listPublic(options: ListOptions) {
    return this.deps.store.listComplaints({ ...options, visibility: 'public' })
  }

  /** Every complaint of one submitter, public or not. */
  listMine(identifier: string, options: ListOptions) {
    return this.deps.store.listComplaints({ ...options, submitterIdentifier: identifier })
  }

  async listForAuthority(
    authorityType: string,
    options: ListOptions,
  ): Promise<{ authority: Authority; complaints: Complaint[] }> {
    const authority = authorityForType(authorityType, this.deps.emailDomain)
    if (!authority) {
      throw new InvalidInputError(
        'INVALID_AUTHORITY_TYPE',
        `authority type must be one of: ${AUTHORITY_TYPES.join(', ')}`,
        { received: authorityType },
      )
    }
    const complaints = await this.deps.store.listComplaints({ ...options, assignedAuthority: authority.authority })
    return { authority, complaints }
  }

  getOverallStats(): Promise<OverallStats> {
    return this.deps.store.getOverallStats()
  }
}
