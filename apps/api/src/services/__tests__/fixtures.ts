import type { Classification, RealtimeServerEvent } from '@campus-voice/schema'
import type { ClassificationGateway, ClassificationOutcome } from '../classification.js'
import type { ComplaintDraft } from '../complaint-store.js'
import { MemoryComplaintStore } from '../memory-store.js'
import type { RealtimeChannel } from '../realtime-registry.js'

export const EMAIL_DOMAIN = 'campus.test'

export function classification(overrides: Partial<Classification> = {}): Classification {
  return {
    priority: 'medium',
    category: 'food',
    sentiment: 'negative',
    urgency_score: 50,
    impact_level: 'individual',
    summary: 'Mess food served cold',
    key_issues: ['cold food'],
    suggested_authority: 'Mess Committee Head',
    ...overrides,
  }
}

export class StaticClassifier implements ClassificationGateway {
  calls = 0

  constructor(private readonly outcome: ClassificationOutcome = { source: 'model', classification: classification() }) {}

  async classify() {
    this.calls += 1
    return this.outcome
  }
}

/**
 * Seeds one participant and one complaint. The stored score and label match
 * what the scorer gives the classification with no votes.
 */
export async function seedComplaint(
  store: MemoryComplaintStore,
  overrides: Partial<ComplaintDraft> = {},
) {
  const submitter = await store.upsertParticipant({
    identifier: '21CS001',
    name: 'Asha Rao',
    email: `21cs001@${EMAIL_DOMAIN}`,
    department: 'CSE',
    stayType: 'hostel',
  })
  return store.createComplaint(
    {
      submitterId: submitter.id,
      title: 'Cold food in mess',
      description: 'Dinner has been served cold all week.',
      visibility: 'public',
      imageUrl: null,
      priority: 'medium',
      priorityScore: 400,
      category: 'food',
      assignedAuthority: 'Mess Committee Head',
      authorityEmail: `mess@${EMAIL_DOMAIN}`,
      authorityDepartment: 'Mess & Catering Services',
      classification: classification(),
      ...overrides,
    },
    { userAgent: 'vitest', clientAddress: '127.0.0.1' },
  )
}

export class FakeChannel implements RealtimeChannel {
  readonly sent: RealtimeServerEvent[] = []
  readonly closed: Array<{ code: number; reason: string }> = []
  failSend = false
  /** Sends never settle, like a peer that stopped reading. */
  stallSend = false
  alive = true

  constructor(readonly id: string) {}

  send(event: RealtimeServerEvent) {
    if (this.stallSend) return new Promise<void>(() => {})
    if (this.failSend) return Promise.reject(new Error(`${this.id} is gone`))
    this.sent.push(event)
    return Promise.resolve()
  }

  async probe() {
    return this.alive
  }

  close(code: number, reason: string) {
    this.closed.push({ code, reason })
  }
}
