import { classificationSchema, type Classification } from '@campus-voice/schema'
import { ExternalServiceError, errorMessage } from '../lib/errors.js'
import { createLogger } from '../lib/logger.js'
import { chatWithLLM, isProviderConfigured, type FetchLike, type ProviderConfig } from './llm.js'

const logger = createLogger('classifier')

export type FallbackReason = 'unavailable' | 'timeout' | 'request_failed' | 'malformed_response'

export type ClassificationOutcome =
  | { source: 'model'; classification: Classification }
  | { source: 'fallback'; classification: Classification; reason: FallbackReason }

export interface ClassificationGateway {
  classify(title: string, description: string): Promise<ClassificationOutcome>
}

export const FALLBACK_CLASSIFICATION: Readonly<Classification> = {
  priority: 'medium',
  category: 'other',
  sentiment: 'neutral',
  urgency_score: 50,
  impact_level: 'individual',
  summary: 'Complaint requires manual review',
  key_issues: ['Manual review required'],
  suggested_authority: 'Student Affairs Officer',
}

export function fallbackOutcome(reason: FallbackReason): ClassificationOutcome {
  return {
    source: 'fallback',
    reason,
    classification: { ...FALLBACK_CLASSIFICATION, key_issues: [...FALLBACK_CLASSIFICATION.key_issues] },
  }
}

const SYSTEM_PROMPT =
  'You triage complaints for an engineering college campus. Answer with a single JSON object and nothing else.'

function buildPrompt(title: string, description: string) {
  return `Classify this campus complaint.

Title: ${title}
Description: ${description}

Categories:
- "food": mess, canteen, food quality, hygiene, menu, dining hall
- "infrastructure": buildings, classrooms, labs, electricity, water, furniture, equipment, campus wifi, library furniture or AC
- "academic": classes, exams, faculty, curriculum, timetable, library books and resources
- "hostel": hostel rooms and facilities, hostel mess, hostel rules, hostel wifi
- "transport": college bus, shuttle, parking, transport timing
- "other": anything that fits none of the above

Priorities:
- "critical": safety hazards, health emergencies, failures affecting many students
- "high": significant disruption, urgent repairs, many people affected
- "medium": needs attention but not urgent, individuals or small groups
- "low": minor inconvenience or suggestion

Respond with:
{
  "priority": "low" | "medium" | "high" | "critical",
  "category": "food" | "infrastructure" | "academic" | "hostel" | "transport" | "other",
  "sentiment": "negative" | "neutral" | "positive",
  "urgency_score": 0-100,
  "impact_level": "individual" | "group" | "campus-wide",
  "summary": "one sentence",
  "key_issues": ["..."],
  "suggested_authority": "who should handle this"
}`
}

/**
 * Classifies complaints through the configured chat model.
 *
 * An unconfigured provider, a timeout, a failed request or an answer that
 * does not validate resolve to the fixed fallback record, tagged with the
 * reason.
 */
export class LlmClassificationGateway implements ClassificationGateway {
  constructor(
    private readonly config: ProviderConfig,
    private readonly fetchImpl: FetchLike = fetch,
  ) {}

  async classify(title: string, description: string): Promise<ClassificationOutcome> {
    if (!isProviderConfigured(this.config)) {
      logger.warn('No API key configured, using fallback classification')
      return fallbackOutcome('unavailable')
    }

    let content: string
    try {
      content = await chatWithLLM(
        this.config,
        {
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: buildPrompt(title, description) },
          ],
          temperature: 0.1,
          maxTokens: 500,
          jsonMode: true,
        },
        this.fetchImpl,
      )
    } catch (error) {
      if (error instanceof ExternalServiceError) {
        logger.warn(`Classification failed (${error.reason}): ${error.message}`)
        return fallbackOutcome(error.reason)
      }
      throw error
    }

    return parseClassification(content)
  }
}

/** Validates raw model text. Exported for tests. */
export function parseClassification(content: string): ClassificationOutcome {
  let raw: unknown
  try {
    raw = JSON.parse(content)
  } catch (error) {
    logger.warn(`Model answer was not JSON: ${errorMessage(error)}`)
    return fallbackOutcome('malformed_response')
  }

  const parsed = classificationSchema.safeParse(raw)
  if (!parsed.success) {
    logger.warn(`Model answer failed validation: ${parsed.error.issues.map((issue) => issue.path.join('.')).join(', ')}`)
    return fallbackOutcome('malformed_response')
  }

  logger.info(`Classified: priority=${parsed.data.priority} category=${parsed.data.category}`)
  return { source: 'model', classification: parsed.data }
}
