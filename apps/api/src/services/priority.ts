import type { ComplaintPriority, ImpactLevel } from '@campus-voice/schema'

export const PRIORITY_BASE_SCORES: Record<ComplaintPriority, number> = {
  low: 100,
  medium: 300,
  high: 700,
  critical: 1500,
}

export const IMPACT_BONUS: Record<ImpactLevel, number> = {
  individual: 50,
  group: 150,
  'campus-wide': 300,
}

export const DEFAULT_URGENCY_SCORE = 50
export const MIN_PRIORITY_SCORE = 0
export const MAX_PRIORITY_SCORE = 2000

/** Points per net upvote; a downvote weighs half an upvote. */
const VOTE_WEIGHT = 5
const DOWNVOTE_WEIGHT = 0.5

/** Label thresholds, highest first. */
const LABEL_THRESHOLDS: ReadonlyArray<readonly [number, ComplaintPriority]> = [
  [1500, 'critical'],
  [700, 'high'],
  [300, 'medium'],
]

/**
 * The parts of a classification the scorer reads. Stored payloads are not
 * re-validated, so every field is optional and loosely typed.
 */
export type PriorityInput = {
  priority?: string | null
  urgency_score?: number | null
  impact_level?: string | null
}

export type PriorityScore = {
  score: number
  label: ComplaintPriority
}

function isPriority(value: string): value is ComplaintPriority {
  return Object.hasOwn(PRIORITY_BASE_SCORES, value)
}

function isImpactLevel(value: string): value is ImpactLevel {
  return Object.hasOwn(IMPACT_BONUS, value)
}

function baseScore(priority: string | null | undefined) {
  return priority && isPriority(priority) ? PRIORITY_BASE_SCORES[priority] : PRIORITY_BASE_SCORES.medium
}

function impactBonus(impact: string | null | undefined) {
  return impact && isImpactLevel(impact) ? IMPACT_BONUS[impact] : IMPACT_BONUS.individual
}

function urgency(value: number | null | undefined) {
  return typeof value === 'number' && Number.isFinite(value) ? value : DEFAULT_URGENCY_SCORE
}

export function voteInfluence(upvotes: number, downvotes: number) {
  return Math.max(0, upvotes - downvotes * DOWNVOTE_WEIGHT) * VOTE_WEIGHT
}

export function priorityLabel(score: number): ComplaintPriority {
  for (const [threshold, label] of LABEL_THRESHOLDS) {
    if (score >= threshold) return label
  }
  return 'low'
}

/**
 * Combines the classifier's priority, urgency and impact with community votes
 * into a 0-2000 score and its label. Pure: same input, same output.
 */
export function scorePriority(input: PriorityInput, upvotes: number, downvotes: number): PriorityScore {
  const total =
    baseScore(input.priority) +
    urgency(input.urgency_score) +
    impactBonus(input.impact_level) +
    voteInfluence(upvotes, downvotes)

  const score = Math.min(MAX_PRIORITY_SCORE, Math.max(MIN_PRIORITY_SCORE, Math.trunc(total)))
  return { score, label: priorityLabel(score) }
}
