import type { ParticipantProfile } from './complaint-store.js'

export function participantEmail(identifier: string, emailDomain: string) {
  return `${identifier.trim().toLowerCase()}@${emailDomain}`
}

/** Profile for an identifier first seen as a voter. Never overwrites a real one. */
export function placeholderProfile(identifier: string, emailDomain: string): ParticipantProfile {
  return {
    identifier,
    name: 'Student',
    email: participantEmail(identifier, emailDomain),
    department: 'Unknown',
    stayType: null,
  }
}
