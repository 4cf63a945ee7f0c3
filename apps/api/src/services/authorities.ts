import { complaintCategoryValues, type ComplaintCategory } from '@campus-voice/schema'

export type Authority = {
  authority: string
  email: string
  department: string
}

type AuthorityEntry = {
  authority: string
  mailbox: string
  department: string
}

const AUTHORITY_DIRECTORY: Record<ComplaintCategory, AuthorityEntry> = {
  food: { authority: 'Mess Committee Head', mailbox: 'mess', department: 'Mess & Catering Services' },
  infrastructure: {
    authority: 'Maintenance Officer',
    mailbox: 'maintenance',
    department: 'Infrastructure & Maintenance',
  },
  academic: { authority: 'Academic Dean', mailbox: 'academics', department: 'Academic Affairs' },
  hostel: { authority: 'Hostel Warden', mailbox: 'hostel', department: 'Hostel Administration' },
  transport: { authority: 'Transport Coordinator', mailbox: 'transport', department: 'Transport Services' },
  other: { authority: 'Student Affairs Officer', mailbox: 'studentaffairs', department: 'Student Affairs' },
}

export const AUTHORITY_TYPES: readonly ComplaintCategory[] = complaintCategoryValues

function isAuthorityType(value: string): value is ComplaintCategory {
  return Object.hasOwn(AUTHORITY_DIRECTORY, value)
}

function toAuthority(entry: AuthorityEntry, emailDomain: string): Authority {
  return {
    authority: entry.authority,
    email: `${entry.mailbox}@${emailDomain}`,
    department: entry.department,
  }
}

/**
 * Routes a category to its authority. Unknown categories go to Student
 * Affairs; this never throws.
 */
export function resolveAuthority(category: string, emailDomain: string): Authority {
  const key = category.trim().toLowerCase()
  const entry = isAuthorityType(key) ? AUTHORITY_DIRECTORY[key] : AUTHORITY_DIRECTORY.other
  return toAuthority(entry, emailDomain)
}

/** Strict variant for user input: `null` when the type is not in the directory. */
export function authorityForType(type: string, emailDomain: string): Authority | null {
  const key = type.trim().toLowerCase()
  return isAuthorityType(key) ? toAuthority(AUTHORITY_DIRECTORY[key], emailDomain) : null
}
