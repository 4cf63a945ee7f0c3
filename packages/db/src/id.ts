import KSUID from 'ksuid'

/** Entity prefixes. Every row id reads `<tag>_<KSUID>`. */
export const idTags = ['participant', 'complaint', 'submission_meta', 'vote', 'status_change'] as const

export type IdTag = (typeof idTags)[number]

const TAGGED_ID = /^([a-z_]+)_([0-9A-Za-z]{27})$/

export function generateId(tag: IdTag): string {
  return `${tag}_${KSUID.randomSync().string}`
}

/** The entity tag of a well-formed id, or `null` for anything else. */
export function idTagOf(id: string): IdTag | null {
  const match = TAGGED_ID.exec(id)
  if (!match) return null
  return idTags.find((tag) => tag === match[1]) ?? null
}
