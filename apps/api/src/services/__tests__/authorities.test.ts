import { describe, it, expect } from 'vitest'
import { AUTHORITY_TYPES, authorityForType, resolveAuthority } from '../authorities.js'

describe('authorities.ts', () => {
  describe('resolveAuthority', () => {
    it('should route food to the mess committee', () => {
      expect(resolveAuthority('food', 'campus.test')).toEqual({
        authority: 'Mess Committee Head',
        email: 'mess@campus.test',
        department: 'Mess & Catering Services',
      })
    })

    it('should ignore case and surrounding whitespace', () => {
      expect(resolveAuthority('  Hostel ', 'campus.test').authority).toBe('Hostel Warden')
    })

    it('should send unknown categories to student affairs', () => {
      expect(resolveAuthority('parking', 'campus.test')).toEqual({
        authority: 'Student Affairs Officer',
        email: 'studentaffairs@campus.test',
        department: 'Student Affairs',
      })
    })

    it('should give every category its own authority', () => {
      const names = AUTHORITY_TYPES.map((type) => resolveAuthority(type, 'campus.test').authority)
      expect(new Set(names).size).toBe(AUTHORITY_TYPES.length)
    })
  })

  describe('authorityForType', () => {
    it('should return null for an unknown type', () => {
      expect(authorityForType('plumbing', 'campus.test')).toBeNull()
    })

    it('should resolve a known type', () => {
      expect(authorityForType('TRANSPORT', 'campus.test')?.email).toBe('transport@campus.test')
    })
  })
})
