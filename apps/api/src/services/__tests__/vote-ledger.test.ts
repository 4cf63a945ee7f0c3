/**
 * @fileoverview Tests for the vote ledger
 *
 * @description
 * Toggle semantics, counter integrity under concurrency, priority
 * recomputation and event publication, all against the in-memory store.
 */

import { describe, it, expect } from 'vitest'
import { ConflictError } from '../../lib/errors.js'
import { createComplaintEventBus, type ComplaintEvent } from '../complaint-events.js'
import type { ComplaintTransaction } from '../complaint-store.js'
import { MemoryComplaintStore } from '../memory-store.js'
import { VoteLedger } from '../vote-ledger.js'
import { EMAIL_DOMAIN, classification, seedComplaint } from './fixtures.js'

/** Raises ConflictError on the first `conflicts` units, like a lost insert race. */
class ConflictingStore extends MemoryComplaintStore {
  lockCalls = 0

  constructor(private conflicts: number) {
    super()
  }

  override async withComplaintLock<T>(complaintId: string, work: (tx: ComplaintTransaction) => Promise<T>) {
    this.lockCalls += 1
    if (this.conflicts > 0) {
      this.conflicts -= 1
      throw new ConflictError('duplicate key value violates unique constraint')
    }
    return super.withComplaintLock(complaintId, work)
  }
}

async function setup(store = new MemoryComplaintStore()) {
  const events = createComplaintEventBus()
  const published: ComplaintEvent[] = []
  events.subscribe((event) => published.push(event))
  const ledger = new VoteLedger({ store, events, emailDomain: EMAIL_DOMAIN })
  const complaint = await seedComplaint(store)
  return { store, events, published, ledger, complaint }
}

describe('VoteLedger', () => {
  describe('vote', () => {
    it('should create a first vote', async () => {
      const { ledger, complaint } = await setup()

      expect(await ledger.vote(complaint.id, '21CS050', 'upvote')).toEqual({
        complaint_id: complaint.id,
        action: 'created',
        upvotes: 1,
        downvotes: 0,
        net_votes: 1,
        priority_score: 405,
        priority_updated: false,
      })
    })

    it('should delete the vote when the same type is cast again', async () => {
      const { ledger, store, complaint } = await setup()

      await ledger.vote(complaint.id, '21CS050', 'upvote')
      const result = await ledger.vote(complaint.id, '21CS050', 'upvote')

      expect(result).toMatchObject({ action: 'deleted', upvotes: 0, downvotes: 0, net_votes: 0, priority_score: 400 })
      expect(await ledger.getVoterVote(complaint.id, '21CS050')).toBeNull()
      expect(await store.listVoters(complaint.id)).toEqual([])
    })

    it('should switch to the opposite type', async () => {
      const { ledger, complaint } = await setup()

      await ledger.vote(complaint.id, '21CS050', 'upvote')
      const result = await ledger.vote(complaint.id, '21CS050', 'downvote')

      expect(result).toMatchObject({ action: 'updated', upvotes: 0, downvotes: 1, net_votes: -1, priority_score: 400 })
      expect(await ledger.getVoterVote(complaint.id, '21CS050')).toBe('downvote')
    })

    it('should persist the score on every vote', async () => {
      const { ledger, store, complaint } = await setup()

      await ledger.vote(complaint.id, '21CS050', 'upvote')
      await ledger.vote(complaint.id, '21CS051', 'upvote')

      expect(await store.getComplaint(complaint.id)).toMatchObject({
        upvotes: 2,
        downvotes: 0,
        priorityScore: 410,
        priority: 'medium',
      })
    })

    it('should report and persist a priority change', async () => {
      const store = new MemoryComplaintStore()
      const { ledger } = await setup(store)
      // 300 + 95 + 300 = 695, one upvote short of high
      const edge = await seedComplaint(store, {
        priorityScore: 695,
        classification: classification({ urgency_score: 95, impact_level: 'campus-wide' }),
      })

      expect(await ledger.vote(edge.id, '21CS050', 'upvote')).toEqual({
        complaint_id: edge.id,
        action: 'created',
        upvotes: 1,
        downvotes: 0,
        net_votes: 1,
        priority_score: 700,
        priority_updated: true,
        old_priority: 'medium',
        new_priority: 'high',
      })
      expect((await store.getComplaint(edge.id))?.priority).toBe('high')

      expect(await ledger.vote(edge.id, '21CS050', 'upvote')).toMatchObject({
        action: 'deleted',
        priority_score: 695,
        priority_updated: true,
        old_priority: 'high',
        new_priority: 'medium',
      })
    })

    it('should count every concurrent voter exactly once', async () => {
      const { ledger, store, complaint } = await setup()
      const voters = Array.from({ length: 25 }, (_, index) => `22ME${String(index).padStart(3, '0')}`)

      await Promise.all(voters.map((voter) => ledger.vote(complaint.id, voter, 'upvote')))

      expect(await ledger.getVoteStats(complaint.id)).toEqual({ upvotes: 25, downvotes: 0, total: 25, net_votes: 25 })
      expect(await store.listVoters(complaint.id)).toHaveLength(25)
      expect((await store.getComplaint(complaint.id))?.priorityScore).toBe(525)
    })

    it('should serialize concurrent toggles by one voter', async () => {
      const { ledger, store, complaint } = await setup()

      const results = await Promise.all([
        ledger.vote(complaint.id, '21CS050', 'upvote'),
        ledger.vote(complaint.id, '21CS050', 'upvote'),
      ])

      expect(results.map((result) => result.action)).toEqual(['created', 'deleted'])
      expect(await ledger.getVoteStats(complaint.id)).toEqual({ upvotes: 0, downvotes: 0, total: 0, net_votes: 0 })
      expect(await store.listVoters(complaint.id)).toEqual([])
    })

    it('should keep at most one vote per voter', async () => {
      const { ledger, store, complaint } = await setup()

      for (const type of ['upvote', 'downvote', 'downvote', 'upvote', 'upvote', 'downvote']) {
        await ledger.vote(complaint.id, '21CS050', type)
      }

      const voters = await store.listVoters(complaint.id)
      expect(voters).toHaveLength(1)
      expect(voters[0].voteType).toBe('downvote')
      expect(await ledger.getVoteStats(complaint.id)).toEqual({ upvotes: 0, downvotes: 1, total: 1, net_votes: -1 })
    })

    it('should reject an unknown vote type before touching the store', async () => {
      const { ledger, store, complaint } = await setup()

      await expect(ledger.vote(complaint.id, '21CS050', 'sideways')).rejects.toMatchObject({
        code: 'INVALID_VOTE_TYPE',
        status: 400,
        message: "vote_type must be 'upvote' or 'downvote'",
      })
      expect(await store.findParticipant('21CS050')).toBeNull()
    })

    it('should fail with NOT_FOUND for an unknown complaint without creating the voter', async () => {
      const { ledger, store } = await setup()

      await expect(ledger.vote('complaint_missing', '21CS050', 'upvote')).rejects.toMatchObject({
        code: 'NOT_FOUND',
        status: 404,
      })
      expect(await store.findParticipant('21CS050')).toBeNull()
    })

    it('should create a placeholder voter without overwriting a real profile', async () => {
      const { ledger, store, complaint } = await setup()

      await ledger.vote(complaint.id, '21CS001', 'upvote')
      await ledger.vote(complaint.id, '23EE007', 'downvote')

      expect(await store.findParticipant('21CS001')).toMatchObject({ name: 'Asha Rao', department: 'CSE' })
      expect(await store.findParticipant('23EE007')).toMatchObject({
        name: 'Student',
        email: '23ee007@campus.test',
        department: 'Unknown',
        stayType: null,
      })
    })

    it('should retry once after a conflict', async () => {
      const store = new ConflictingStore(1)
      const { ledger, complaint } = await setup(store)

      expect(await ledger.vote(complaint.id, '21CS050', 'upvote')).toMatchObject({ action: 'created', upvotes: 1 })
      expect(store.lockCalls).toBe(2)
    })

    it('should give up after a second conflict', async () => {
      const store = new ConflictingStore(2)
      const { ledger, complaint } = await setup(store)

      await expect(ledger.vote(complaint.id, '21CS050', 'upvote')).rejects.toMatchObject({ code: 'CONFLICT' })
      expect(store.lockCalls).toBe(2)
    })
  })

  describe('events', () => {
    it('should publish the committed vote', async () => {
      const { ledger, published, complaint } = await setup()

      await ledger.vote(complaint.id, '21CS050', 'upvote')

      expect(published).toHaveLength(1)
      expect(published[0]).toMatchObject({ eventType: 'vote.changed', complaintId: complaint.id })
      expect(published[0].payload).toEqual({
        upvotes: 1,
        downvotes: 0,
        total_votes: 1,
        action: 'created',
        vote_type: 'upvote',
        priority_updated: false,
      })
    })

    it('should not publish for a rejected vote', async () => {
      const { ledger, published, complaint } = await setup()

      await expect(ledger.vote(complaint.id, '21CS050', 'meh')).rejects.toThrow()
      expect(published).toEqual([])
    })

    it('should not fail the vote when a subscriber throws', async () => {
      const { ledger, events, store, complaint } = await setup()
      events.subscribe(() => {
        throw new Error('socket layer exploded')
      })

      await expect(ledger.vote(complaint.id, '21CS050', 'upvote')).resolves.toMatchObject({ action: 'created' })
      expect((await store.getComplaint(complaint.id))?.upvotes).toBe(1)
    })
  })

  describe('queries', () => {
    it('should split voters by type', async () => {
      const { ledger, complaint } = await setup()
      await ledger.vote(complaint.id, '21CS050', 'upvote')
      await ledger.vote(complaint.id, '21CS051', 'downvote')
      await ledger.vote(complaint.id, '21CS052', 'upvote')

      const { upvoters, downvoters } = await ledger.listVoters(complaint.id)
      expect(upvoters.map((voter) => voter.identifier).sort()).toEqual(['21CS050', '21CS052'])
      expect(downvoters.map((voter) => voter.identifier)).toEqual(['21CS051'])
    })

    it('should return null for someone who never voted', async () => {
      const { ledger, complaint } = await setup()
      expect(await ledger.getVoterVote(complaint.id, '99ZZ999')).toBeNull()
    })

    it('should fail query methods for an unknown complaint', async () => {
      const { ledger } = await setup()
      await expect(ledger.getVoteStats('complaint_missing')).rejects.toMatchObject({ code: 'NOT_FOUND' })
      await expect(ledger.listVoters('complaint_missing')).rejects.toMatchObject({ code: 'NOT_FOUND' })
      await expect(ledger.getVoterVote('complaint_missing', '21CS050')).rejects.toMatchObject({ code: 'NOT_FOUND' })
    })
  })

  describe('recalculatePriority', () => {
    it('should recompute from the stored classification without publishing', async () => {
      const store = new MemoryComplaintStore()
      const { ledger, published } = await setup(store)
      const stale = await seedComplaint(store, {
        priority: 'low',
        priorityScore: 120,
        classification: classification({ priority: 'high', urgency_score: 80, impact_level: 'group' }),
      })

      expect(await ledger.recalculatePriority(stale.id)).toEqual({
        complaint_id: stale.id,
        old_priority: 'low',
        new_priority: 'high',
        priority_score: 930,
        priority_updated: true,
      })
      expect(await store.getComplaint(stale.id)).toMatchObject({ priority: 'high', priorityScore: 930 })
      expect(published).toEqual([])
    })

    it('should report no change when the label holds', async () => {
      const { ledger, complaint } = await setup()
      expect(await ledger.recalculatePriority(complaint.id)).toEqual({
        complaint_id: complaint.id,
        old_priority: 'medium',
        new_priority: 'medium',
        priority_score: 400,
        priority_updated: false,
      })
    })
  })
})
