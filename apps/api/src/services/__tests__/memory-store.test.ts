/**
 * @fileoverview Tests for the in-memory complaint store
 *
 * Covers the atomic unit contract every store implements: staged writes
 * commit together or not at all.
 */

import { describe, it, expect, vi } from 'vitest'
import { ConflictError, NotFoundError, PersistenceFailureError, TransientPersistenceError } from '../../lib/errors.js'
import { MemoryComplaintStore } from '../memory-store.js'
import { classification, seedComplaint } from './fixtures.js'

describe('MemoryComplaintStore', () => {
  describe('participants', () => {
    it('should overwrite the profile on upsert', async () => {
      const store = new MemoryComplaintStore()
      const first = await store.upsertParticipant({
        identifier: '21CS001',
        name: 'Asha',
        email: '21cs001@campus.test',
        department: 'CSE',
        stayType: null,
      })
      const second = await store.upsertParticipant({
        identifier: '21CS001',
        name: 'Asha Rao',
        email: '21cs001@campus.test',
        department: 'ECE',
        stayType: 'hostel',
      })

      expect(second.id).toBe(first.id)
      expect(await store.findParticipant('21CS001')).toMatchObject({ name: 'Asha Rao', department: 'ECE' })
    })

    it('should leave an existing profile alone on ensure', async () => {
      const store = new MemoryComplaintStore()
      await store.upsertParticipant({
        identifier: '21CS001',
        name: 'Asha Rao',
        email: '21cs001@campus.test',
        department: 'CSE',
        stayType: 'hostel',
      })

      const ensured = await store.ensureParticipant({
        identifier: '21CS001',
        name: 'Student',
        email: '21cs001@campus.test',
        department: 'Unknown',
        stayType: null,
      })

      expect(ensured).toMatchObject({ name: 'Asha Rao', department: 'CSE', stayType: 'hostel' })
    })
  })

  describe('createComplaint', () => {
    it('should start raised with zero counters and record submission metadata', async () => {
      const store = new MemoryComplaintStore()
      const complaint = await seedComplaint(store)

      expect(complaint).toMatchObject({ status: 'raised', upvotes: 0, downvotes: 0, resolvedAt: null })
      expect(store.submissionMetaFor(complaint.id)).toMatchObject({
        source: 'campus-voice-api',
        userAgent: 'vitest',
        clientAddress: '127.0.0.1',
      })
    })

    it('should reject an unknown submitter', async () => {
      const store = new MemoryComplaintStore()

      await expect(
        store.createComplaint(
          {
            submitterId: 'participant_missing',
            title: 'Broken fan',
            description: 'The fan in room 204 does not turn on.',
            visibility: 'public',
            imageUrl: null,
            priority: 'medium',
            priorityScore: 400,
            category: 'infrastructure',
            assignedAuthority: 'Maintenance Officer',
            authorityEmail: 'maintenance@campus.test',
            authorityDepartment: 'Infrastructure & Maintenance',
            classification: classification({ category: 'infrastructure' }),
          },
          { userAgent: null, clientAddress: null },
        ),
      ).rejects.toBeInstanceOf(NotFoundError)
    })
  })

  describe('listComplaints', () => {
    it('should list newest first and apply filters', async () => {
      let clock = Date.parse('2026-02-01T08:00:00.000Z')
      const store = new MemoryComplaintStore({ now: () => new Date((clock += 1_000)) })
      const older = await seedComplaint(store, { title: 'Older complaint' })
      const newer = await seedComplaint(store, { title: 'Newer complaint', category: 'hostel' })
      const hidden = await seedComplaint(store, { title: 'Private complaint', visibility: 'private' })

      const all = await store.listComplaints({ limit: 10, offset: 0 })
      expect(all.map((complaint) => complaint.id)).toEqual([hidden.id, newer.id, older.id])

      const publicOnly = await store.listComplaints({ visibility: 'public', limit: 10, offset: 0 })
      expect(publicOnly.map((complaint) => complaint.id)).toEqual([newer.id, older.id])

      const hostel = await store.listComplaints({ category: 'hostel', limit: 10, offset: 0 })
      expect(hostel.map((complaint) => complaint.id)).toEqual([newer.id])

      const page = await store.listComplaints({ limit: 1, offset: 1 })
      expect(page.map((complaint) => complaint.id)).toEqual([newer.id])
    })

    it('should return nothing for an unknown submitter', async () => {
      const store = new MemoryComplaintStore()
      await seedComplaint(store)

      expect(await store.listComplaints({ submitterIdentifier: '99XX999', limit: 10, offset: 0 })).toEqual([])
      expect(await store.listComplaints({ submitterIdentifier: '21CS001', limit: 10, offset: 0 })).toHaveLength(1)
    })
  })

  describe('withComplaintLock', () => {
    it('should commit votes, counters and status changes together', async () => {
      const store = new MemoryComplaintStore()
      const complaint = await seedComplaint(store)
      const voter = await store.ensureParticipant({
        identifier: '21CS050',
        name: 'Student',
        email: '21cs050@campus.test',
        department: 'Unknown',
        stayType: null,
      })

      await store.withComplaintLock(complaint.id, async (tx) => {
        await tx.insertVote(voter.id, 'upvote')
        await tx.updateComplaint({ upvotes: 1 })
        await tx.appendStatusChange({ oldStatus: 'raised', newStatus: 'opened', actor: 'warden', reason: null })
      })

      expect((await store.getVote(complaint.id, voter.id))?.voteType).toBe('upvote')
      expect((await store.getComplaint(complaint.id))?.upvotes).toBe(1)
      expect(await store.listStatusChanges(complaint.id)).toHaveLength(1)
    })

    it('should discard every staged write when the unit throws', async () => {
      const store = new MemoryComplaintStore()
      const complaint = await seedComplaint(store)
      const voter = await store.ensureParticipant({
        identifier: '21CS050',
        name: 'Student',
        email: '21cs050@campus.test',
        department: 'Unknown',
        stayType: null,
      })

      await expect(
        store.withComplaintLock(complaint.id, async (tx) => {
          await tx.insertVote(voter.id, 'upvote')
          await tx.updateComplaint({ upvotes: 1 })
          throw new Error('crash between writes')
        }),
      ).rejects.toThrow('crash between writes')

      expect(await store.getVote(complaint.id, voter.id)).toBeNull()
      expect((await store.getComplaint(complaint.id))?.upvotes).toBe(0)
    })

    it('should see its own staged writes', async () => {
      const store = new MemoryComplaintStore()
      const complaint = await seedComplaint(store)
      const voter = await store.ensureParticipant({
        identifier: '21CS050',
        name: 'Student',
        email: '21cs050@campus.test',
        department: 'Unknown',
        stayType: null,
      })

      await store.withComplaintLock(complaint.id, async (tx) => {
        const vote = await tx.insertVote(voter.id, 'upvote')
        expect(await tx.findVote(voter.id)).toEqual(vote)
        await expect(tx.insertVote(voter.id, 'downvote')).rejects.toBeInstanceOf(ConflictError)
        await tx.deleteVote(vote.id)
        expect(await tx.findVote(voter.id)).toBeNull()
      })

      expect(await store.getVote(complaint.id, voter.id)).toBeNull()
    })

    it('should retry a unit that hits a transient error', async () => {
      const store = new MemoryComplaintStore({ retry: { attempts: 3, baseDelayMs: 0 } })
      const complaint = await seedComplaint(store)
      let calls = 0
      const work = vi.fn(async () => {
        calls += 1
        if (calls === 1) throw new TransientPersistenceError('deadlock detected')
        return 'done'
      })

      await expect(store.withComplaintLock(complaint.id, work)).resolves.toBe('done')
      expect(work).toHaveBeenCalledTimes(2)
    })

    it('should give up after the configured attempts', async () => {
      const store = new MemoryComplaintStore({ retry: { attempts: 2, baseDelayMs: 0 } })
      const complaint = await seedComplaint(store)

      await expect(
        store.withComplaintLock(complaint.id, async () => {
          throw new TransientPersistenceError('connection terminated')
        }),
      ).rejects.toBeInstanceOf(PersistenceFailureError)
    })

    it('should fail with NOT_FOUND for an unknown complaint', async () => {
      const store = new MemoryComplaintStore()
      await expect(store.withComplaintLock('complaint_missing', async () => 'never')).rejects.toMatchObject({
        code: 'NOT_FOUND',
        status: 404,
      })
    })
  })

  describe('getOverallStats', () => {
    it('should count totals and breakdowns', async () => {
      const store = new MemoryComplaintStore()
      await seedComplaint(store)
      await seedComplaint(store, { category: 'transport', priority: 'high' })

      const stats = await store.getOverallStats()
      expect(stats.totalParticipants).toBe(1)
      expect(stats.totalComplaints).toBe(2)
      expect(stats.totalVotes).toBe(0)
      expect(stats.complaintsByStatus).toEqual({ raised: 2, opened: 0, reviewed: 0, closed: 0 })
      expect(stats.complaintsByPriority).toEqual({ low: 0, medium: 1, high: 1, critical: 0 })
      expect(stats.complaintsByCategory).toEqual({
        food: 1,
        infrastructure: 0,
        academic: 0,
        hostel: 0,
        transport: 1,
        other: 0,
      })
    })
  })
})
