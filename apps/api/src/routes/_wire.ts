import type { Complaint, StatusChange } from '@campus-voice/db'
import type { OverallStats, VoterRecord } from '../services/complaint-store.js'

// Row -> JSON shapes. The API speaks snake_case.

export function complaintToWire(complaint: Complaint) {
  return {
    complaint_id: complaint.id,
    title: complaint.title,
    description: complaint.description,
    visibility: complaint.visibility,
    image_url: complaint.imageUrl,
    status: complaint.status,
    priority: complaint.priority,
    priority_score: complaint.priorityScore,
    category: complaint.category,
    assigned_authority: complaint.assignedAuthority,
    authority_email: complaint.authorityEmail,
    authority_department: complaint.authorityDepartment,
    upvotes: complaint.upvotes,
    downvotes: complaint.downvotes,
    net_votes: complaint.upvotes - complaint.downvotes,
    classification: complaint.classification,
    submitted_at: complaint.submittedAt.toISOString(),
    updated_at: complaint.updatedAt.toISOString(),
    resolved_at: complaint.resolvedAt ? complaint.resolvedAt.toISOString() : null,
  }
}

export function statusChangeToWire(change: StatusChange) {
  return {
    old_status: change.oldStatus,
    new_status: change.newStatus,
    actor: change.actor,
    reason: change.reason,
    changed_at: change.createdAt.toISOString(),
  }
}

export function voterToWire(voter: VoterRecord) {
  return {
    identifier: voter.identifier,
    name: voter.name,
    voted_at: voter.votedAt.toISOString(),
  }
}

export function statsToWire(stats: OverallStats) {
  return {
    total_participants: stats.totalParticipants,
    total_complaints: stats.totalComplaints,
    total_votes: stats.totalVotes,
    complaints_by_status: stats.complaintsByStatus,
    complaints_by_priority: stats.complaintsByPriority,
    complaints_by_category: stats.complaintsByCategory,
  }
}
