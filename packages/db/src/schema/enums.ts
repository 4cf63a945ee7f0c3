import { pgEnum } from "drizzle-orm/pg-core";
import {
  complaintCategoryValues,
  complaintPriorityValues,
  complaintStatusValues,
  complaintVisibilityValues,
  voteTypeValues,
} from "@campus-voice/schema";

/**
 * Central enum registry.
 *
 * Value lists come from @campus-voice/schema so the wire contract and the
 * database cannot drift apart. Add values there first; never rename one in
 * place.
 */

/** Complaint lifecycle. Transitions are unrestricted but always audited. */
export const complaintStatusEnum = pgEnum("complaint_status", complaintStatusValues);

/** Coarse priority label derived from the numeric priority score. */
export const complaintPriorityEnum = pgEnum("complaint_priority", complaintPriorityValues);

export const complaintVisibilityEnum = pgEnum("complaint_visibility", complaintVisibilityValues);

/** Routing category detected by the classifier. */
export const complaintCategoryEnum = pgEnum("complaint_category", complaintCategoryValues);

export const voteTypeEnum = pgEnum("vote_type", voteTypeValues);
