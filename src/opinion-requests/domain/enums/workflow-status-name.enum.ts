/**
 * Names of the seeded workflow statuses.
 *
 * Rows are created by migration; ids are resolved at run time through the
 * status registry.
 */
export enum WorkflowStatusName {
  UNASSIGNED = 'unassigned',
  ASSIGNED_TO_DEPARTMENT = 'assigned_to_department',
  ASSIGNED_TO_EXPERT = 'assigned_to_expert',
  IN_REVIEW = 'in_review',
  ADDITIONAL_INFO_REQUESTED = 'additional_info_requested',
  PENDING_OTHER_DEPARTMENT = 'pending_other_department',
  EXPERT_OPINION_SUBMITTED = 'expert_opinion_submitted',
  HEAD_REVIEW_PENDING = 'head_review_pending',
  HEAD_APPROVED = 'head_approved',
  COMPLETED = 'completed',
  REJECTED = 'rejected',
}

const STATUS_NAMES: ReadonlySet<string> = new Set(
  Object.values(WorkflowStatusName),
);

export function isWorkflowStatusName(
  value: string,
): value is WorkflowStatusName {
  return STATUS_NAMES.has(value);
}
