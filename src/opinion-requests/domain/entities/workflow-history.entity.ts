import { WorkflowActionType } from '../enums/workflow-action-type.enum';

export type ActionDetailScalar = string | number | boolean | null;

/**
 * Open key/value payload attached to a history row.
 */
export type ActionDetails = Record<
  string,
  ActionDetailScalar | ActionDetailScalar[]
>;

/**
 * Append-only audit row. Never updated or deleted.
 */
export interface WorkflowHistory {
  id: number;
  requestId: number;
  actionType: WorkflowActionType;
  actionBy: number;
  fromStatusId: number | null;
  toStatusId: number;
  actionDetails: ActionDetails;
  createdAt: Date;
}

export type NewWorkflowHistory = Omit<WorkflowHistory, 'id' | 'createdAt'>;
