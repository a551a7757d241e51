import {
  NewWorkflowHistory,
  WorkflowHistory,
} from '../entities/workflow-history.entity';

/**
 * Append-only: no update or delete.
 */
export abstract class WorkflowHistoryRepository {
  abstract append(entry: NewWorkflowHistory): Promise<WorkflowHistory>;

  /**
   * Creation order.
   */
  abstract findByRequestId(requestId: number): Promise<WorkflowHistory[]>;
}
