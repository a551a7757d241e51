import { Injectable } from '@nestjs/common';
import {
  ActionDetails,
  WorkflowHistory,
} from '../entities/workflow-history.entity';
import { WorkflowActionType } from '../enums/workflow-action-type.enum';
import { WorkflowRepositories } from '../repositories/workflow-unit-of-work.port';

export interface HistoryEntryInput {
  requestId: number;
  actionType: WorkflowActionType;
  actorId: number;
  fromStatusId: number | null;
  toStatusId: number;
  details?: ActionDetails;
}

/**
 * Writes one immutable history row through the caller's transaction.
 *
 * Failures propagate so the enclosing transaction rolls back: an action
 * that cannot be recorded did not happen.
 */
@Injectable()
export class WorkflowHistoryRecorder {
  record(
    repositories: WorkflowRepositories,
    entry: HistoryEntryInput,
  ): Promise<WorkflowHistory> {
    return repositories.history.append({
      requestId: entry.requestId,
      actionType: entry.actionType,
      actionBy: entry.actorId,
      fromStatusId: entry.fromStatusId,
      toStatusId: entry.toStatusId,
      actionDetails: entry.details ?? {},
    });
  }
}
