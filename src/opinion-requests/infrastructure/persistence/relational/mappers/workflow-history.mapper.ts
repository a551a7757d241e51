import {
  NewWorkflowHistory,
  WorkflowHistory,
} from '../../../../domain/entities/workflow-history.entity';
import { WorkflowHistoryEntity } from '../entities/workflow-history.entity';

export class WorkflowHistoryMapper {
  static toDomain(entity: WorkflowHistoryEntity): WorkflowHistory {
    return {
      id: entity.id,
      requestId: entity.requestId,
      actionType: entity.actionType,
      actionBy: entity.actionBy,
      fromStatusId: entity.fromStatusId,
      toStatusId: entity.toStatusId,
      actionDetails: entity.actionDetails ?? {},
      createdAt: entity.createdAt,
    };
  }

  static toPersistence(domain: NewWorkflowHistory): WorkflowHistoryEntity {
    const entity = new WorkflowHistoryEntity();
    entity.requestId = domain.requestId;
    entity.actionType = domain.actionType;
    entity.actionBy = domain.actionBy;
    entity.fromStatusId = domain.fromStatusId;
    entity.toStatusId = domain.toStatusId;
    entity.actionDetails = domain.actionDetails;
    return entity;
  }
}
