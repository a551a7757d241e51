import {
  NewRequestAssignment,
  RequestAssignment,
} from '../../../../domain/entities/request-assignment.entity';
import { RequestAssignmentEntity } from '../entities/request-assignment.entity';

export class RequestAssignmentMapper {
  static toDomain(entity: RequestAssignmentEntity): RequestAssignment {
    return {
      id: entity.id,
      requestId: entity.requestId,
      departmentId: entity.departmentId,
      assignedBy: entity.assignedBy,
      expertId: entity.expertId,
      statusId: entity.statusId,
      assignedAt: entity.assignedAt,
      dueDate: entity.dueDate,
      isPrimary: entity.isPrimary,
      remarks: entity.remarks,
      createdAt: entity.createdAt,
    };
  }

  static toPersistence(domain: NewRequestAssignment): RequestAssignmentEntity {
    const entity = new RequestAssignmentEntity();
    entity.requestId = domain.requestId;
    entity.departmentId = domain.departmentId;
    entity.assignedBy = domain.assignedBy;
    entity.expertId = domain.expertId;
    entity.statusId = domain.statusId;
    entity.dueDate = domain.dueDate;
    entity.isPrimary = domain.isPrimary;
    entity.remarks = domain.remarks;
    return entity;
  }
}
