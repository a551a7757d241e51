import {
  InterdepartmentalCommunication,
  NewInterdepartmentalCommunication,
} from '../../../../domain/entities/interdepartmental-communication.entity';
import { InterdepartmentalCommunicationEntity } from '../entities/interdepartmental-communication.entity';

export class InterdepartmentalCommunicationMapper {
  static toDomain(
    entity: InterdepartmentalCommunicationEntity,
  ): InterdepartmentalCommunication {
    return {
      id: entity.id,
      requestId: entity.requestId,
      fromDepartmentId: entity.fromDepartmentId,
      toDepartmentId: entity.toDepartmentId,
      fromUserId: entity.fromUserId,
      toUserId: entity.toUserId,
      subject: entity.subject,
      content: entity.content,
      priority: entity.priority,
      status: entity.status,
      requiresResponse: entity.requiresResponse,
      dueDate: entity.dueDate,
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    };
  }

  static toPersistence(
    domain: NewInterdepartmentalCommunication,
  ): InterdepartmentalCommunicationEntity {
    const entity = new InterdepartmentalCommunicationEntity();
    entity.requestId = domain.requestId;
    entity.fromDepartmentId = domain.fromDepartmentId;
    entity.toDepartmentId = domain.toDepartmentId;
    entity.fromUserId = domain.fromUserId;
    entity.toUserId = domain.toUserId;
    entity.subject = domain.subject;
    entity.content = domain.content;
    entity.priority = domain.priority;
    entity.status = domain.status;
    entity.requiresResponse = domain.requiresResponse;
    entity.dueDate = domain.dueDate;
    return entity;
  }
}
