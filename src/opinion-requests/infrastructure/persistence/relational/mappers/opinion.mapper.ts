import {
  NewOpinion,
  Opinion,
} from '../../../../domain/entities/opinion.entity';
import { OpinionEntity } from '../entities/opinion.entity';

export class OpinionMapper {
  static toDomain(entity: OpinionEntity): Opinion {
    return {
      id: entity.id,
      requestId: entity.requestId,
      departmentId: entity.departmentId,
      expertId: entity.expertId,
      content: entity.content,
      recommendation: entity.recommendation,
      status: entity.status,
      reviewComments: entity.reviewComments,
      reviewedBy: entity.reviewedBy,
      reviewedAt: entity.reviewedAt,
      submittedAt: entity.submittedAt,
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    };
  }

  static toPersistence(domain: NewOpinion): OpinionEntity {
    const entity = new OpinionEntity();
    entity.requestId = domain.requestId;
    entity.departmentId = domain.departmentId;
    entity.expertId = domain.expertId;
    entity.content = domain.content;
    entity.recommendation = domain.recommendation;
    entity.status = domain.status;
    entity.reviewComments = null;
    entity.reviewedBy = null;
    entity.reviewedAt = null;
    entity.submittedAt = null;
    return entity;
  }
}
