import {
  NewOpinionRequest,
  OpinionRequest,
} from '../../../../domain/entities/opinion-request.entity';
import { OpinionRequestEntity } from '../entities/opinion-request.entity';

export class OpinionRequestMapper {
  static toDomain(entity: OpinionRequestEntity): OpinionRequest {
    return {
      id: entity.id,
      referenceNumber: entity.referenceNumber,
      title: entity.title,
      description: entity.description,
      requesterId: entity.requesterId,
      departmentId: entity.departmentId,
      categoryId: entity.categoryId,
      subcategoryId: entity.subcategoryId,
      priority: entity.priority,
      currentStatusId: entity.currentStatusId,
      dueDate: entity.dueDate,
      version: entity.version,
      requestStatement: entity.requestStatement,
      challengesOpportunities: entity.challengesOpportunities,
      subjectContent: entity.subjectContent,
      alternatives: entity.alternatives,
      expectedImpact: entity.expectedImpact,
      potentialRisks: entity.potentialRisks,
      studiesStatistics: entity.studiesStatistics,
      legalFinancialOpinions: entity.legalFinancialOpinions,
      stakeholderFeedback: entity.stakeholderFeedback,
      workPlan: entity.workPlan,
      decisionDraft: entity.decisionDraft,
      isDeleted: entity.isDeleted,
      deletedBy: entity.deletedBy,
      deletedAt: entity.deletedAt,
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    };
  }

  static toPersistence(domain: NewOpinionRequest): OpinionRequestEntity {
    const entity = new OpinionRequestEntity();
    entity.referenceNumber = domain.referenceNumber;
    entity.title = domain.title;
    entity.description = domain.description;
    entity.requesterId = domain.requesterId;
    entity.departmentId = domain.departmentId;
    entity.categoryId = domain.categoryId;
    entity.subcategoryId = domain.subcategoryId;
    entity.priority = domain.priority;
    entity.currentStatusId = domain.currentStatusId;
    entity.dueDate = domain.dueDate;
    entity.version = domain.version;
    entity.requestStatement = domain.requestStatement;
    entity.challengesOpportunities = domain.challengesOpportunities;
    entity.subjectContent = domain.subjectContent;
    entity.alternatives = domain.alternatives;
    entity.expectedImpact = domain.expectedImpact;
    entity.potentialRisks = domain.potentialRisks;
    entity.studiesStatistics = domain.studiesStatistics;
    entity.legalFinancialOpinions = domain.legalFinancialOpinions;
    entity.stakeholderFeedback = domain.stakeholderFeedback;
    entity.workPlan = domain.workPlan;
    entity.decisionDraft = domain.decisionDraft;
    entity.isDeleted = domain.isDeleted;
    entity.deletedBy = domain.deletedBy;
    entity.deletedAt = domain.deletedAt;
    return entity;
  }
}
