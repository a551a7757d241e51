import { EntityManager, Repository } from 'typeorm';
import {
  NewWorkflowHistory,
  WorkflowHistory,
} from '../../../../domain/entities/workflow-history.entity';
import { WorkflowHistoryRepository } from '../../../../domain/repositories/workflow-history.repository.port';
import { WorkflowHistoryEntity } from '../entities/workflow-history.entity';
import { WorkflowHistoryMapper } from '../mappers/workflow-history.mapper';

export class WorkflowHistoryRelationalRepository
  implements WorkflowHistoryRepository
{
  private readonly repository: Repository<WorkflowHistoryEntity>;

  constructor(manager: EntityManager) {
    this.repository = manager.getRepository(WorkflowHistoryEntity);
  }

  async append(entry: NewWorkflowHistory): Promise<WorkflowHistory> {
    const saved = await this.repository.save(
      WorkflowHistoryMapper.toPersistence(entry),
    );
    return WorkflowHistoryMapper.toDomain(saved);
  }

  async findByRequestId(requestId: number): Promise<WorkflowHistory[]> {
    const entities = await this.repository.find({
      where: { requestId },
      order: { createdAt: 'ASC', id: 'ASC' },
    });
    return entities.map((entity) => WorkflowHistoryMapper.toDomain(entity));
  }
}
