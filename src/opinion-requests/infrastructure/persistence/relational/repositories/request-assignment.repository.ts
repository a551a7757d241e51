import { EntityManager, Repository } from 'typeorm';
import {
  NewRequestAssignment,
  RequestAssignment,
  RequestAssignmentChanges,
} from '../../../../domain/entities/request-assignment.entity';
import { RequestAssignmentRepository } from '../../../../domain/repositories/request-assignment.repository.port';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { RequestAssignmentEntity } from '../entities/request-assignment.entity';
import { RequestAssignmentMapper } from '../mappers/request-assignment.mapper';

export class RequestAssignmentRelationalRepository
  implements RequestAssignmentRepository
{
  private readonly repository: Repository<RequestAssignmentEntity>;

  constructor(manager: EntityManager) {
    this.repository = manager.getRepository(RequestAssignmentEntity);
  }

  async findById(id: number): Promise<NullableType<RequestAssignment>> {
    const entity = await this.repository.findOne({ where: { id } });
    return entity ? RequestAssignmentMapper.toDomain(entity) : null;
  }

  async findByRequestId(requestId: number): Promise<RequestAssignment[]> {
    const entities = await this.repository.find({
      where: { requestId },
      order: { id: 'ASC' },
    });
    return entities.map((entity) => RequestAssignmentMapper.toDomain(entity));
  }

  async demotePrimary(requestId: number): Promise<void> {
    await this.repository.update(
      { requestId, isPrimary: true },
      { isPrimary: false },
    );
  }

  async create(data: NewRequestAssignment): Promise<RequestAssignment> {
    const saved = await this.repository.save(
      RequestAssignmentMapper.toPersistence(data),
    );
    return RequestAssignmentMapper.toDomain(saved);
  }

  async update(
    id: number,
    changes: RequestAssignmentChanges,
  ): Promise<RequestAssignment> {
    if (Object.keys(changes).length > 0) {
      await this.repository.update(id, changes);
    }
    const entity = await this.repository.findOneOrFail({ where: { id } });
    return RequestAssignmentMapper.toDomain(entity);
  }
}
