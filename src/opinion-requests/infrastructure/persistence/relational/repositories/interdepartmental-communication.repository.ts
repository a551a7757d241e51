import { EntityManager, Repository } from 'typeorm';
import {
  InterdepartmentalCommunication,
  NewInterdepartmentalCommunication,
} from '../../../../domain/entities/interdepartmental-communication.entity';
import { InterdepartmentalCommunicationRepository } from '../../../../domain/repositories/interdepartmental-communication.repository.port';
import { InterdepartmentalCommunicationEntity } from '../entities/interdepartmental-communication.entity';
import { InterdepartmentalCommunicationMapper } from '../mappers/interdepartmental-communication.mapper';

export class InterdepartmentalCommunicationRelationalRepository
  implements InterdepartmentalCommunicationRepository
{
  private readonly repository: Repository<InterdepartmentalCommunicationEntity>;

  constructor(manager: EntityManager) {
    this.repository = manager.getRepository(
      InterdepartmentalCommunicationEntity,
    );
  }

  async create(
    data: NewInterdepartmentalCommunication,
  ): Promise<InterdepartmentalCommunication> {
    const saved = await this.repository.save(
      InterdepartmentalCommunicationMapper.toPersistence(data),
    );
    return InterdepartmentalCommunicationMapper.toDomain(saved);
  }

  async findByRequestId(
    requestId: number,
  ): Promise<InterdepartmentalCommunication[]> {
    const entities = await this.repository.find({
      where: { requestId },
      order: { id: 'ASC' },
    });
    return entities.map((entity) =>
      InterdepartmentalCommunicationMapper.toDomain(entity),
    );
  }
}
