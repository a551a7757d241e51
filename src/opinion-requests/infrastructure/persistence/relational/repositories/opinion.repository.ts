import { EntityManager, Repository } from 'typeorm';
import {
  NewOpinion,
  Opinion,
  OpinionChanges,
} from '../../../../domain/entities/opinion.entity';
import { OpinionRepository } from '../../../../domain/repositories/opinion.repository.port';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { OpinionEntity } from '../entities/opinion.entity';
import { OpinionMapper } from '../mappers/opinion.mapper';

export class OpinionRelationalRepository implements OpinionRepository {
  private readonly repository: Repository<OpinionEntity>;

  constructor(manager: EntityManager) {
    this.repository = manager.getRepository(OpinionEntity);
  }

  async findById(id: number): Promise<NullableType<Opinion>> {
    const entity = await this.repository.findOne({ where: { id } });
    return entity ? OpinionMapper.toDomain(entity) : null;
  }

  async findByRequestId(requestId: number): Promise<Opinion[]> {
    const entities = await this.repository.find({
      where: { requestId },
      order: { id: 'ASC' },
    });
    return entities.map((entity) => OpinionMapper.toDomain(entity));
  }

  async create(data: NewOpinion): Promise<Opinion> {
    const saved = await this.repository.save(OpinionMapper.toPersistence(data));
    return OpinionMapper.toDomain(saved);
  }

  async update(id: number, changes: OpinionChanges): Promise<Opinion> {
    if (Object.keys(changes).length > 0) {
      await this.repository.update(id, changes);
    }
    const entity = await this.repository.findOneOrFail({ where: { id } });
    return OpinionMapper.toDomain(entity);
  }
}
