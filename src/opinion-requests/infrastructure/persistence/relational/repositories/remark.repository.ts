import { EntityManager, Repository } from 'typeorm';
import {
  NewRemark,
  Remark,
} from '../../../../domain/entities/remark.entity';
import { RemarkRepository } from '../../../../domain/repositories/remark.repository.port';
import { RemarkEntity } from '../entities/remark.entity';

export class RemarkRelationalRepository implements RemarkRepository {
  private readonly repository: Repository<RemarkEntity>;

  constructor(manager: EntityManager) {
    this.repository = manager.getRepository(RemarkEntity);
  }

  async create(data: NewRemark): Promise<Remark> {
    const saved = await this.repository.save(
      this.repository.create({
        requestId: data.requestId,
        userId: data.userId,
        content: data.content,
      }),
    );
    return this.toDomain(saved);
  }

  async findByRequestId(requestId: number): Promise<Remark[]> {
    const entities = await this.repository.find({
      where: { requestId },
      order: { id: 'ASC' },
    });
    return entities.map((entity) => this.toDomain(entity));
  }

  private toDomain(entity: RemarkEntity): Remark {
    return {
      id: entity.id,
      requestId: entity.requestId,
      userId: entity.userId,
      content: entity.content,
      createdAt: entity.createdAt,
    };
  }
}
