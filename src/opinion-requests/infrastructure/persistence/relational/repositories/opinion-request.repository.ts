import {
  Between,
  EntityManager,
  FindOneOptions,
  FindOperator,
  FindOptionsWhere,
  LessThanOrEqual,
  MoreThanOrEqual,
  Repository,
} from 'typeorm';
import {
  NewOpinionRequest,
  OpinionRequest,
  OpinionRequestChanges,
} from '../../../../domain/entities/opinion-request.entity';
import {
  OpinionRequestFilters,
  OpinionRequestRepository,
  StatisticsRow,
} from '../../../../domain/repositories/opinion-request.repository.port';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { OpinionRequestEntity } from '../entities/opinion-request.entity';
import { OpinionRequestMapper } from '../mappers/opinion-request.mapper';

function createdWithin(
  from?: Date,
  to?: Date,
): FindOperator<Date> | undefined {
  if (from && to) return Between(from, to);
  if (from) return MoreThanOrEqual(from);
  if (to) return LessThanOrEqual(to);
  return undefined;
}

export class OpinionRequestRelationalRepository
  implements OpinionRequestRepository
{
  private readonly repository: Repository<OpinionRequestEntity>;

  constructor(private readonly manager: EntityManager) {
    this.repository = manager.getRepository(OpinionRequestEntity);
  }

  async findActiveById(
    id: number,
    options: { lock?: boolean } = {},
  ): Promise<NullableType<OpinionRequest>> {
    const lock: FindOneOptions<OpinionRequestEntity>['lock'] = options.lock
      ? { mode: 'pessimistic_write' }
      : undefined;
    const entity = await this.repository.findOne({
      where: { id, isDeleted: false },
      lock,
    });

    return entity ? OpinionRequestMapper.toDomain(entity) : null;
  }

  async existsByReferenceNumber(referenceNumber: string): Promise<boolean> {
    const count = await this.repository.count({ where: { referenceNumber } });
    return count > 0;
  }

  async create(data: NewOpinionRequest): Promise<OpinionRequest> {
    const saved = await this.repository.save(
      OpinionRequestMapper.toPersistence(data),
    );
    return OpinionRequestMapper.toDomain(saved);
  }

  async updateIfVersion(
    id: number,
    expectedVersion: number,
    changes: OpinionRequestChanges,
  ): Promise<NullableType<OpinionRequest>> {
    const result = await this.manager
      .createQueryBuilder()
      .update(OpinionRequestEntity)
      .set({
        ...changes,
        version: expectedVersion + 1,
        updatedAt: new Date(),
      })
      .where('id = :id', { id })
      .andWhere('version = :version', { version: expectedVersion })
      .execute();

    if (!result.affected) {
      return null;
    }

    const entity = await this.repository.findOne({ where: { id } });
    return entity ? OpinionRequestMapper.toDomain(entity) : null;
  }

  async findMany(
    filters: OpinionRequestFilters,
    pagination: { skip: number; limit: number },
  ): Promise<{ data: OpinionRequest[]; total: number }> {
    const where: FindOptionsWhere<OpinionRequestEntity> = { isDeleted: false };
    if (filters.statusId !== undefined) where.currentStatusId = filters.statusId;
    if (filters.departmentId !== undefined)
      where.departmentId = filters.departmentId;
    if (filters.categoryId !== undefined) where.categoryId = filters.categoryId;
    if (filters.subcategoryId !== undefined)
      where.subcategoryId = filters.subcategoryId;
    if (filters.priority !== undefined) where.priority = filters.priority;
    const created = createdWithin(filters.createdFrom, filters.createdTo);
    if (created) where.createdAt = created;

    const [entities, total] = await this.repository.findAndCount({
      where,
      order: { createdAt: 'DESC', id: 'DESC' },
      skip: pagination.skip,
      take: pagination.limit,
    });

    return {
      data: entities.map((entity) => OpinionRequestMapper.toDomain(entity)),
      total,
    };
  }

  async findStatisticsRows(
    departmentId: number,
    window: { from?: Date; to?: Date },
  ): Promise<StatisticsRow[]> {
    const where: FindOptionsWhere<OpinionRequestEntity> = {
      departmentId,
      isDeleted: false,
    };
    const created = createdWithin(window.from, window.to);
    if (created) where.createdAt = created;

    const entities = await this.repository.find({
      where,
      select: {
        id: true,
        currentStatusId: true,
        createdAt: true,
        updatedAt: true,
      },
    });

    return entities.map((entity) => ({
      currentStatusId: entity.currentStatusId,
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    }));
  }
}
