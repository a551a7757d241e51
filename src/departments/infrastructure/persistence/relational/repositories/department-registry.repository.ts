import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { DepartmentEntity } from '../entities/department.entity';
import { DepartmentRegistryPort } from '../../../../domain/ports/department-registry.port';
import { Department } from '../../../../domain/entities/department.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';

@Injectable()
export class DepartmentRegistryRelationalRepository
  implements DepartmentRegistryPort
{
  constructor(
    @InjectRepository(DepartmentEntity)
    private readonly repository: Repository<DepartmentEntity>,
  ) {}

  async exists(id: number): Promise<boolean> {
    const count = await this.repository.count({ where: { id } });
    return count > 0;
  }

  async findById(id: number): Promise<NullableType<Department>> {
    const entity = await this.repository.findOne({ where: { id } });
    return entity ? this.toDomain(entity) : null;
  }

  private toDomain(entity: DepartmentEntity): Department {
    return {
      id: entity.id,
      name: entity.name,
      code: entity.code,
    };
  }
}
