import { EntityManager } from 'typeorm';
import {
  Category,
  Subcategory,
} from '../../../../domain/entities/category.entity';
import { WorkflowStatus } from '../../../../domain/entities/workflow-status.entity';
import { CategoryRepository } from '../../../../domain/repositories/category.repository.port';
import { WorkflowStatusRepository } from '../../../../domain/repositories/workflow-status.repository.port';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { CategoryEntity, SubcategoryEntity } from '../entities/category.entity';
import { WorkflowStatusEntity } from '../entities/workflow-status.entity';

export class WorkflowStatusRelationalRepository
  implements WorkflowStatusRepository
{
  constructor(private readonly manager: EntityManager) {}

  async findAll(): Promise<WorkflowStatus[]> {
    const entities = await this.manager.find(WorkflowStatusEntity, {
      order: { id: 'ASC' },
    });
    return entities.map((entity) => ({
      id: entity.id,
      name: entity.name,
      description: entity.description,
    }));
  }
}

export class CategoryRelationalRepository implements CategoryRepository {
  constructor(private readonly manager: EntityManager) {}

  async findCategoryById(id: number): Promise<NullableType<Category>> {
    const entity = await this.manager.findOne(CategoryEntity, {
      where: { id },
    });
    return entity ? { id: entity.id, name: entity.name } : null;
  }

  async findSubcategoryById(id: number): Promise<NullableType<Subcategory>> {
    const entity = await this.manager.findOne(SubcategoryEntity, {
      where: { id },
    });
    return entity
      ? { id: entity.id, categoryId: entity.categoryId, name: entity.name }
      : null;
  }
}
