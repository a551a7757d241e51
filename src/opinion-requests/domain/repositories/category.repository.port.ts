import { NullableType } from '../../../utils/types/nullable.type';
import { Category, Subcategory } from '../entities/category.entity';

export abstract class CategoryRepository {
  abstract findCategoryById(id: number): Promise<NullableType<Category>>;

  abstract findSubcategoryById(id: number): Promise<NullableType<Subcategory>>;
}
