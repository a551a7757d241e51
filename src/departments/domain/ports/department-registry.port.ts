import { NullableType } from '../../../utils/types/nullable.type';
import { Department } from '../entities/department.entity';

/**
 * Read-only view of the department registry.
 *
 * Department management itself lives outside this service.
 */
export abstract class DepartmentRegistryPort {
  abstract exists(id: number): Promise<boolean>;

  abstract findById(id: number): Promise<NullableType<Department>>;
}
