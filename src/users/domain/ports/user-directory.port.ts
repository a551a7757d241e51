import { NullableType } from '../../../utils/types/nullable.type';
import { DirectoryUser } from '../entities/directory-user.entity';

export abstract class UserDirectoryPort {
  abstract findById(id: number): Promise<NullableType<DirectoryUser>>;
}
