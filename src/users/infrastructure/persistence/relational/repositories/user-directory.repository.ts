import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { UserEntity } from '../entities/user.entity';
import { UserDirectoryPort } from '../../../../domain/ports/user-directory.port';
import { DirectoryUser } from '../../../../domain/entities/directory-user.entity';
import { NullableType } from '../../../../../utils/types/nullable.type';

@Injectable()
export class UserDirectoryRelationalRepository implements UserDirectoryPort {
  constructor(
    @InjectRepository(UserEntity)
    private readonly repository: Repository<UserEntity>,
  ) {}

  async findById(id: number): Promise<NullableType<DirectoryUser>> {
    const entity = await this.repository.findOne({
      where: { id },
      select: ['id', 'isActive', 'departmentId'],
    });

    return entity
      ? {
          id: entity.id,
          isActive: entity.isActive,
          departmentId: entity.departmentId,
        }
      : null;
  }
}
