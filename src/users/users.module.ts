import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { UserEntity } from './infrastructure/persistence/relational/entities/user.entity';
import { UserDirectoryPort } from './domain/ports/user-directory.port';
import { UserDirectoryRelationalRepository } from './infrastructure/persistence/relational/repositories/user-directory.repository';

@Module({
  imports: [TypeOrmModule.forFeature([UserEntity])],
  providers: [
    {
      provide: UserDirectoryPort,
      useClass: UserDirectoryRelationalRepository,
    },
  ],
  exports: [UserDirectoryPort],
})
export class UsersModule {}
