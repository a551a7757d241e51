import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DepartmentEntity } from './infrastructure/persistence/relational/entities/department.entity';
import { DepartmentRegistryPort } from './domain/ports/department-registry.port';
import { DepartmentRegistryRelationalRepository } from './infrastructure/persistence/relational/repositories/department-registry.repository';

@Module({
  imports: [TypeOrmModule.forFeature([DepartmentEntity])],
  providers: [
    {
      provide: DepartmentRegistryPort,
      useClass: DepartmentRegistryRelationalRepository,
    },
  ],
  exports: [DepartmentRegistryPort],
})
export class DepartmentsModule {}
