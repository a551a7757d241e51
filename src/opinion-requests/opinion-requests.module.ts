import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AuditModule } from '../audit/audit.module';
import { DepartmentsModule } from '../departments/departments.module';
import { FilesModule } from '../files/files.module';
import { UsersModule } from '../users/users.module';
import { WorkflowUnitOfWork } from './domain/repositories/workflow-unit-of-work.port';
import { InterdepartmentalNotifier } from './domain/services/interdepartmental-notifier.domain.service';
import { OpinionDomainService } from './domain/services/opinion.domain.service';
import { OpinionRequestWorkflowDomainService } from './domain/services/opinion-request-workflow.domain.service';
import { OpinionStatisticsDomainService } from './domain/services/opinion-statistics.domain.service';
import { RequestDocumentDomainService } from './domain/services/request-document.domain.service';
import { RequestMutationDomainService } from './domain/services/request-mutation.domain.service';
import { WorkflowHistoryRecorder } from './domain/services/workflow-history-recorder.domain.service';
import { WorkflowStatusRegistry } from './domain/services/workflow-status-registry.domain.service';
import {
  CategoryEntity,
  SubcategoryEntity,
} from './infrastructure/persistence/relational/entities/category.entity';
import { InterdepartmentalCommunicationEntity } from './infrastructure/persistence/relational/entities/interdepartmental-communication.entity';
import { OpinionEntity } from './infrastructure/persistence/relational/entities/opinion.entity';
import { OpinionRequestEntity } from './infrastructure/persistence/relational/entities/opinion-request.entity';
import { RemarkEntity } from './infrastructure/persistence/relational/entities/remark.entity';
import { RequestAssignmentEntity } from './infrastructure/persistence/relational/entities/request-assignment.entity';
import { RequestDocumentEntity } from './infrastructure/persistence/relational/entities/request-document.entity';
import { WorkflowHistoryEntity } from './infrastructure/persistence/relational/entities/workflow-history.entity';
import { WorkflowStatusEntity } from './infrastructure/persistence/relational/entities/workflow-status.entity';
import { TypeOrmWorkflowUnitOfWork } from './infrastructure/persistence/relational/typeorm-workflow-unit-of-work';
import { OpinionRequestsController } from './opinion-requests.controller';
import { OpinionRequestsService } from './opinion-requests.service';
import { OpinionStatisticsController } from './opinion-statistics.controller';
import { OpinionsController } from './opinions.controller';

@Module({
  imports: [
    // Database
    TypeOrmModule.forFeature([
      WorkflowStatusEntity,
      CategoryEntity,
      SubcategoryEntity,
      OpinionRequestEntity,
      RequestAssignmentEntity,
      OpinionEntity,
      WorkflowHistoryEntity,
      RequestDocumentEntity,
      RemarkEntity,
      InterdepartmentalCommunicationEntity,
    ]),

    // Collaborators behind ports
    FilesModule,
    DepartmentsModule,
    UsersModule,

    // Audit logging
    AuditModule,
  ],
  controllers: [
    OpinionRequestsController,
    OpinionsController,
    OpinionStatisticsController,
  ],
  providers: [
    // Application layer
    OpinionRequestsService,

    // Domain layer
    OpinionRequestWorkflowDomainService,
    OpinionDomainService,
    RequestDocumentDomainService,
    OpinionStatisticsDomainService,
    RequestMutationDomainService,
    WorkflowStatusRegistry,
    WorkflowHistoryRecorder,
    InterdepartmentalNotifier,

    // Infrastructure adapters (Hexagonal Architecture)
    {
      provide: WorkflowUnitOfWork,
      useClass: TypeOrmWorkflowUnitOfWork,
    },
  ],
  exports: [OpinionRequestsService],
})
export class OpinionRequestsModule {}
