import { Injectable } from '@nestjs/common';
import { DataSource, EntityManager } from 'typeorm';
import {
  WorkflowRepositories,
  WorkflowUnitOfWork,
} from '../../../domain/repositories/workflow-unit-of-work.port';
import { InterdepartmentalCommunicationRelationalRepository } from './repositories/interdepartmental-communication.repository';
import { OpinionRequestRelationalRepository } from './repositories/opinion-request.repository';
import { OpinionRelationalRepository } from './repositories/opinion.repository';
import {
  CategoryRelationalRepository,
  WorkflowStatusRelationalRepository,
} from './repositories/reference-data.repository';
import { RemarkRelationalRepository } from './repositories/remark.repository';
import { RequestAssignmentRelationalRepository } from './repositories/request-assignment.repository';
import { RequestDocumentRelationalRepository } from './repositories/request-document.repository';
import { WorkflowHistoryRelationalRepository } from './repositories/workflow-history.repository';

function createRepositories(manager: EntityManager): WorkflowRepositories {
  return {
    opinionRequests: new OpinionRequestRelationalRepository(manager),
    assignments: new RequestAssignmentRelationalRepository(manager),
    opinions: new OpinionRelationalRepository(manager),
    history: new WorkflowHistoryRelationalRepository(manager),
    documents: new RequestDocumentRelationalRepository(manager),
    remarks: new RemarkRelationalRepository(manager),
    communications: new InterdepartmentalCommunicationRelationalRepository(
      manager,
    ),
    statuses: new WorkflowStatusRelationalRepository(manager),
    categories: new CategoryRelationalRepository(manager),
  };
}

/**
 * One database transaction per workflow operation. Repositories handed to
 * the work callback are bound to the transaction's EntityManager.
 */
@Injectable()
export class TypeOrmWorkflowUnitOfWork extends WorkflowUnitOfWork {
  private readonly readRepositories: WorkflowRepositories;

  constructor(private readonly dataSource: DataSource) {
    super();
    this.readRepositories = createRepositories(dataSource.manager);
  }

  runInTransaction<T>(
    work: (repositories: WorkflowRepositories) => Promise<T>,
  ): Promise<T> {
    return this.dataSource.transaction('READ COMMITTED', (manager) =>
      work(createRepositories(manager)),
    );
  }

  get repositories(): WorkflowRepositories {
    return this.readRepositories;
  }
}
