import { CategoryRepository } from './category.repository.port';
import { InterdepartmentalCommunicationRepository } from './interdepartmental-communication.repository.port';
import { OpinionRequestRepository } from './opinion-request.repository.port';
import { OpinionRepository } from './opinion.repository.port';
import { RemarkRepository } from './remark.repository.port';
import { RequestAssignmentRepository } from './request-assignment.repository.port';
import { RequestDocumentRepository } from './request-document.repository.port';
import { WorkflowHistoryRepository } from './workflow-history.repository.port';
import { WorkflowStatusRepository } from './workflow-status.repository.port';

/**
 * Repositories bound to one transaction (or to no transaction, for reads).
 */
export interface WorkflowRepositories {
  opinionRequests: OpinionRequestRepository;
  assignments: RequestAssignmentRepository;
  opinions: OpinionRepository;
  history: WorkflowHistoryRepository;
  documents: RequestDocumentRepository;
  remarks: RemarkRepository;
  communications: InterdepartmentalCommunicationRepository;
  statuses: WorkflowStatusRepository;
  categories: CategoryRepository;
}

export abstract class WorkflowUnitOfWork {
  /**
   * Run `work` in a single transaction. Any rejection rolls back every
   * write made through the repositories handed to it.
   */
  abstract runInTransaction<T>(
    work: (repositories: WorkflowRepositories) => Promise<T>,
  ): Promise<T>;

  /**
   * Non-transactional repositories for read paths.
   */
  abstract get repositories(): WorkflowRepositories;
}
