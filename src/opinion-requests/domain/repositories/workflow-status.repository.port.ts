import { WorkflowStatus } from '../entities/workflow-status.entity';

export abstract class WorkflowStatusRepository {
  abstract findAll(): Promise<WorkflowStatus[]>;
}
