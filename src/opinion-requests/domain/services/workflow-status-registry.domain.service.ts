import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { WorkflowStatus } from '../entities/workflow-status.entity';
import {
  WorkflowStatusName,
  isWorkflowStatusName,
} from '../enums/workflow-status-name.enum';
import { WorkflowUnitOfWork } from '../repositories/workflow-unit-of-work.port';

export interface ResolvedStatus extends WorkflowStatus {
  name: WorkflowStatusName;
}

/**
 * Catalogue of the seeded workflow statuses, loaded once per process.
 *
 * A missing seed row is a configuration fault (the seed migration was not
 * applied): lookups fail with NotFoundException and log at error level.
 */
@Injectable()
export class WorkflowStatusRegistry {
  private readonly logger = new Logger(WorkflowStatusRegistry.name);
  private byName: Map<WorkflowStatusName, ResolvedStatus> | null = null;
  private byId: Map<number, ResolvedStatus> | null = null;
  private loading: Promise<void> | null = null;

  constructor(private readonly unitOfWork: WorkflowUnitOfWork) {}

  async getByName(name: WorkflowStatusName): Promise<ResolvedStatus> {
    await this.ensureLoaded();
    const status = this.byName?.get(name);
    if (!status) {
      this.logger.error(
        `Workflow status "${name}" is not seeded; run the database migrations`,
      );
      throw new NotFoundException(`Workflow status not found: ${name}`);
    }
    return status;
  }

  async getById(id: number): Promise<ResolvedStatus> {
    await this.ensureLoaded();
    const status = this.byId?.get(id);
    if (!status) {
      this.logger.error(`Workflow status id ${id} is not in the registry`);
      throw new NotFoundException(`Workflow status not found: ${id}`);
    }
    return status;
  }

  async getAll(): Promise<ResolvedStatus[]> {
    await this.ensureLoaded();
    return [...(this.byId?.values() ?? [])];
  }

  private async ensureLoaded(): Promise<void> {
    if (this.byName && this.byId) {
      return;
    }
    if (!this.loading) {
      this.loading = this.load().catch((error: unknown) => {
        this.loading = null;
        throw error;
      });
    }
    await this.loading;
  }

  private async load(): Promise<void> {
    const rows = await this.unitOfWork.repositories.statuses.findAll();
    const byName = new Map<WorkflowStatusName, ResolvedStatus>();
    const byId = new Map<number, ResolvedStatus>();

    for (const row of rows) {
      if (!isWorkflowStatusName(row.name)) {
        this.logger.warn(`Ignoring unknown workflow status "${row.name}"`);
        continue;
      }
      const status: ResolvedStatus = { ...row, name: row.name };
      byName.set(status.name, status);
      byId.set(status.id, status);
    }

    this.byName = byName;
    this.byId = byId;
    this.logger.log(`Loaded ${byName.size} workflow statuses`);
  }
}
