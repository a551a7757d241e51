import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { DepartmentRegistryPort } from '../../../departments/domain/ports/department-registry.port';
import { WorkflowStatusName } from '../enums/workflow-status-name.enum';
import { WorkflowUnitOfWork } from '../repositories/workflow-unit-of-work.port';
import { callDependency } from '../utils/dependency-call.util';
import { WorkflowStatusRegistry } from './workflow-status-registry.domain.service';

export interface DepartmentStatistics {
  departmentId: number;
  totalRequests: number;
  completedRequests: number;
  pendingRequests: number;
  rejectedRequests: number;
  /** Mean of (updatedAt - createdAt) over completed requests, in seconds */
  averageCompletionTime: number;
}

const COMPLETED_STATES = [
  WorkflowStatusName.HEAD_APPROVED,
  WorkflowStatusName.COMPLETED,
];

/**
 * Per-department counts over non-deleted requests owned by the department
 * and created inside the optional window.
 */
@Injectable()
export class OpinionStatisticsDomainService {
  private readonly logger = new Logger(OpinionStatisticsDomainService.name);

  constructor(
    private readonly unitOfWork: WorkflowUnitOfWork,
    private readonly statusRegistry: WorkflowStatusRegistry,
    private readonly departmentRegistry: DepartmentRegistryPort,
  ) {}

  async departmentStats(
    departmentId: number,
    from?: Date,
    to?: Date,
  ): Promise<DepartmentStatistics> {
    const exists = await callDependency(this.logger, 'Department registry', () =>
      this.departmentRegistry.exists(departmentId),
    );
    if (!exists) {
      throw new NotFoundException('Department not found');
    }

    const completedIds = new Set<number>();
    for (const name of COMPLETED_STATES) {
      completedIds.add((await this.statusRegistry.getByName(name)).id);
    }
    const rejectedId = (
      await this.statusRegistry.getByName(WorkflowStatusName.REJECTED)
    ).id;

    const rows =
      await this.unitOfWork.repositories.opinionRequests.findStatisticsRows(
        departmentId,
        { from, to },
      );

    let completed = 0;
    let rejected = 0;
    let completionSeconds = 0;
    for (const row of rows) {
      if (completedIds.has(row.currentStatusId)) {
        completed++;
        completionSeconds +=
          (row.updatedAt.getTime() - row.createdAt.getTime()) / 1000;
      } else if (row.currentStatusId === rejectedId) {
        rejected++;
      }
    }

    return {
      departmentId,
      totalRequests: rows.length,
      completedRequests: completed,
      pendingRequests: rows.length - completed - rejected,
      rejectedRequests: rejected,
      averageCompletionTime: completed > 0 ? completionSeconds / completed : 0,
    };
  }
}
