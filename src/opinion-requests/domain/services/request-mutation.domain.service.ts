import { Injectable, NotFoundException } from '@nestjs/common';
import {
  OpinionRequest,
  OpinionRequestChanges,
} from '../entities/opinion-request.entity';
import { ActionDetails } from '../entities/workflow-history.entity';
import { WorkflowActionType } from '../enums/workflow-action-type.enum';
import { WorkflowStatusName } from '../enums/workflow-status-name.enum';
import {
  ConcurrentModificationException,
  InvalidStateTransitionException,
} from '../exceptions/workflow.exceptions';
import { WorkflowRepositories } from '../repositories/workflow-unit-of-work.port';
import { OpinionRequestStateMachine } from '../utils/opinion-request-state-machine.util';
import { WorkflowHistoryRecorder } from './workflow-history-recorder.domain.service';
import {
  ResolvedStatus,
  WorkflowStatusRegistry,
} from './workflow-status-registry.domain.service';

export interface LoadedRequest {
  request: OpinionRequest;
  status: ResolvedStatus;
}

export interface CommitHistory {
  actionType: WorkflowActionType;
  actorId: number;
  details?: ActionDetails;
}

/**
 * Shared steps of every mutating workflow operation, run inside the
 * caller's transaction:
 *
 * 1. load and lock the request (soft-deleted requests are not found)
 * 2. refuse terminal requests unless the operation leaves status alone
 * 3. validate the target status against the state machine
 * 4. write the request with a version compare-and-swap, then record history
 */
@Injectable()
export class RequestMutationDomainService {
  constructor(
    private readonly statusRegistry: WorkflowStatusRegistry,
    private readonly historyRecorder: WorkflowHistoryRecorder,
  ) {}

  async loadForMutation(
    repositories: WorkflowRepositories,
    requestId: number,
    options: { allowTerminal?: boolean } = {},
  ): Promise<LoadedRequest> {
    const request = await repositories.opinionRequests.findActiveById(
      requestId,
      { lock: true },
    );
    if (!request) {
      throw new NotFoundException('Opinion request not found');
    }

    const status = await this.statusRegistry.getById(request.currentStatusId);
    if (
      !options.allowTerminal &&
      OpinionRequestStateMachine.isTerminal(status.name)
    ) {
      throw new InvalidStateTransitionException(
        status.name,
        null,
        `Opinion request ${request.referenceNumber} is ${status.name} and can no longer be changed`,
      );
    }

    return { request, status };
  }

  async resolveTransition(
    current: ResolvedStatus,
    target: WorkflowStatusName,
  ): Promise<ResolvedStatus> {
    OpinionRequestStateMachine.validateTransition(current.name, target);
    return this.statusRegistry.getByName(target);
  }

  /**
   * Look up `target` without consulting the transition table. Only for
   * moves whose precondition is carried by another entity, such as a
   * review decision on a submitted opinion.
   */
  async resolveStatus(target: WorkflowStatusName): Promise<ResolvedStatus> {
    return this.statusRegistry.getByName(target);
  }

  /**
   * Write `changes` on top of `request` (version + 1) and append the
   * history row. `fromStatusId` is the status read under lock, `toStatusId`
   * the status after the write.
   */
  async commit(
    repositories: WorkflowRepositories,
    request: OpinionRequest,
    changes: OpinionRequestChanges,
    history: CommitHistory,
  ): Promise<OpinionRequest> {
    const updated = await repositories.opinionRequests.updateIfVersion(
      request.id,
      request.version,
      changes,
    );
    if (!updated) {
      throw new ConcurrentModificationException(request.id, request.version);
    }

    await this.historyRecorder.record(repositories, {
      requestId: request.id,
      actionType: history.actionType,
      actorId: history.actorId,
      fromStatusId: request.currentStatusId,
      toStatusId: updated.currentStatusId,
      details: history.details,
    });

    return updated;
  }
}
