import {
  BadRequestException,
  ForbiddenException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import {
  Actor,
  actorHasPermission,
  requireActiveActor,
  requirePermission,
} from '../../../auth/domain/actor';
import { PermissionEnum } from '../../../roles/permission.enum';
import { DepartmentRegistryPort } from '../../../departments/domain/ports/department-registry.port';
import { UserDirectoryPort } from '../../../users/domain/ports/user-directory.port';
import { InterdepartmentalCommunication } from '../entities/interdepartmental-communication.entity';
import { Opinion } from '../entities/opinion.entity';
import {
  OPINION_REQUEST_SECTION_KEYS,
  OpinionRequest,
  OpinionRequestChanges,
  OpinionRequestSections,
} from '../entities/opinion-request.entity';
import { Remark } from '../entities/remark.entity';
import { RequestAssignment } from '../entities/request-assignment.entity';
import { RequestDocument } from '../entities/request-document.entity';
import { WorkflowHistory } from '../entities/workflow-history.entity';
import { RequestPriority } from '../enums/request-priority.enum';
import { WorkflowActionType } from '../enums/workflow-action-type.enum';
import { WorkflowStatusName } from '../enums/workflow-status-name.enum';
import {
  ConcurrentModificationException,
  DependencyFailureException,
} from '../exceptions/workflow.exceptions';
import { OpinionRequestFilters } from '../repositories/opinion-request.repository.port';
import {
  WorkflowRepositories,
  WorkflowUnitOfWork,
} from '../repositories/workflow-unit-of-work.port';
import { callDependency } from '../utils/dependency-call.util';
import { OpinionRequestStateMachine } from '../utils/opinion-request-state-machine.util';
import {
  REFERENCE_NUMBER_MAX_ATTEMPTS,
  generateReferenceNumber,
} from '../utils/reference-number.util';
import { IncomingFile } from '../utils/upload-policy.util';
import { InterdepartmentalNotifier } from './interdepartmental-notifier.domain.service';
import { RequestDocumentDomainService } from './request-document.domain.service';
import { RequestMutationDomainService } from './request-mutation.domain.service';
import { WorkflowHistoryRecorder } from './workflow-history-recorder.domain.service';
import {
  ResolvedStatus,
  WorkflowStatusRegistry,
} from './workflow-status-registry.domain.service';

export interface CreateOpinionRequestInput extends Partial<OpinionRequestSections> {
  title: string;
  description?: string | null;
  departmentId: number;
  categoryId: number;
  subcategoryId?: number | null;
  priority?: RequestPriority;
  dueDate?: Date | null;
}

export interface UpdateOpinionRequestInput
  extends Partial<OpinionRequestSections> {
  title?: string;
  description?: string | null;
  departmentId?: number;
  categoryId?: number;
  subcategoryId?: number | null;
  priority?: RequestPriority;
  dueDate?: Date | null;
}

export interface AssignRequestInput {
  departmentId: number;
  expertId?: number | null;
  dueDate?: Date | null;
  isPrimary?: boolean;
  remarks?: string | null;
}

export interface ReassignRequestInput {
  expertId: number;
  dueDate?: Date | null;
  remarks?: string | null;
}

export interface ListOpinionRequestsQuery {
  status?: WorkflowStatusName;
  departmentId?: number;
  categoryId?: number;
  subcategoryId?: number;
  priority?: RequestPriority;
  createdFrom?: Date;
  createdTo?: Date;
  skip?: number;
  limit?: number;
}

export interface OpinionRequestDetails {
  request: OpinionRequest;
  status: ResolvedStatus;
  assignments: RequestAssignment[];
  opinions: Opinion[];
  documents: RequestDocument[];
  remarks: Remark[];
  communications: InterdepartmentalCommunication[];
}

export interface AssignmentResult {
  request: OpinionRequest;
  assignment: RequestAssignment;
  communication: InterdepartmentalCommunication | null;
}

export interface CreateOpinionRequestResult {
  request: OpinionRequest;
  documents: RequestDocument[];
}

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

/**
 * OpinionRequestWorkflowDomainService
 *
 * Request lifecycle: create, update, soft delete, assignment, reassignment,
 * manual status changes and remarks. Every mutation runs in one transaction
 * that also writes the history row; version grows by exactly 1.
 *
 * Authorization:
 * - update/delete: requester or manage_opinion_requests
 * - assign/reassign: assign_experts or manage_opinion_requests
 * - status change: manage_opinion_requests
 */
@Injectable()
export class OpinionRequestWorkflowDomainService {
  private readonly logger = new Logger(
    OpinionRequestWorkflowDomainService.name,
  );

  constructor(
    private readonly unitOfWork: WorkflowUnitOfWork,
    private readonly mutation: RequestMutationDomainService,
    private readonly statusRegistry: WorkflowStatusRegistry,
    private readonly historyRecorder: WorkflowHistoryRecorder,
    private readonly notifier: InterdepartmentalNotifier,
    private readonly documents: RequestDocumentDomainService,
    private readonly departmentRegistry: DepartmentRegistryPort,
    private readonly userDirectory: UserDirectoryPort,
  ) {}

  async createRequest(
    actor: Actor,
    input: CreateOpinionRequestInput,
    files: readonly IncomingFile[] = [],
  ): Promise<CreateOpinionRequestResult> {
    requireActiveActor(actor);
    if (files.length > 0) {
      this.documents.validateBatch(files);
    }
    await this.assertDepartmentExists(input.departmentId);

    const written: string[] = [];
    try {
      return await this.unitOfWork.runInTransaction(async (repositories) => {
        await this.assertClassification(
          repositories,
          input.categoryId,
          input.subcategoryId ?? null,
        );
        const unassigned = await this.statusRegistry.getByName(
          WorkflowStatusName.UNASSIGNED,
        );
        const referenceNumber = await this.allocateReferenceNumber(
          repositories,
        );

        const request = await repositories.opinionRequests.create({
          referenceNumber,
          title: input.title,
          description: input.description ?? null,
          requesterId: actor.id,
          departmentId: input.departmentId,
          categoryId: input.categoryId,
          subcategoryId: input.subcategoryId ?? null,
          priority: input.priority ?? RequestPriority.MEDIUM,
          currentStatusId: unassigned.id,
          dueDate: input.dueDate ?? null,
          version: 1,
          isDeleted: false,
          deletedBy: null,
          deletedAt: null,
          ...this.pickSections(input),
        });

        const documents = await this.documents.storeBatch(
          repositories,
          request.id,
          actor.id,
          files,
          null,
          written,
        );

        await this.historyRecorder.record(repositories, {
          requestId: request.id,
          actionType: WorkflowActionType.CREATED,
          actorId: actor.id,
          fromStatusId: null,
          toStatusId: unassigned.id,
          details: {
            referenceNumber,
            fileNames: documents.map((document) => document.fileName),
          },
        });

        return { request, documents };
      });
    } catch (error) {
      await this.documents.discardStoredFiles(written);
      throw error;
    }
  }

  /**
   * Partial update: absent keys are untouched, keys present with null are
   * applied.
   *
   * @throws ConcurrentModificationException when `expectedVersion` is given
   * and differs from the stored version
   */
  async updateRequest(
    requestId: number,
    actor: Actor,
    patch: UpdateOpinionRequestInput,
    expectedVersion?: number,
  ): Promise<OpinionRequest> {
    requireActiveActor(actor);
    const changes = this.collectChanges(patch);
    if (changes.departmentId !== undefined) {
      await this.assertDepartmentExists(changes.departmentId);
    }

    return this.unitOfWork.runInTransaction(async (repositories) => {
      const { request } = await this.mutation.loadForMutation(
        repositories,
        requestId,
      );
      this.assertRequesterOrManager(request, actor, 'update');

      if (expectedVersion !== undefined && expectedVersion !== request.version) {
        throw new ConcurrentModificationException(request.id, expectedVersion);
      }

      if (
        changes.categoryId !== undefined ||
        changes.subcategoryId !== undefined
      ) {
        await this.assertClassification(
          repositories,
          changes.categoryId ?? request.categoryId,
          changes.subcategoryId !== undefined
            ? changes.subcategoryId
            : request.subcategoryId,
        );
      }

      return this.mutation.commit(repositories, request, changes, {
        actionType: WorkflowActionType.UPDATED,
        actorId: actor.id,
        details: { changedFields: Object.keys(changes) },
      });
    });
  }

  /**
   * Soft delete. The request and its children disappear from every active
   * query but stay in storage for audit.
   */
  async deleteRequest(requestId: number, actor: Actor): Promise<OpinionRequest> {
    requireActiveActor(actor);

    return this.unitOfWork.runInTransaction(async (repositories) => {
      const { request } = await this.mutation.loadForMutation(
        repositories,
        requestId,
        { allowTerminal: true },
      );
      this.assertRequesterOrManager(request, actor, 'delete');

      return this.mutation.commit(
        repositories,
        request,
        { isDeleted: true, deletedBy: actor.id, deletedAt: new Date() },
        {
          actionType: WorkflowActionType.DELETED,
          actorId: actor.id,
          details: { referenceNumber: request.referenceNumber },
        },
      );
    });
  }

  async assignRequest(
    requestId: number,
    actor: Actor,
    input: AssignRequestInput,
  ): Promise<AssignmentResult> {
    requirePermission(
      actor,
      'assign opinion requests',
      PermissionEnum.assignExperts,
      PermissionEnum.manageOpinionRequests,
    );
    await this.assertDepartmentExists(input.departmentId);
    const expertId = input.expertId ?? null;
    if (expertId !== null) {
      await this.assertExpertInDepartment(expertId, input.departmentId);
    }

    return this.unitOfWork.runInTransaction(async (repositories) => {
      const { request, status } = await this.mutation.loadForMutation(
        repositories,
        requestId,
      );
      const target = await this.mutation.resolveTransition(
        status,
        expertId !== null
          ? WorkflowStatusName.ASSIGNED_TO_EXPERT
          : WorkflowStatusName.ASSIGNED_TO_DEPARTMENT,
      );

      const existing = await repositories.assignments.findByRequestId(
        request.id,
      );
      // A request without a primary assignment always gets one here
      const hasPrimary = existing.some((assignment) => assignment.isPrimary);
      const isPrimary = !hasPrimary || input.isPrimary === true;
      if (isPrimary) {
        await repositories.assignments.demotePrimary(request.id);
      }

      const assignment = await repositories.assignments.create({
        requestId: request.id,
        departmentId: input.departmentId,
        assignedBy: actor.id,
        expertId,
        statusId: target.id,
        dueDate: input.dueDate ?? null,
        isPrimary,
        remarks: input.remarks ?? null,
      });

      const updated = await this.mutation.commit(
        repositories,
        request,
        { currentStatusId: target.id },
        {
          actionType: WorkflowActionType.ASSIGNED,
          actorId: actor.id,
          details: {
            assignmentId: assignment.id,
            departmentId: assignment.departmentId,
            expertId: assignment.expertId,
            isPrimary: assignment.isPrimary,
            dueDate: assignment.dueDate
              ? assignment.dueDate.toISOString()
              : null,
          },
        },
      );

      const communication = await this.notifier.notifyAssignment(
        repositories,
        updated,
        assignment,
      );

      return { request: updated, assignment, communication };
    });
  }

  /**
   * Replace the expert on an existing assignment. Request status is left
   * as it is; the assignment row is mutated in place.
   */
  async reassignRequest(
    assignmentId: number,
    actor: Actor,
    input: ReassignRequestInput,
  ): Promise<AssignmentResult> {
    requirePermission(
      actor,
      'reassign opinion requests',
      PermissionEnum.assignExperts,
      PermissionEnum.manageOpinionRequests,
    );

    return this.unitOfWork.runInTransaction(async (repositories) => {
      const assignment = await repositories.assignments.findById(assignmentId);
      if (!assignment) {
        throw new NotFoundException('Assignment not found');
      }

      const { request } = await this.mutation.loadForMutation(
        repositories,
        assignment.requestId,
      );
      await this.assertExpertInDepartment(
        input.expertId,
        assignment.departmentId,
      );

      const reassigned = await repositories.assignments.update(assignment.id, {
        expertId: input.expertId,
        ...(input.dueDate !== undefined ? { dueDate: input.dueDate } : {}),
        ...(input.remarks !== undefined ? { remarks: input.remarks } : {}),
      });

      const updated = await this.mutation.commit(repositories, request, {}, {
        actionType: WorkflowActionType.REASSIGNED,
        actorId: actor.id,
        details: {
          assignmentId: assignment.id,
          oldExpertId: assignment.expertId,
          newExpertId: input.expertId,
        },
      });

      return { request: updated, assignment: reassigned, communication: null };
    });
  }

  /**
   * Manual moves along the side branches and into head review.
   */
  async changeStatus(
    requestId: number,
    actor: Actor,
    statusName: WorkflowStatusName,
    remarks?: string | null,
  ): Promise<OpinionRequest> {
    requirePermission(
      actor,
      'change request status',
      PermissionEnum.manageOpinionRequests,
    );
    if (!OpinionRequestStateMachine.isManuallySettable(statusName)) {
      throw new BadRequestException(
        `Status ${statusName} cannot be set directly`,
      );
    }

    return this.unitOfWork.runInTransaction(async (repositories) => {
      const { request, status } = await this.mutation.loadForMutation(
        repositories,
        requestId,
      );
      const target = await this.mutation.resolveTransition(status, statusName);

      return this.mutation.commit(
        repositories,
        request,
        { currentStatusId: target.id },
        {
          actionType: WorkflowActionType.STATUS_CHANGED,
          actorId: actor.id,
          details: { from: status.name, to: target.name, remarks: remarks ?? null },
        },
      );
    });
  }

  /**
   * Remarks are allowed on terminal requests and never move the status.
   */
  async addRemark(
    requestId: number,
    actor: Actor,
    content: string,
  ): Promise<Remark> {
    requireActiveActor(actor);

    return this.unitOfWork.runInTransaction(async (repositories) => {
      const { request } = await this.mutation.loadForMutation(
        repositories,
        requestId,
        { allowTerminal: true },
      );

      const remark = await repositories.remarks.create({
        requestId: request.id,
        userId: actor.id,
        content,
      });

      await this.mutation.commit(repositories, request, {}, {
        actionType: WorkflowActionType.REMARK_ADDED,
        actorId: actor.id,
        details: { remarkId: remark.id },
      });

      return remark;
    });
  }

  async getRequest(requestId: number): Promise<OpinionRequestDetails> {
    const repositories = this.unitOfWork.repositories;
    const request = await this.findActiveOrFail(repositories, requestId);

    const [status, assignments, opinions, documents, remarks, communications] =
      await Promise.all([
        this.statusRegistry.getById(request.currentStatusId),
        repositories.assignments.findByRequestId(request.id),
        repositories.opinions.findByRequestId(request.id),
        repositories.documents.findByRequestId(request.id),
        repositories.remarks.findByRequestId(request.id),
        repositories.communications.findByRequestId(request.id),
      ]);

    return {
      request,
      status,
      assignments,
      opinions,
      documents,
      remarks,
      communications,
    };
  }

  async listRequests(
    query: ListOpinionRequestsQuery,
  ): Promise<{ data: OpinionRequest[]; total: number; skip: number; limit: number }> {
    const skip = Math.max(query.skip ?? 0, 0);
    const limit = Math.min(Math.max(query.limit ?? DEFAULT_PAGE_SIZE, 1), MAX_PAGE_SIZE);

    const filters: OpinionRequestFilters = {
      departmentId: query.departmentId,
      categoryId: query.categoryId,
      subcategoryId: query.subcategoryId,
      priority: query.priority,
      createdFrom: query.createdFrom,
      createdTo: query.createdTo,
    };
    if (query.status) {
      filters.statusId = (await this.statusRegistry.getByName(query.status)).id;
    }

    const result = await this.unitOfWork.repositories.opinionRequests.findMany(
      filters,
      { skip, limit },
    );
    return { ...result, skip, limit };
  }

  async getHistory(requestId: number): Promise<WorkflowHistory[]> {
    const repositories = this.unitOfWork.repositories;
    await this.findActiveOrFail(repositories, requestId);
    return repositories.history.findByRequestId(requestId);
  }

  private async findActiveOrFail(
    repositories: WorkflowRepositories,
    requestId: number,
  ): Promise<OpinionRequest> {
    const request = await repositories.opinionRequests.findActiveById(requestId);
    if (!request) {
      throw new NotFoundException('Opinion request not found');
    }
    return request;
  }

  private async allocateReferenceNumber(
    repositories: WorkflowRepositories,
  ): Promise<string> {
    for (let attempt = 1; attempt <= REFERENCE_NUMBER_MAX_ATTEMPTS; attempt++) {
      const candidate = generateReferenceNumber();
      const taken =
        await repositories.opinionRequests.existsByReferenceNumber(candidate);
      if (!taken) {
        return candidate;
      }
      this.logger.warn(
        `Reference number collision on attempt ${attempt}: ${candidate}`,
      );
    }
    throw new DependencyFailureException(
      'Reference number generator',
      `no unique reference number after ${REFERENCE_NUMBER_MAX_ATTEMPTS} attempts`,
    );
  }

  private async assertDepartmentExists(departmentId: number): Promise<void> {
    const exists = await callDependency(this.logger, 'Department registry', () =>
      this.departmentRegistry.exists(departmentId),
    );
    if (!exists) {
      throw new BadRequestException(`Department ${departmentId} does not exist`);
    }
  }

  private async assertExpertInDepartment(
    expertId: number,
    departmentId: number,
  ): Promise<void> {
    const expert = await callDependency(this.logger, 'User directory', () =>
      this.userDirectory.findById(expertId),
    );
    if (!expert) {
      throw new BadRequestException(`Expert ${expertId} does not exist`);
    }
    if (!expert.isActive) {
      throw new BadRequestException(`Expert ${expertId} is not active`);
    }
    if (expert.departmentId !== departmentId) {
      throw new BadRequestException(
        `Expert ${expertId} does not belong to department ${departmentId}`,
      );
    }
  }

  private async assertClassification(
    repositories: WorkflowRepositories,
    categoryId: number,
    subcategoryId: number | null,
  ): Promise<void> {
    const category = await repositories.categories.findCategoryById(categoryId);
    if (!category) {
      throw new BadRequestException(`Category ${categoryId} does not exist`);
    }
    if (subcategoryId === null) {
      return;
    }
    const subcategory =
      await repositories.categories.findSubcategoryById(subcategoryId);
    if (!subcategory || subcategory.categoryId !== categoryId) {
      throw new BadRequestException(
        `Subcategory ${subcategoryId} does not belong to category ${categoryId}`,
      );
    }
  }

  private assertRequesterOrManager(
    request: OpinionRequest,
    actor: Actor,
    action: string,
  ): void {
    if (
      request.requesterId !== actor.id &&
      !actorHasPermission(actor, PermissionEnum.manageOpinionRequests)
    ) {
      throw new ForbiddenException(
        `Only the requester or a request manager can ${action} this request`,
      );
    }
  }

  private collectChanges(
    patch: UpdateOpinionRequestInput,
  ): OpinionRequestChanges {
    const changes: OpinionRequestChanges = {};

    if (patch.title !== undefined) changes.title = patch.title;
    if (patch.description !== undefined) changes.description = patch.description;
    if (patch.departmentId !== undefined) changes.departmentId = patch.departmentId;
    if (patch.categoryId !== undefined) changes.categoryId = patch.categoryId;
    if (patch.subcategoryId !== undefined) changes.subcategoryId = patch.subcategoryId;
    if (patch.priority !== undefined) changes.priority = patch.priority;
    if (patch.dueDate !== undefined) changes.dueDate = patch.dueDate;
    for (const key of OPINION_REQUEST_SECTION_KEYS) {
      const value = patch[key];
      if (value !== undefined) {
        changes[key] = value;
      }
    }

    return changes;
  }

  private pickSections(
    input: Partial<OpinionRequestSections>,
  ): OpinionRequestSections {
    return {
      requestStatement: input.requestStatement ?? null,
      challengesOpportunities: input.challengesOpportunities ?? null,
      subjectContent: input.subjectContent ?? null,
      alternatives: input.alternatives ?? null,
      expectedImpact: input.expectedImpact ?? null,
      potentialRisks: input.potentialRisks ?? null,
      studiesStatistics: input.studiesStatistics ?? null,
      legalFinancialOpinions: input.legalFinancialOpinions ?? null,
      stakeholderFeedback: input.stakeholderFeedback ?? null,
      workPlan: input.workPlan ?? null,
      decisionDraft: input.decisionDraft ?? null,
    };
  }
}
