import {
  ForbiddenException,
  Injectable,
  NotFoundException,
} from '@nestjs/common';
import {
  Actor,
  requireActiveActor,
  requirePermission,
} from '../../../auth/domain/actor';
import { PermissionEnum } from '../../../roles/permission.enum';
import { Opinion } from '../entities/opinion.entity';
import { OpinionRequest } from '../entities/opinion-request.entity';
import { RequestAssignment } from '../entities/request-assignment.entity';
import { OpinionStatus } from '../enums/opinion-status.enum';
import { WorkflowActionType } from '../enums/workflow-action-type.enum';
import { WorkflowStatusName } from '../enums/workflow-status-name.enum';
import { InvalidStateTransitionException } from '../exceptions/workflow.exceptions';
import {
  WorkflowRepositories,
  WorkflowUnitOfWork,
} from '../repositories/workflow-unit-of-work.port';
import { RequestMutationDomainService } from './request-mutation.domain.service';

export interface CreateOpinionInput {
  departmentId: number;
  content: string;
  recommendation?: string | null;
}

export interface UpdateOpinionInput {
  content?: string;
  recommendation?: string | null;
}

export interface ReviewOpinionInput {
  approved: boolean;
  comments?: string | null;
}

export interface OpinionResult {
  opinion: Opinion;
  request: OpinionRequest;
}

/**
 * OpinionDomainService
 *
 * Opinion lifecycle: draft → submitted → approved | rejected.
 *
 * Rules:
 * - Authoring needs an assignment on the request for the opinion's
 *   department, naming the author as expert, or naming no expert with the
 *   author a member of that department
 * - Only the author may change or submit a draft
 * - Review needs approve_opinion_requests and a submitted opinion
 */
@Injectable()
export class OpinionDomainService {
  constructor(
    private readonly unitOfWork: WorkflowUnitOfWork,
    private readonly mutation: RequestMutationDomainService,
  ) {}

  async createOpinion(
    requestId: number,
    actor: Actor,
    input: CreateOpinionInput,
  ): Promise<OpinionResult> {
    requireActiveActor(actor);

    return this.unitOfWork.runInTransaction(async (repositories) => {
      const { request, status } = await this.mutation.loadForMutation(
        repositories,
        requestId,
      );

      const assignment = await this.findAuthorAssignment(
        repositories,
        request.id,
        input.departmentId,
        actor,
      );
      if (!assignment) {
        throw new ForbiddenException(
          `No assignment on this request for department ${input.departmentId} covers you`,
        );
      }

      const inReview = await this.mutation.resolveTransition(
        status,
        WorkflowStatusName.IN_REVIEW,
      );

      const opinion = await repositories.opinions.create({
        requestId: request.id,
        departmentId: input.departmentId,
        expertId: actor.id,
        content: input.content,
        recommendation: input.recommendation ?? null,
        status: OpinionStatus.DRAFT,
      });
      await repositories.assignments.update(assignment.id, {
        statusId: inReview.id,
      });

      const updated = await this.mutation.commit(
        repositories,
        request,
        { currentStatusId: inReview.id },
        {
          actionType: WorkflowActionType.OPINION_CREATED,
          actorId: actor.id,
          details: {
            opinionId: opinion.id,
            assignmentId: assignment.id,
            departmentId: opinion.departmentId,
          },
        },
      );

      return { opinion, request: updated };
    });
  }

  async updateOpinion(
    opinionId: number,
    actor: Actor,
    input: UpdateOpinionInput,
  ): Promise<OpinionResult> {
    requireActiveActor(actor);

    return this.unitOfWork.runInTransaction(async (repositories) => {
      const { opinion, request } = await this.loadOpinionForMutation(
        repositories,
        opinionId,
      );
      this.assertAuthor(opinion, actor, 'update');
      if (opinion.status !== OpinionStatus.DRAFT) {
        throw new InvalidStateTransitionException(
          opinion.status,
          null,
          'Only draft opinions can be updated',
        );
      }

      const changed = await repositories.opinions.update(opinion.id, {
        ...(input.content !== undefined ? { content: input.content } : {}),
        ...(input.recommendation !== undefined
          ? { recommendation: input.recommendation }
          : {}),
      });

      const updated = await this.mutation.commit(repositories, request, {}, {
        actionType: WorkflowActionType.OPINION_UPDATED,
        actorId: actor.id,
        details: {
          opinionId: opinion.id,
          changedFields: Object.keys(input).filter(
            (key) => key === 'content' || key === 'recommendation',
          ),
        },
      });

      return { opinion: changed, request: updated };
    });
  }

  async submitOpinion(opinionId: number, actor: Actor): Promise<OpinionResult> {
    requireActiveActor(actor);

    return this.unitOfWork.runInTransaction(async (repositories) => {
      const { opinion, request, status } = await this.loadOpinionForMutation(
        repositories,
        opinionId,
      );
      this.assertAuthor(opinion, actor, 'submit');
      if (opinion.status !== OpinionStatus.DRAFT) {
        throw new InvalidStateTransitionException(
          opinion.status,
          OpinionStatus.SUBMITTED,
          'Only draft opinions can be submitted',
        );
      }

      const submittedStatus = await this.mutation.resolveTransition(
        status,
        WorkflowStatusName.EXPERT_OPINION_SUBMITTED,
      );

      const submitted = await repositories.opinions.update(opinion.id, {
        status: OpinionStatus.SUBMITTED,
        submittedAt: new Date(),
      });
      await this.syncAssignmentSnapshot(
        repositories,
        opinion,
        submittedStatus.id,
      );

      const updated = await this.mutation.commit(
        repositories,
        request,
        { currentStatusId: submittedStatus.id },
        {
          actionType: WorkflowActionType.OPINION_SUBMITTED,
          actorId: actor.id,
          details: { opinionId: opinion.id },
        },
      );

      return { opinion: submitted, request: updated };
    });
  }

  async reviewOpinion(
    opinionId: number,
    actor: Actor,
    input: ReviewOpinionInput,
  ): Promise<OpinionResult> {
    requirePermission(
      actor,
      'review opinions',
      PermissionEnum.approveOpinionRequests,
    );

    return this.unitOfWork.runInTransaction(async (repositories) => {
      const { opinion, request } = await this.loadOpinionForMutation(
        repositories,
        opinionId,
      );
      if (opinion.status !== OpinionStatus.SUBMITTED) {
        throw new InvalidStateTransitionException(
          opinion.status,
          input.approved ? OpinionStatus.APPROVED : OpinionStatus.REJECTED,
          'Only submitted opinions can be reviewed',
        );
      }

      // A submitted opinion is decidable from any non-terminal request
      // status: another department's draft may have moved it to in_review.
      const decided = await this.mutation.resolveStatus(
        input.approved
          ? WorkflowStatusName.HEAD_APPROVED
          : WorkflowStatusName.REJECTED,
      );

      const reviewed = await repositories.opinions.update(opinion.id, {
        status: input.approved ? OpinionStatus.APPROVED : OpinionStatus.REJECTED,
        reviewedBy: actor.id,
        reviewedAt: new Date(),
        reviewComments: input.comments ?? null,
      });
      await this.syncAssignmentSnapshot(repositories, opinion, decided.id);

      const updated = await this.mutation.commit(
        repositories,
        request,
        { currentStatusId: decided.id },
        {
          actionType: WorkflowActionType.OPINION_REVIEWED,
          actorId: actor.id,
          details: {
            opinionId: opinion.id,
            approved: input.approved,
            comments: input.comments ?? null,
          },
        },
      );

      return { opinion: reviewed, request: updated };
    });
  }

  async getOpinion(opinionId: number): Promise<Opinion> {
    const repositories = this.unitOfWork.repositories;
    const opinion = await repositories.opinions.findById(opinionId);
    if (!opinion) {
      throw new NotFoundException('Opinion not found');
    }
    const request = await repositories.opinionRequests.findActiveById(
      opinion.requestId,
    );
    if (!request) {
      throw new NotFoundException('Opinion not found');
    }
    return opinion;
  }

  async listForRequest(requestId: number): Promise<Opinion[]> {
    const repositories = this.unitOfWork.repositories;
    const request = await repositories.opinionRequests.findActiveById(requestId);
    if (!request) {
      throw new NotFoundException('Opinion request not found');
    }
    return repositories.opinions.findByRequestId(requestId);
  }

  private async loadOpinionForMutation(
    repositories: WorkflowRepositories,
    opinionId: number,
  ) {
    const opinion = await repositories.opinions.findById(opinionId);
    if (!opinion) {
      throw new NotFoundException('Opinion not found');
    }
    const loaded = await this.mutation.loadForMutation(
      repositories,
      opinion.requestId,
    );
    return { opinion, ...loaded };
  }

  private assertAuthor(opinion: Opinion, actor: Actor, action: string): void {
    if (opinion.expertId !== actor.id) {
      throw new ForbiddenException(`Only the author can ${action} this opinion`);
    }
  }

  private async findAuthorAssignment(
    repositories: WorkflowRepositories,
    requestId: number,
    departmentId: number,
    author: Pick<Actor, 'id' | 'departmentId'>,
  ): Promise<RequestAssignment | null> {
    const assignments = await repositories.assignments.findByRequestId(
      requestId,
    );
    const forDepartment = assignments.filter(
      (assignment) => assignment.departmentId === departmentId,
    );

    return (
      forDepartment.find((assignment) => assignment.expertId === author.id) ??
      forDepartment.find(
        (assignment) =>
          assignment.expertId === null && author.departmentId === departmentId,
      ) ??
      null
    );
  }

  private async syncAssignmentSnapshot(
    repositories: WorkflowRepositories,
    opinion: Opinion,
    statusId: number,
  ): Promise<void> {
    const assignment = await this.findAuthorAssignment(
      repositories,
      opinion.requestId,
      opinion.departmentId,
      { id: opinion.expertId, departmentId: opinion.departmentId },
    );
    if (assignment) {
      await repositories.assignments.update(assignment.id, { statusId });
    }
  }
}
