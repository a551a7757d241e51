import { ForbiddenException, Injectable, Logger } from '@nestjs/common';
import { plainToClass } from 'class-transformer';
import { Readable } from 'stream';
import { AuditService, WorkflowEventType } from '../audit/audit.service';
import { Actor } from '../auth/domain/actor';
import { InterdepartmentalCommunication } from './domain/entities/interdepartmental-communication.entity';
import { Opinion } from './domain/entities/opinion.entity';
import { OpinionRequest } from './domain/entities/opinion-request.entity';
import { RequestAssignment } from './domain/entities/request-assignment.entity';
import { RequestDocument } from './domain/entities/request-document.entity';
import { WorkflowStatusName } from './domain/enums/workflow-status-name.enum';
import { OpinionDomainService } from './domain/services/opinion.domain.service';
import {
  AssignmentResult,
  OpinionRequestWorkflowDomainService,
} from './domain/services/opinion-request-workflow.domain.service';
import { OpinionStatisticsDomainService } from './domain/services/opinion-statistics.domain.service';
import { RequestDocumentDomainService } from './domain/services/request-document.domain.service';
import { WorkflowStatusRegistry } from './domain/services/workflow-status-registry.domain.service';
import { IncomingFile } from './domain/utils/upload-policy.util';
import { AddRemarkDto } from './dto/add-remark.dto';
import { AssignRequestDto } from './dto/assign-request.dto';
import { AssignmentResultResponseDto } from './dto/assignment-result-response.dto';
import { ChangeStatusDto } from './dto/change-status.dto';
import { CommunicationResponseDto } from './dto/communication-response.dto';
import { CreateOpinionDto } from './dto/create-opinion.dto';
import { CreateOpinionRequestDto } from './dto/create-opinion-request.dto';
import { DepartmentStatisticsResponseDto } from './dto/department-statistics-response.dto';
import { DocumentsUploadResponseDto } from './dto/documents-upload-response.dto';
import { OpinionRequestDetailsResponseDto } from './dto/opinion-request-details-response.dto';
import { OpinionRequestListQueryDto } from './dto/opinion-request-list-query.dto';
import { OpinionRequestResponseDto } from './dto/opinion-request-response.dto';
import { OpinionResponseDto } from './dto/opinion-response.dto';
import { OpinionResultResponseDto } from './dto/opinion-result-response.dto';
import { PaginatedOpinionRequestsResponseDto } from './dto/paginated-opinion-requests-response.dto';
import { ReassignRequestDto } from './dto/reassign-request.dto';
import { RemarkResponseDto } from './dto/remark-response.dto';
import { RequestAssignmentResponseDto } from './dto/request-assignment-response.dto';
import { RequestDocumentResponseDto } from './dto/request-document-response.dto';
import { ReviewOpinionDto } from './dto/review-opinion.dto';
import { StatisticsQueryDto } from './dto/statistics-query.dto';
import { UpdateOpinionDto } from './dto/update-opinion.dto';
import { UpdateOpinionRequestDto } from './dto/update-opinion-request.dto';
import { WorkflowHistoryResponseDto } from './dto/workflow-history-response.dto';

const exposed = { excludeExtraneousValues: true };

export interface DocumentDownloadResponse {
  fileName: string;
  fileType: string;
  fileSize: number;
  stream: Readable;
}

/**
 * OpinionRequestsService
 *
 * Application layer over the workflow domain services:
 * - Maps DTOs to domain input and domain objects to response DTOs
 * - Emits one audit event per workflow action, success or failure
 *
 * Business rules live in the domain services.
 */
@Injectable()
export class OpinionRequestsService {
  private readonly logger = new Logger(OpinionRequestsService.name);

  constructor(
    private readonly workflow: OpinionRequestWorkflowDomainService,
    private readonly opinions: OpinionDomainService,
    private readonly documents: RequestDocumentDomainService,
    private readonly statistics: OpinionStatisticsDomainService,
    private readonly statusRegistry: WorkflowStatusRegistry,
    private readonly auditService: AuditService,
  ) {}

  async createRequest(
    actor: Actor,
    dto: CreateOpinionRequestDto,
    files: IncomingFile[],
  ): Promise<OpinionRequestDetailsResponseDto> {
    const { request } = await this.audited(
      actor,
      WorkflowEventType.REQUEST_CREATED,
      undefined,
      () => this.workflow.createRequest(actor, dto, files),
      (result) => ({
        requestId: result.request.id,
        fileCount: result.documents.length,
      }),
    );
    return this.getRequest(request.id);
  }

  async updateRequest(
    requestId: number,
    actor: Actor,
    dto: UpdateOpinionRequestDto,
  ): Promise<OpinionRequestResponseDto> {
    const { expectedVersion, ...patch } = dto;
    const request = await this.audited(
      actor,
      WorkflowEventType.REQUEST_UPDATED,
      requestId,
      () =>
        this.workflow.updateRequest(requestId, actor, patch, expectedVersion),
      (updated) => ({ version: updated.version }),
    );
    return this.toRequestDto(request);
  }

  async deleteRequest(requestId: number, actor: Actor): Promise<void> {
    await this.audited(actor, WorkflowEventType.REQUEST_DELETED, requestId, () =>
      this.workflow.deleteRequest(requestId, actor),
    );
  }

  async assignRequest(
    requestId: number,
    actor: Actor,
    dto: AssignRequestDto,
  ): Promise<AssignmentResultResponseDto> {
    const result = await this.audited(
      actor,
      WorkflowEventType.REQUEST_ASSIGNED,
      requestId,
      () => this.workflow.assignRequest(requestId, actor, dto),
      ({ assignment }) => ({
        assignmentId: assignment.id,
        departmentId: assignment.departmentId,
      }),
    );

    if (result.communication) {
      this.auditService.logWorkflowEvent({
        userId: actor.id,
        event: WorkflowEventType.INTERDEPARTMENTAL_COMMUNICATION_CREATED,
        requestId,
        success: true,
        metadata: {
          communicationId: result.communication.id,
          toDepartmentId: result.communication.toDepartmentId,
        },
      });
    }

    return this.toAssignmentResultDto(result);
  }

  async reassignRequest(
    assignmentId: number,
    actor: Actor,
    dto: ReassignRequestDto,
  ): Promise<AssignmentResultResponseDto> {
    const result = await this.audited(
      actor,
      WorkflowEventType.REQUEST_REASSIGNED,
      undefined,
      () => this.workflow.reassignRequest(assignmentId, actor, dto),
      ({ request }) => ({ requestId: request.id, assignmentId }),
    );
    return this.toAssignmentResultDto(result);
  }

  async changeStatus(
    requestId: number,
    actor: Actor,
    dto: ChangeStatusDto,
  ): Promise<OpinionRequestResponseDto> {
    const request = await this.audited(
      actor,
      WorkflowEventType.REQUEST_STATUS_CHANGED,
      requestId,
      () =>
        this.workflow.changeStatus(requestId, actor, dto.status, dto.remarks),
      () => ({ status: dto.status }),
    );
    return this.toRequestDto(request);
  }

  async addRemark(
    requestId: number,
    actor: Actor,
    dto: AddRemarkDto,
  ): Promise<RemarkResponseDto> {
    const remark = await this.audited(
      actor,
      WorkflowEventType.REMARK_ADDED,
      requestId,
      () => this.workflow.addRemark(requestId, actor, dto.content),
      (created) => ({ remarkId: created.id }),
    );
    return plainToClass(RemarkResponseDto, remark, exposed);
  }

  async getRequest(requestId: number): Promise<OpinionRequestDetailsResponseDto> {
    const details = await this.workflow.getRequest(requestId);
    return plainToClass(
      OpinionRequestDetailsResponseDto,
      {
        ...details.request,
        status: details.status.name,
        assignments: details.assignments,
        opinions: details.opinions,
        documents: details.documents,
        remarks: details.remarks,
        communications: details.communications,
      },
      exposed,
    );
  }

  async listRequests(
    query: OpinionRequestListQueryDto,
  ): Promise<PaginatedOpinionRequestsResponseDto> {
    const result = await this.workflow.listRequests(query);
    const statuses = await this.statusRegistry.getAll();
    const namesById = new Map(statuses.map((status) => [status.id, status.name]));

    return {
      data: result.data.map((request) =>
        this.toRequestDtoWithStatus(
          request,
          namesById.get(request.currentStatusId) ?? WorkflowStatusName.UNASSIGNED,
        ),
      ),
      total: result.total,
      skip: result.skip,
      limit: result.limit,
      hasNextPage: result.skip + result.limit < result.total,
    };
  }

  async getHistory(requestId: number): Promise<WorkflowHistoryResponseDto[]> {
    const history = await this.workflow.getHistory(requestId);
    return history.map((entry) =>
      plainToClass(WorkflowHistoryResponseDto, entry, exposed),
    );
  }

  async uploadDocuments(
    requestId: number,
    actor: Actor,
    files: IncomingFile[],
    remarks?: string,
  ): Promise<DocumentsUploadResponseDto> {
    const result = await this.audited(
      actor,
      WorkflowEventType.DOCUMENTS_UPLOADED,
      requestId,
      () => this.documents.uploadDocuments(requestId, actor, files, remarks),
      ({ documents }) => ({
        documentIds: documents.map((document) => document.id),
      }),
    );
    return {
      request: await this.toRequestDto(result.request),
      documents: result.documents.map((document) =>
        this.toDocumentDto(document),
      ),
    };
  }

  async deleteDocument(documentId: number, actor: Actor): Promise<void> {
    await this.audited(
      actor,
      WorkflowEventType.DOCUMENT_DELETED,
      undefined,
      () => this.documents.deleteDocument(documentId, actor),
      (document) => ({ requestId: document.requestId, documentId }),
    );
  }

  async downloadDocument(
    documentId: number,
    actor: Actor,
  ): Promise<DocumentDownloadResponse> {
    const { document, stream } = await this.audited(
      actor,
      WorkflowEventType.DOCUMENT_DOWNLOADED,
      undefined,
      () => this.documents.downloadDocument(documentId),
      (download) => ({ requestId: download.document.requestId, documentId }),
    );
    return {
      fileName: document.fileName,
      fileType: document.fileType,
      fileSize: document.fileSize,
      stream,
    };
  }

  async createOpinion(
    actor: Actor,
    dto: CreateOpinionDto,
  ): Promise<OpinionResultResponseDto> {
    const { requestId, ...input } = dto;
    const result = await this.audited(
      actor,
      WorkflowEventType.OPINION_CREATED,
      requestId,
      () => this.opinions.createOpinion(requestId, actor, input),
      ({ opinion }) => ({ opinionId: opinion.id }),
    );
    return this.toOpinionResultDto(result.opinion, result.request);
  }

  async updateOpinion(
    opinionId: number,
    actor: Actor,
    dto: UpdateOpinionDto,
  ): Promise<OpinionResultResponseDto> {
    const result = await this.audited(
      actor,
      WorkflowEventType.OPINION_UPDATED,
      undefined,
      () => this.opinions.updateOpinion(opinionId, actor, dto),
      ({ request }) => ({ requestId: request.id, opinionId }),
    );
    return this.toOpinionResultDto(result.opinion, result.request);
  }

  async submitOpinion(
    opinionId: number,
    actor: Actor,
  ): Promise<OpinionResultResponseDto> {
    const result = await this.audited(
      actor,
      WorkflowEventType.OPINION_SUBMITTED,
      undefined,
      () => this.opinions.submitOpinion(opinionId, actor),
      ({ request }) => ({ requestId: request.id, opinionId }),
    );
    return this.toOpinionResultDto(result.opinion, result.request);
  }

  async reviewOpinion(
    opinionId: number,
    actor: Actor,
    dto: ReviewOpinionDto,
  ): Promise<OpinionResultResponseDto> {
    const result = await this.audited(
      actor,
      WorkflowEventType.OPINION_REVIEWED,
      undefined,
      () => this.opinions.reviewOpinion(opinionId, actor, dto),
      ({ request }) => ({
        requestId: request.id,
        opinionId,
        approved: dto.approved,
      }),
    );
    return this.toOpinionResultDto(result.opinion, result.request);
  }

  async getOpinion(opinionId: number): Promise<OpinionResponseDto> {
    const opinion = await this.opinions.getOpinion(opinionId);
    return plainToClass(OpinionResponseDto, opinion, exposed);
  }

  async listOpinions(requestId: number): Promise<OpinionResponseDto[]> {
    const opinions = await this.opinions.listForRequest(requestId);
    return opinions.map((opinion) =>
      plainToClass(OpinionResponseDto, opinion, exposed),
    );
  }

  async departmentStatistics(
    departmentId: number,
    query: StatisticsQueryDto,
  ): Promise<DepartmentStatisticsResponseDto> {
    const stats = await this.statistics.departmentStats(
      departmentId,
      query.from,
      query.to,
    );
    return plainToClass(DepartmentStatisticsResponseDto, stats, exposed);
  }

  /**
   * Run a workflow action and emit its audit event. Permission failures
   * are logged as WORKFLOW_ACTION_DENIED; the error is always rethrown.
   */
  private async audited<T>(
    actor: Actor,
    event: WorkflowEventType,
    requestId: number | undefined,
    action: () => Promise<T>,
    describe?: (result: T) => Record<string, unknown>,
  ): Promise<T> {
    try {
      const result = await action();
      const metadata = describe ? describe(result) : undefined;
      const reported = metadata?.requestId;
      this.auditService.logWorkflowEvent({
        userId: actor.id,
        event,
        requestId:
          requestId ?? (typeof reported === 'number' ? reported : undefined),
        success: true,
        metadata,
      });
      return result;
    } catch (error) {
      const denied = error instanceof ForbiddenException;
      const message = error instanceof Error ? error.message : String(error);
      this.auditService.logWorkflowEvent({
        userId: actor.id,
        event: denied ? WorkflowEventType.WORKFLOW_ACTION_DENIED : event,
        requestId,
        success: false,
        errorMessage: message,
        metadata: denied ? { action: event } : undefined,
      });
      this.logger.debug(`${event} failed for user ${actor.id}: ${message}`);
      throw error;
    }
  }

  private async toRequestDto(
    request: OpinionRequest,
  ): Promise<OpinionRequestResponseDto> {
    const status = await this.statusRegistry.getById(request.currentStatusId);
    return this.toRequestDtoWithStatus(request, status.name);
  }

  private toRequestDtoWithStatus(
    request: OpinionRequest,
    status: WorkflowStatusName,
  ): OpinionRequestResponseDto {
    return plainToClass(
      OpinionRequestResponseDto,
      { ...request, status },
      exposed,
    );
  }

  private toDocumentDto(document: RequestDocument): RequestDocumentResponseDto {
    return plainToClass(RequestDocumentResponseDto, document, exposed);
  }

  private async toAssignmentResultDto(
    result: AssignmentResult,
  ): Promise<AssignmentResultResponseDto> {
    return {
      request: await this.toRequestDto(result.request),
      assignment: this.toAssignmentDto(result.assignment),
      communication: result.communication
        ? this.toCommunicationDto(result.communication)
        : null,
    };
  }

  private toAssignmentDto(
    assignment: RequestAssignment,
  ): RequestAssignmentResponseDto {
    return plainToClass(RequestAssignmentResponseDto, assignment, exposed);
  }

  private toCommunicationDto(
    communication: InterdepartmentalCommunication,
  ): CommunicationResponseDto {
    return plainToClass(CommunicationResponseDto, communication, exposed);
  }

  private async toOpinionResultDto(
    opinion: Opinion,
    request: OpinionRequest,
  ): Promise<OpinionResultResponseDto> {
    return {
      opinion: plainToClass(OpinionResponseDto, opinion, exposed),
      request: await this.toRequestDto(request),
    };
  }
}
