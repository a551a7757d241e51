import {
  BadRequestException,
  ForbiddenException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Readable } from 'stream';
import { AllConfigType } from '../../../config/config.type';
import { Actor, actorHasPermission, requireActiveActor } from '../../../auth/domain/actor';
import { PermissionEnum } from '../../../roles/permission.enum';
import { FileStoragePort } from '../../../files/domain/ports/file-storage.port';
import { OpinionRequest } from '../entities/opinion-request.entity';
import { RequestDocument } from '../entities/request-document.entity';
import { WorkflowActionType } from '../enums/workflow-action-type.enum';
import {
  WorkflowRepositories,
  WorkflowUnitOfWork,
} from '../repositories/workflow-unit-of-work.port';
import { callDependency } from '../utils/dependency-call.util';
import {
  IncomingFile,
  UploadPolicy,
  validateUploadBatch,
} from '../utils/upload-policy.util';
import { RequestMutationDomainService } from './request-mutation.domain.service';

export interface DocumentDownload {
  document: RequestDocument;
  stream: Readable;
}

export interface DocumentUploadResult {
  request: OpinionRequest;
  documents: RequestDocument[];
}

/**
 * Request documents
 *
 * Uploads are all-or-nothing: the whole batch is validated before any file
 * is written, and files already written are removed again when storing or
 * persisting a later one fails.
 */
@Injectable()
export class RequestDocumentDomainService {
  private readonly logger = new Logger(RequestDocumentDomainService.name);
  private readonly policy: UploadPolicy;

  constructor(
    private readonly unitOfWork: WorkflowUnitOfWork,
    private readonly mutation: RequestMutationDomainService,
    private readonly fileStorage: FileStoragePort,
    configService: ConfigService<AllConfigType>,
  ) {
    const files = configService.getOrThrow('files', { infer: true });
    this.policy = {
      allowedExtensions: files.allowedExtensions,
      maxFileSizeBytes: files.maxFileSizeMb * 1024 * 1024,
    };
  }

  validateBatch(files: readonly IncomingFile[]): void {
    validateUploadBatch(files, this.policy);
  }

  /**
   * Store each file and create its Document row through `repositories`.
   * Paths written are pushed onto `written` as they land, so the caller can
   * clean up after a rollback.
   */
  async storeBatch(
    repositories: WorkflowRepositories,
    requestId: number,
    uploadedBy: number,
    files: readonly IncomingFile[],
    remarks: string | null,
    written: string[],
  ): Promise<RequestDocument[]> {
    const documents: RequestDocument[] = [];

    for (const file of files) {
      const stored = await callDependency(this.logger, 'File storage', () =>
        this.fileStorage.save(
          file.buffer,
          file.originalName,
          requestId,
          this.policy.maxFileSizeBytes,
        ),
      );
      written.push(stored.path);

      documents.push(
        await repositories.documents.create({
          requestId,
          fileName: file.originalName,
          storedName: stored.storedName,
          filePath: stored.path,
          fileType: file.mimeType,
          fileSize: stored.size,
          uploadedBy,
          remarks,
        }),
      );
    }

    return documents;
  }

  /**
   * Best effort; failures are logged and ignored.
   */
  async discardStoredFiles(paths: readonly string[]): Promise<void> {
    for (const filePath of paths) {
      const removed = await this.fileStorage.remove(filePath).catch(
        (error: unknown) => {
          const message =
            error instanceof Error ? error.message : String(error);
          this.logger.warn(`Stored file cleanup failed: ${message}`);
          return false;
        },
      );
      if (!removed) {
        this.logger.warn('Stored file could not be removed during cleanup');
      }
    }
  }

  async uploadDocuments(
    requestId: number,
    actor: Actor,
    files: readonly IncomingFile[],
    remarks?: string | null,
  ): Promise<DocumentUploadResult> {
    requireActiveActor(actor);
    if (files.length === 0) {
      throw new BadRequestException('At least one file is required');
    }
    this.validateBatch(files);

    const written: string[] = [];
    try {
      return await this.unitOfWork.runInTransaction(async (repositories) => {
        const { request } = await this.mutation.loadForMutation(
          repositories,
          requestId,
        );

        const documents = await this.storeBatch(
          repositories,
          request.id,
          actor.id,
          files,
          remarks ?? null,
          written,
        );

        const updated = await this.mutation.commit(repositories, request, {}, {
          actionType: WorkflowActionType.DOCUMENTS_UPLOADED,
          actorId: actor.id,
          details: {
            fileNames: documents.map((document) => document.fileName),
            documentIds: documents.map((document) => document.id),
            remarks: remarks ?? null,
          },
        });

        return { request: updated, documents };
      });
    } catch (error) {
      await this.discardStoredFiles(written);
      throw error;
    }
  }

  /**
   * Delete a document row; the physical file is removed after commit and a
   * removal failure does not undo the deletion.
   */
  async deleteDocument(
    documentId: number,
    actor: Actor,
  ): Promise<RequestDocument> {
    requireActiveActor(actor);

    const document = await this.unitOfWork.runInTransaction(
      async (repositories) => {
        const found = await repositories.documents.findById(documentId);
        if (!found) {
          throw new NotFoundException('Document not found');
        }

        const { request } = await this.mutation.loadForMutation(
          repositories,
          found.requestId,
        );

        if (
          found.uploadedBy !== actor.id &&
          !actorHasPermission(actor, PermissionEnum.manageDocuments)
        ) {
          throw new ForbiddenException(
            'Only the uploader or a document manager can delete this document',
          );
        }

        await repositories.documents.delete(found.id);
        await this.mutation.commit(repositories, request, {}, {
          actionType: WorkflowActionType.DOCUMENT_DELETED,
          actorId: actor.id,
          details: { documentId: found.id, fileName: found.fileName },
        });

        return found;
      },
    );

    const removed = await this.fileStorage
      .remove(document.filePath)
      .catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(
          `Physical removal of document ${document.id} failed: ${message}`,
        );
        return false;
      });
    if (!removed) {
      this.logger.warn(
        `Document ${document.id} deleted but its file was not removed`,
      );
    }

    return document;
  }

  async downloadDocument(documentId: number): Promise<DocumentDownload> {
    const repositories = this.unitOfWork.repositories;
    const document = await repositories.documents.findById(documentId);
    if (!document) {
      throw new NotFoundException('Document not found');
    }

    const request = await repositories.opinionRequests.findActiveById(
      document.requestId,
    );
    if (!request) {
      throw new NotFoundException('Document not found');
    }

    const stream = await callDependency(this.logger, 'File storage', () =>
      this.fileStorage.read(document.filePath),
    );

    return { document, stream };
  }

  async listForRequest(requestId: number): Promise<RequestDocument[]> {
    const repositories = this.unitOfWork.repositories;
    const request = await repositories.opinionRequests.findActiveById(requestId);
    if (!request) {
      throw new NotFoundException('Opinion request not found');
    }
    return repositories.documents.findByRequestId(requestId);
  }
}
