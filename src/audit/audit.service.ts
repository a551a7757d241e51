import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';

export interface WorkflowEventData {
  userId: string | number;
  event: WorkflowEventType;
  requestId?: number;
  success: boolean;
  errorMessage?: string;
  metadata?: Record<string, unknown>; // Additional event-specific data
}

export enum WorkflowEventType {
  REQUEST_CREATED = 'REQUEST_CREATED',
  REQUEST_UPDATED = 'REQUEST_UPDATED',
  REQUEST_DELETED = 'REQUEST_DELETED',
  REQUEST_ASSIGNED = 'REQUEST_ASSIGNED',
  REQUEST_REASSIGNED = 'REQUEST_REASSIGNED',
  REQUEST_STATUS_CHANGED = 'REQUEST_STATUS_CHANGED',
  OPINION_CREATED = 'OPINION_CREATED',
  OPINION_UPDATED = 'OPINION_UPDATED',
  OPINION_SUBMITTED = 'OPINION_SUBMITTED',
  OPINION_REVIEWED = 'OPINION_REVIEWED',
  DOCUMENTS_UPLOADED = 'DOCUMENTS_UPLOADED',
  DOCUMENT_DELETED = 'DOCUMENT_DELETED',
  DOCUMENT_DOWNLOADED = 'DOCUMENT_DOWNLOADED',
  REMARK_ADDED = 'REMARK_ADDED',
  INTERDEPARTMENTAL_COMMUNICATION_CREATED = 'INTERDEPARTMENTAL_COMMUNICATION_CREATED',
  WORKFLOW_ACTION_DENIED = 'WORKFLOW_ACTION_DENIED',
  INACTIVE_ACTOR_REJECTED = 'INACTIVE_ACTOR_REJECTED',
}

/**
 * Audit Service for structured logging of workflow events
 *
 * This is the operational log stream (one JSON line per event). The
 * persisted, per-request WorkflowHistory is written by the
 * WorkflowHistoryRecorder inside each transaction.
 *
 * Rules:
 * - Log entries carry ids, event type and outcome only
 * - NO document contents, opinion text or remark text
 * - NO raw tokens
 */
@Injectable()
export class AuditService {
  constructor(private configService: ConfigService<AllConfigType>) {}

  /**
   * Log a workflow event
   *
   * Emitted after the owning transaction commits, so a failed action
   * only appears here with success: false.
   */
  logWorkflowEvent(data: WorkflowEventData): void {
    const logEntry = {
      timestamp: new Date().toISOString(),
      service: this.configService.get('app.name', { infer: true }),
      component: 'opinion-workflow',
      userId: data.userId,
      event: data.event,
      requestId: data.requestId,
      success: data.success,
      errorType: data.errorMessage
        ? this.sanitizeErrorMessage(data.errorMessage)
        : undefined,
      environment: this.configService.get('app.nodeEnv', { infer: true }),
      ...(data.metadata ? { metadata: data.metadata } : {}),
    };

    // Structured JSON logging, one event per line
    console.info(JSON.stringify(logEntry));
  }

  /**
   * Sanitize error messages to prevent logging of sensitive data
   */
  private sanitizeErrorMessage(error: string): string {
    return error
      .replace(
        /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
        '[EMAIL_REDACTED]',
      )
      .replace(/Bearer\s+[^\s]+/gi, 'Bearer [TOKEN_REDACTED]')
      .replace(/token[:\s]+[^\s]+/gi, 'token: [REDACTED]')
      .substring(0, 500);
  }
}
