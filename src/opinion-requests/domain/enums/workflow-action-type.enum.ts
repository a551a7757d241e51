export enum WorkflowActionType {
  CREATED = 'created',
  UPDATED = 'updated',
  DELETED = 'deleted',
  ASSIGNED = 'assigned',
  REASSIGNED = 'reassigned',
  STATUS_CHANGED = 'status_changed',
  OPINION_CREATED = 'opinion_created',
  OPINION_UPDATED = 'opinion_updated',
  OPINION_SUBMITTED = 'opinion_submitted',
  OPINION_REVIEWED = 'opinion_reviewed',
  DOCUMENTS_UPLOADED = 'documents_uploaded',
  DOCUMENT_DELETED = 'document_deleted',
  REMARK_ADDED = 'remark_added',
}
