/**
 * Permission names issued by the identity provider.
 *
 * The engine only reads them; storage and assignment of permissions to
 * roles happen outside this service.
 */
export enum PermissionEnum {
  createOpinionRequest = 'create_opinion_request',
  viewOpinionRequests = 'view_opinion_requests',
  reviewOpinionRequests = 'review_opinion_requests',
  manageOpinionRequests = 'manage_opinion_requests',
  approveOpinionRequests = 'approve_opinion_requests',
  rejectOpinionRequests = 'reject_opinion_requests',
  assignExperts = 'assign_experts',
  manageExperts = 'manage_experts',
  systemAdmin = 'system_admin',
  viewAnalytics = 'view_analytics',
  uploadDocuments = 'upload_documents',
  viewDocuments = 'view_documents',
  manageDocuments = 'manage_documents',
  addComments = 'add_comments',
  viewComments = 'view_comments',
  manageComments = 'manage_comments',
}

const KNOWN_PERMISSIONS: ReadonlySet<string> = new Set(
  Object.values(PermissionEnum),
);

export function isPermission(value: string): value is PermissionEnum {
  return KNOWN_PERMISSIONS.has(value);
}
