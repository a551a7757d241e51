import { CommunicationStatus } from '../enums/communication-status.enum';
import { RequestPriority } from '../enums/request-priority.enum';

/**
 * Cross-department correspondence about a request.
 * `toDepartmentId` never equals `fromDepartmentId`.
 */
export interface InterdepartmentalCommunication {
  id: number;
  requestId: number;
  fromDepartmentId: number;
  toDepartmentId: number;
  fromUserId: number;
  toUserId: number | null;
  subject: string;
  content: string;
  priority: RequestPriority;
  status: CommunicationStatus;
  requiresResponse: boolean;
  dueDate: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewInterdepartmentalCommunication = Omit<
  InterdepartmentalCommunication,
  'id' | 'createdAt' | 'updatedAt'
>;
