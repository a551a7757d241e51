export interface RequestAssignment {
  id: number;
  requestId: number;
  departmentId: number;
  assignedBy: number;
  expertId: number | null;
  statusId: number;
  assignedAt: Date;
  dueDate: Date | null;
  isPrimary: boolean;
  remarks: string | null;
  createdAt: Date;
}

export type NewRequestAssignment = Omit<
  RequestAssignment,
  'id' | 'assignedAt' | 'createdAt'
>;

export type RequestAssignmentChanges = Partial<
  Pick<RequestAssignment, 'expertId' | 'statusId' | 'dueDate' | 'remarks'>
>;
