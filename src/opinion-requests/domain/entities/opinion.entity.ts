import { OpinionStatus } from '../enums/opinion-status.enum';

export interface Opinion {
  id: number;
  requestId: number;
  departmentId: number;
  expertId: number;
  content: string;
  recommendation: string | null;
  status: OpinionStatus;
  reviewComments: string | null;
  reviewedBy: number | null;
  reviewedAt: Date | null;
  submittedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewOpinion = Pick<
  Opinion,
  'requestId' | 'departmentId' | 'expertId' | 'content' | 'recommendation' | 'status'
>;

export type OpinionChanges = Partial<
  Pick<
    Opinion,
    | 'content'
    | 'recommendation'
    | 'status'
    | 'reviewComments'
    | 'reviewedBy'
    | 'reviewedAt'
    | 'submittedAt'
  >
>;
