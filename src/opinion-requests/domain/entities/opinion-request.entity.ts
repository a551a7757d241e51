import { RequestPriority } from '../enums/request-priority.enum';

/**
 * Free-text sections of a request, all optional.
 */
export interface OpinionRequestSections {
  requestStatement: string | null;
  challengesOpportunities: string | null;
  subjectContent: string | null;
  alternatives: string | null;
  expectedImpact: string | null;
  potentialRisks: string | null;
  studiesStatistics: string | null;
  legalFinancialOpinions: string | null;
  stakeholderFeedback: string | null;
  workPlan: string | null;
  decisionDraft: string | null;
}

export const OPINION_REQUEST_SECTION_KEYS: ReadonlyArray<
  keyof OpinionRequestSections
> = [
  'requestStatement',
  'challengesOpportunities',
  'subjectContent',
  'alternatives',
  'expectedImpact',
  'potentialRisks',
  'studiesStatistics',
  'legalFinancialOpinions',
  'stakeholderFeedback',
  'workPlan',
  'decisionDraft',
];

/**
 * Aggregate root of the workflow.
 *
 * Invariants:
 * - `version` starts at 1 and grows by exactly 1 per successful mutation
 * - Soft-deleted requests are hidden from every active query, children included
 */
export interface OpinionRequest extends OpinionRequestSections {
  id: number;
  referenceNumber: string;
  title: string;
  description: string | null;
  requesterId: number;
  departmentId: number;
  categoryId: number;
  subcategoryId: number | null;
  priority: RequestPriority;
  currentStatusId: number;
  dueDate: Date | null;
  version: number;
  isDeleted: boolean;
  deletedBy: number | null;
  deletedAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Fields the engine writes on a request besides `version` and `updatedAt`.
 */
export type OpinionRequestChanges = Partial<
  Omit<
    OpinionRequest,
    'id' | 'referenceNumber' | 'requesterId' | 'version' | 'createdAt' | 'updatedAt'
  >
>;

export type NewOpinionRequest = Omit<
  OpinionRequest,
  'id' | 'createdAt' | 'updatedAt'
>;
