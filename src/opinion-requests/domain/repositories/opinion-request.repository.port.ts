import { NullableType } from '../../../utils/types/nullable.type';
import {
  NewOpinionRequest,
  OpinionRequest,
  OpinionRequestChanges,
} from '../entities/opinion-request.entity';
import { RequestPriority } from '../enums/request-priority.enum';

export interface OpinionRequestFilters {
  statusId?: number;
  departmentId?: number;
  categoryId?: number;
  subcategoryId?: number;
  priority?: RequestPriority;
  createdFrom?: Date;
  createdTo?: Date;
}

export interface StatisticsRow {
  currentStatusId: number;
  createdAt: Date;
  updatedAt: Date;
}

export abstract class OpinionRequestRepository {
  /**
   * Find a request that is not soft deleted.
   *
   * `lock` takes a row lock for the rest of the enclosing transaction.
   */
  abstract findActiveById(
    id: number,
    options?: { lock?: boolean },
  ): Promise<NullableType<OpinionRequest>>;

  abstract existsByReferenceNumber(referenceNumber: string): Promise<boolean>;

  abstract create(data: NewOpinionRequest): Promise<OpinionRequest>;

  /**
   * Compare-and-swap write: applies `changes`, sets `version` to
   * `expectedVersion + 1` and touches `updatedAt`, only when the stored
   * version still equals `expectedVersion`.
   *
   * @returns the updated request, or null when the version did not match
   */
  abstract updateIfVersion(
    id: number,
    expectedVersion: number,
    changes: OpinionRequestChanges,
  ): Promise<NullableType<OpinionRequest>>;

  /**
   * Newest first.
   */
  abstract findMany(
    filters: OpinionRequestFilters,
    pagination: { skip: number; limit: number },
  ): Promise<{ data: OpinionRequest[]; total: number }>;

  abstract findStatisticsRows(
    departmentId: number,
    window: { from?: Date; to?: Date },
  ): Promise<StatisticsRow[]>;
}
