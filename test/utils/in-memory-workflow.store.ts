import { Category, Subcategory } from '../../src/opinion-requests/domain/entities/category.entity';
import {
  InterdepartmentalCommunication,
  NewInterdepartmentalCommunication,
} from '../../src/opinion-requests/domain/entities/interdepartmental-communication.entity';
import {
  NewOpinion,
  Opinion,
  OpinionChanges,
} from '../../src/opinion-requests/domain/entities/opinion.entity';
import {
  NewOpinionRequest,
  OpinionRequest,
  OpinionRequestChanges,
} from '../../src/opinion-requests/domain/entities/opinion-request.entity';
import { NewRemark, Remark } from '../../src/opinion-requests/domain/entities/remark.entity';
import {
  NewRequestAssignment,
  RequestAssignment,
  RequestAssignmentChanges,
} from '../../src/opinion-requests/domain/entities/request-assignment.entity';
import {
  NewRequestDocument,
  RequestDocument,
} from '../../src/opinion-requests/domain/entities/request-document.entity';
import {
  NewWorkflowHistory,
  WorkflowHistory,
} from '../../src/opinion-requests/domain/entities/workflow-history.entity';
import { WorkflowStatus } from '../../src/opinion-requests/domain/entities/workflow-status.entity';
import { CategoryRepository } from '../../src/opinion-requests/domain/repositories/category.repository.port';
import { InterdepartmentalCommunicationRepository } from '../../src/opinion-requests/domain/repositories/interdepartmental-communication.repository.port';
import {
  OpinionRequestFilters,
  OpinionRequestRepository,
  StatisticsRow,
} from '../../src/opinion-requests/domain/repositories/opinion-request.repository.port';
import { OpinionRepository } from '../../src/opinion-requests/domain/repositories/opinion.repository.port';
import { RemarkRepository } from '../../src/opinion-requests/domain/repositories/remark.repository.port';
import { RequestAssignmentRepository } from '../../src/opinion-requests/domain/repositories/request-assignment.repository.port';
import { RequestDocumentRepository } from '../../src/opinion-requests/domain/repositories/request-document.repository.port';
import { WorkflowHistoryRepository } from '../../src/opinion-requests/domain/repositories/workflow-history.repository.port';
import { WorkflowStatusRepository } from '../../src/opinion-requests/domain/repositories/workflow-status.repository.port';
import {
  WorkflowRepositories,
  WorkflowUnitOfWork,
} from '../../src/opinion-requests/domain/repositories/workflow-unit-of-work.port';
import { NullableType } from '../../src/utils/types/nullable.type';

export interface InMemoryTables {
  opinionRequests: OpinionRequest[];
  assignments: RequestAssignment[];
  opinions: Opinion[];
  history: WorkflowHistory[];
  documents: RequestDocument[];
  remarks: Remark[];
  communications: InterdepartmentalCommunication[];
  statuses: WorkflowStatus[];
  categories: Category[];
  subcategories: Subcategory[];
}

type Sequences = Record<keyof InMemoryTables, number>;

function emptyTables(): InMemoryTables {
  return {
    opinionRequests: [],
    assignments: [],
    opinions: [],
    history: [],
    documents: [],
    remarks: [],
    communications: [],
    statuses: [],
    categories: [],
    subcategories: [],
  };
}

function emptySequences(): Sequences {
  return {
    opinionRequests: 0,
    assignments: 0,
    opinions: 0,
    history: 0,
    documents: 0,
    remarks: 0,
    communications: 0,
    statuses: 0,
    categories: 0,
    subcategories: 0,
  };
}

function createdWithin(createdAt: Date, from?: Date, to?: Date): boolean {
  if (from && createdAt < from) return false;
  if (to && createdAt > to) return false;
  return true;
}

/**
 * Process-local tables behind the workflow repository ports.
 *
 * Values are cloned on the way in and out, so callers never hold a live
 * row. `now` can be replaced to control timestamps.
 */
export class InMemoryWorkflowStore {
  tables: InMemoryTables = emptyTables();
  sequences: Sequences = emptySequences();
  now: () => Date = () => new Date();

  nextId(table: keyof InMemoryTables): number {
    this.sequences[table] += 1;
    return this.sequences[table];
  }

  seedStatuses(names: readonly string[]): WorkflowStatus[] {
    return names.map((name) => {
      const status: WorkflowStatus = {
        id: this.nextId('statuses'),
        name,
        description: null,
      };
      this.tables.statuses.push(status);
      return status;
    });
  }

  seedCategory(name: string, subcategoryNames: readonly string[] = []) {
    const category: Category = { id: this.nextId('categories'), name };
    this.tables.categories.push(category);
    const subcategories = subcategoryNames.map((subName) => {
      const subcategory: Subcategory = {
        id: this.nextId('subcategories'),
        categoryId: category.id,
        name: subName,
      };
      this.tables.subcategories.push(subcategory);
      return subcategory;
    });
    return { category, subcategories };
  }

  snapshot(): { tables: InMemoryTables; sequences: Sequences } {
    return structuredClone({ tables: this.tables, sequences: this.sequences });
  }

  restore(state: { tables: InMemoryTables; sequences: Sequences }): void {
    this.tables = state.tables;
    this.sequences = state.sequences;
  }
}

class InMemoryOpinionRequestRepository implements OpinionRequestRepository {
  constructor(private readonly store: InMemoryWorkflowStore) {}

  async findActiveById(id: number): Promise<NullableType<OpinionRequest>> {
    const row = this.store.tables.opinionRequests.find(
      (request) => request.id === id && !request.isDeleted,
    );
    return row ? structuredClone(row) : null;
  }

  async existsByReferenceNumber(referenceNumber: string): Promise<boolean> {
    return this.store.tables.opinionRequests.some(
      (request) => request.referenceNumber === referenceNumber,
    );
  }

  async create(data: NewOpinionRequest): Promise<OpinionRequest> {
    if (
      this.store.tables.opinionRequests.some(
        (request) => request.referenceNumber === data.referenceNumber,
      )
    ) {
      throw new Error(`Duplicate reference number ${data.referenceNumber}`);
    }
    const now = this.store.now();
    const row: OpinionRequest = {
      ...structuredClone(data),
      id: this.store.nextId('opinionRequests'),
      createdAt: now,
      updatedAt: now,
    };
    this.store.tables.opinionRequests.push(row);
    return structuredClone(row);
  }

  async updateIfVersion(
    id: number,
    expectedVersion: number,
    changes: OpinionRequestChanges,
  ): Promise<NullableType<OpinionRequest>> {
    const index = this.store.tables.opinionRequests.findIndex(
      (request) => request.id === id && request.version === expectedVersion,
    );
    if (index < 0) {
      return null;
    }
    const row: OpinionRequest = {
      ...this.store.tables.opinionRequests[index],
      ...structuredClone(changes),
      version: expectedVersion + 1,
      updatedAt: this.store.now(),
    };
    this.store.tables.opinionRequests[index] = row;
    return structuredClone(row);
  }

  async findMany(
    filters: OpinionRequestFilters,
    pagination: { skip: number; limit: number },
  ): Promise<{ data: OpinionRequest[]; total: number }> {
    const matching = this.store.tables.opinionRequests
      .filter(
        (request) =>
          !request.isDeleted &&
          (filters.statusId === undefined ||
            request.currentStatusId === filters.statusId) &&
          (filters.departmentId === undefined ||
            request.departmentId === filters.departmentId) &&
          (filters.categoryId === undefined ||
            request.categoryId === filters.categoryId) &&
          (filters.subcategoryId === undefined ||
            request.subcategoryId === filters.subcategoryId) &&
          (filters.priority === undefined ||
            request.priority === filters.priority) &&
          createdWithin(
            request.createdAt,
            filters.createdFrom,
            filters.createdTo,
          ),
      )
      .sort(
        (a, b) =>
          b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id,
      );

    return {
      data: structuredClone(
        matching.slice(pagination.skip, pagination.skip + pagination.limit),
      ),
      total: matching.length,
    };
  }

  async findStatisticsRows(
    departmentId: number,
    window: { from?: Date; to?: Date },
  ): Promise<StatisticsRow[]> {
    return this.store.tables.opinionRequests
      .filter(
        (request) =>
          !request.isDeleted &&
          request.departmentId === departmentId &&
          createdWithin(request.createdAt, window.from, window.to),
      )
      .map((request) => ({
        currentStatusId: request.currentStatusId,
        createdAt: new Date(request.createdAt),
        updatedAt: new Date(request.updatedAt),
      }));
  }
}

class InMemoryRequestAssignmentRepository
  implements RequestAssignmentRepository
{
  constructor(private readonly store: InMemoryWorkflowStore) {}

  async findById(id: number): Promise<NullableType<RequestAssignment>> {
    const row = this.store.tables.assignments.find(
      (assignment) => assignment.id === id,
    );
    return row ? structuredClone(row) : null;
  }

  async findByRequestId(requestId: number): Promise<RequestAssignment[]> {
    return structuredClone(
      this.store.tables.assignments.filter(
        (assignment) => assignment.requestId === requestId,
      ),
    );
  }

  async demotePrimary(requestId: number): Promise<void> {
    for (const assignment of this.store.tables.assignments) {
      if (assignment.requestId === requestId) {
        assignment.isPrimary = false;
      }
    }
  }

  async create(data: NewRequestAssignment): Promise<RequestAssignment> {
    // Mirrors the partial unique index on is_primary
    if (
      data.isPrimary &&
      this.store.tables.assignments.some(
        (assignment) =>
          assignment.requestId === data.requestId && assignment.isPrimary,
      )
    ) {
      throw new Error(
        `Request ${data.requestId} already has a primary assignment`,
      );
    }
    const now = this.store.now();
    const row: RequestAssignment = {
      ...structuredClone(data),
      id: this.store.nextId('assignments'),
      assignedAt: now,
      createdAt: now,
    };
    this.store.tables.assignments.push(row);
    return structuredClone(row);
  }

  async update(
    id: number,
    changes: RequestAssignmentChanges,
  ): Promise<RequestAssignment> {
    const index = this.store.tables.assignments.findIndex(
      (assignment) => assignment.id === id,
    );
    if (index < 0) {
      throw new Error(`Assignment ${id} not found`);
    }
    const row = {
      ...this.store.tables.assignments[index],
      ...structuredClone(changes),
    };
    this.store.tables.assignments[index] = row;
    return structuredClone(row);
  }
}

class InMemoryOpinionRepository implements OpinionRepository {
  constructor(private readonly store: InMemoryWorkflowStore) {}

  async findById(id: number): Promise<NullableType<Opinion>> {
    const row = this.store.tables.opinions.find((opinion) => opinion.id === id);
    return row ? structuredClone(row) : null;
  }

  async findByRequestId(requestId: number): Promise<Opinion[]> {
    return structuredClone(
      this.store.tables.opinions.filter(
        (opinion) => opinion.requestId === requestId,
      ),
    );
  }

  async create(data: NewOpinion): Promise<Opinion> {
    const now = this.store.now();
    const row: Opinion = {
      ...structuredClone(data),
      id: this.store.nextId('opinions'),
      reviewComments: null,
      reviewedBy: null,
      reviewedAt: null,
      submittedAt: null,
      createdAt: now,
      updatedAt: now,
    };
    this.store.tables.opinions.push(row);
    return structuredClone(row);
  }

  async update(id: number, changes: OpinionChanges): Promise<Opinion> {
    const index = this.store.tables.opinions.findIndex(
      (opinion) => opinion.id === id,
    );
    if (index < 0) {
      throw new Error(`Opinion ${id} not found`);
    }
    const row: Opinion = {
      ...this.store.tables.opinions[index],
      ...structuredClone(changes),
      updatedAt: this.store.now(),
    };
    this.store.tables.opinions[index] = row;
    return structuredClone(row);
  }
}

class InMemoryWorkflowHistoryRepository implements WorkflowHistoryRepository {
  constructor(private readonly store: InMemoryWorkflowStore) {}

  async append(entry: NewWorkflowHistory): Promise<WorkflowHistory> {
    const row: WorkflowHistory = {
      ...structuredClone(entry),
      id: this.store.nextId('history'),
      createdAt: this.store.now(),
    };
    this.store.tables.history.push(row);
    return structuredClone(row);
  }

  async findByRequestId(requestId: number): Promise<WorkflowHistory[]> {
    return structuredClone(
      this.store.tables.history.filter((entry) => entry.requestId === requestId),
    );
  }
}

class InMemoryRequestDocumentRepository implements RequestDocumentRepository {
  constructor(private readonly store: InMemoryWorkflowStore) {}

  async findById(id: number): Promise<NullableType<RequestDocument>> {
    const row = this.store.tables.documents.find(
      (document) => document.id === id,
    );
    return row ? structuredClone(row) : null;
  }

  async findByRequestId(requestId: number): Promise<RequestDocument[]> {
    return structuredClone(
      this.store.tables.documents.filter(
        (document) => document.requestId === requestId,
      ),
    );
  }

  async create(data: NewRequestDocument): Promise<RequestDocument> {
    const row: RequestDocument = {
      ...structuredClone(data),
      id: this.store.nextId('documents'),
      createdAt: this.store.now(),
    };
    this.store.tables.documents.push(row);
    return structuredClone(row);
  }

  async delete(id: number): Promise<void> {
    this.store.tables.documents = this.store.tables.documents.filter(
      (document) => document.id !== id,
    );
  }
}

class InMemoryRemarkRepository implements RemarkRepository {
  constructor(private readonly store: InMemoryWorkflowStore) {}

  async create(data: NewRemark): Promise<Remark> {
    const row: Remark = {
      ...structuredClone(data),
      id: this.store.nextId('remarks'),
      createdAt: this.store.now(),
    };
    this.store.tables.remarks.push(row);
    return structuredClone(row);
  }

  async findByRequestId(requestId: number): Promise<Remark[]> {
    return structuredClone(
      this.store.tables.remarks.filter((remark) => remark.requestId === requestId),
    );
  }
}

class InMemoryInterdepartmentalCommunicationRepository
  implements InterdepartmentalCommunicationRepository
{
  constructor(private readonly store: InMemoryWorkflowStore) {}

  async create(
    data: NewInterdepartmentalCommunication,
  ): Promise<InterdepartmentalCommunication> {
    // Mirrors CHK_communications_distinct_departments
    if (data.toDepartmentId === data.fromDepartmentId) {
      throw new Error('Communication must cross department boundaries');
    }
    const now = this.store.now();
    const row: InterdepartmentalCommunication = {
      ...structuredClone(data),
      id: this.store.nextId('communications'),
      createdAt: now,
      updatedAt: now,
    };
    this.store.tables.communications.push(row);
    return structuredClone(row);
  }

  async findByRequestId(
    requestId: number,
  ): Promise<InterdepartmentalCommunication[]> {
    return structuredClone(
      this.store.tables.communications.filter(
        (communication) => communication.requestId === requestId,
      ),
    );
  }
}

class InMemoryReferenceDataRepository
  implements WorkflowStatusRepository, CategoryRepository
{
  constructor(private readonly store: InMemoryWorkflowStore) {}

  async findAll(): Promise<WorkflowStatus[]> {
    return structuredClone(this.store.tables.statuses);
  }

  async findCategoryById(id: number): Promise<NullableType<Category>> {
    const row = this.store.tables.categories.find(
      (category) => category.id === id,
    );
    return row ? structuredClone(row) : null;
  }

  async findSubcategoryById(id: number): Promise<NullableType<Subcategory>> {
    const row = this.store.tables.subcategories.find(
      (subcategory) => subcategory.id === id,
    );
    return row ? structuredClone(row) : null;
  }
}

/**
 * Transactions are serialized; a rejected unit of work restores the
 * snapshot taken when it started.
 */
export class InMemoryWorkflowUnitOfWork extends WorkflowUnitOfWork {
  private readonly bound: WorkflowRepositories;
  private queue: Promise<void> = Promise.resolve();

  constructor(readonly store: InMemoryWorkflowStore) {
    super();
    const referenceData = new InMemoryReferenceDataRepository(store);
    this.bound = {
      opinionRequests: new InMemoryOpinionRequestRepository(store),
      assignments: new InMemoryRequestAssignmentRepository(store),
      opinions: new InMemoryOpinionRepository(store),
      history: new InMemoryWorkflowHistoryRepository(store),
      documents: new InMemoryRequestDocumentRepository(store),
      remarks: new InMemoryRemarkRepository(store),
      communications: new InMemoryInterdepartmentalCommunicationRepository(
        store,
      ),
      statuses: referenceData,
      categories: referenceData,
    };
  }

  get repositories(): WorkflowRepositories {
    return this.bound;
  }

  runInTransaction<T>(
    work: (repositories: WorkflowRepositories) => Promise<T>,
  ): Promise<T> {
    const run = this.queue.then(async () => {
      const snapshot = this.store.snapshot();
      try {
        return await work(this.bound);
      } catch (error) {
        this.store.restore(snapshot);
        throw error;
      }
    });
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
