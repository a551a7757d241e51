import { Provider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { Actor } from '../../src/auth/domain/actor';
import { DepartmentRegistryPort } from '../../src/departments/domain/ports/department-registry.port';
import { FileStoragePort } from '../../src/files/domain/ports/file-storage.port';
import { WorkflowStatusName } from '../../src/opinion-requests/domain/enums/workflow-status-name.enum';
import { WorkflowUnitOfWork } from '../../src/opinion-requests/domain/repositories/workflow-unit-of-work.port';
import { InterdepartmentalNotifier } from '../../src/opinion-requests/domain/services/interdepartmental-notifier.domain.service';
import { OpinionDomainService } from '../../src/opinion-requests/domain/services/opinion.domain.service';
import { OpinionRequestWorkflowDomainService } from '../../src/opinion-requests/domain/services/opinion-request-workflow.domain.service';
import { OpinionStatisticsDomainService } from '../../src/opinion-requests/domain/services/opinion-statistics.domain.service';
import { RequestDocumentDomainService } from '../../src/opinion-requests/domain/services/request-document.domain.service';
import { RequestMutationDomainService } from '../../src/opinion-requests/domain/services/request-mutation.domain.service';
import { WorkflowHistoryRecorder } from '../../src/opinion-requests/domain/services/workflow-history-recorder.domain.service';
import { WorkflowStatusRegistry } from '../../src/opinion-requests/domain/services/workflow-status-registry.domain.service';
import { IncomingFile } from '../../src/opinion-requests/domain/utils/upload-policy.util';
import {
  InMemoryWorkflowStore,
  InMemoryWorkflowUnitOfWork,
} from './in-memory-workflow.store';
import { PermissionEnum } from '../../src/roles/permission.enum';
import { RoleEnum } from '../../src/roles/roles.enum';
import { UserDirectoryPort } from '../../src/users/domain/ports/user-directory.port';
import {
  InMemoryDepartmentRegistry,
  InMemoryFileStorage,
  InMemoryUserDirectory,
} from './in-memory-collaborators';

export const HOME_DEPARTMENT_ID = 1;
export const FINANCE_DEPARTMENT_ID = 2;
export const UNKNOWN_DEPARTMENT_ID = 99;

export const EXPERT_ID = 10;
export const FINANCE_EXPERT_ID = 20;
export const INACTIVE_EXPERT_ID = 30;

export const ALLOWED_EXTENSIONS = ['pdf', 'doc', 'docx', 'xls', 'xlsx'];
export const MAX_FILE_SIZE_MB = 10;

function actor(
  id: number,
  role: RoleEnum,
  departmentId: number | null,
  permissions: PermissionEnum[],
): Actor {
  return { id, role, departmentId, isActive: true, permissions };
}

export const actors = {
  requester: actor(1, RoleEnum.user, HOME_DEPARTMENT_ID, [
    PermissionEnum.createOpinionRequest,
  ]),
  coordinator: actor(2, RoleEnum.departmentHead, HOME_DEPARTMENT_ID, [
    PermissionEnum.assignExperts,
    PermissionEnum.manageOpinionRequests,
  ]),
  head: actor(3, RoleEnum.departmentHead, HOME_DEPARTMENT_ID, [
    PermissionEnum.approveOpinionRequests,
  ]),
  expert: actor(EXPERT_ID, RoleEnum.expert, HOME_DEPARTMENT_ID, []),
  financeExpert: actor(FINANCE_EXPERT_ID, RoleEnum.expert, FINANCE_DEPARTMENT_ID, []),
  outsider: actor(40, RoleEnum.viewer, FINANCE_DEPARTMENT_ID, []),
};

export function pdf(name = 'brief.pdf', contents = 'pdf-bytes'): IncomingFile {
  const buffer = Buffer.from(contents);
  return {
    originalName: name,
    mimeType: 'application/pdf',
    size: buffer.length,
    buffer,
  };
}

export const filesConfig = {
  uploadDir: 'uploads',
  maxFileSizeMb: MAX_FILE_SIZE_MB,
  allowedExtensions: ALLOWED_EXTENSIONS,
};

export interface WorkflowFixtures {
  store: InMemoryWorkflowStore;
  unitOfWork: InMemoryWorkflowUnitOfWork;
  fileStorage: InMemoryFileStorage;
  users: InMemoryUserDirectory;
  departments: InMemoryDepartmentRegistry;
  statusId: (name: WorkflowStatusName) => number;
  categoryId: number;
  subcategoryId: number;
  otherCategorySubcategoryId: number;
}

export interface WorkflowHarness extends WorkflowFixtures {
  module: TestingModule;
  workflow: OpinionRequestWorkflowDomainService;
  opinions: OpinionDomainService;
  documents: RequestDocumentDomainService;
  statistics: OpinionStatisticsDomainService;
  statusRegistry: WorkflowStatusRegistry;
}

/**
 * In-memory persistence and collaborators seeded with two departments,
 * three experts, every workflow status and two categories.
 */
export function createWorkflowFixtures(): WorkflowFixtures {
  const store = new InMemoryWorkflowStore();
  const seeded = store.seedStatuses(Object.values(WorkflowStatusName));
  const statusId = (name: WorkflowStatusName): number => {
    const row = seeded.find((candidate) => candidate.name === name);
    if (!row) {
      throw new Error(`Status ${name} was not seeded`);
    }
    return row.id;
  };
  const policy = store.seedCategory('Policy', ['New policy', 'Policy review']);
  const financial = store.seedCategory('Financial', ['Budget']);

  const departments = new InMemoryDepartmentRegistry()
    .add({ id: HOME_DEPARTMENT_ID, name: 'Executive Office', code: 'EXE' })
    .add({ id: FINANCE_DEPARTMENT_ID, name: 'Finance Department', code: 'FIN' });
  const users = new InMemoryUserDirectory()
    .add({ id: EXPERT_ID, isActive: true, departmentId: HOME_DEPARTMENT_ID })
    .add({
      id: FINANCE_EXPERT_ID,
      isActive: true,
      departmentId: FINANCE_DEPARTMENT_ID,
    })
    .add({
      id: INACTIVE_EXPERT_ID,
      isActive: false,
      departmentId: FINANCE_DEPARTMENT_ID,
    });

  return {
    store,
    unitOfWork: new InMemoryWorkflowUnitOfWork(store),
    fileStorage: new InMemoryFileStorage(),
    users,
    departments,
    statusId,
    categoryId: policy.category.id,
    subcategoryId: policy.subcategories[0].id,
    otherCategorySubcategoryId: financial.subcategories[0].id,
  };
}

/**
 * Domain services plus the port bindings onto `fixtures`. ConfigService is
 * left to the caller.
 */
export function workflowProviders(fixtures: WorkflowFixtures): Provider[] {
  return [
    OpinionRequestWorkflowDomainService,
    OpinionDomainService,
    RequestDocumentDomainService,
    OpinionStatisticsDomainService,
    RequestMutationDomainService,
    WorkflowStatusRegistry,
    WorkflowHistoryRecorder,
    InterdepartmentalNotifier,
    { provide: WorkflowUnitOfWork, useValue: fixtures.unitOfWork },
    { provide: FileStoragePort, useValue: fixtures.fileStorage },
    { provide: DepartmentRegistryPort, useValue: fixtures.departments },
    { provide: UserDirectoryPort, useValue: fixtures.users },
  ];
}

export async function createWorkflowHarness(): Promise<WorkflowHarness> {
  const fixtures = createWorkflowFixtures();

  const module = await Test.createTestingModule({
    providers: [
      ...workflowProviders(fixtures),
      {
        provide: ConfigService,
        useValue: new ConfigService({ files: filesConfig }),
      },
    ],
  }).compile();

  return {
    ...fixtures,
    module,
    workflow: module.get(OpinionRequestWorkflowDomainService),
    opinions: module.get(OpinionDomainService),
    documents: module.get(RequestDocumentDomainService),
    statistics: module.get(OpinionStatisticsDomainService),
    statusRegistry: module.get(WorkflowStatusRegistry),
  };
}
