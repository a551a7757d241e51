import { NotFoundException } from '@nestjs/common';
import {
  InMemoryWorkflowStore,
  InMemoryWorkflowUnitOfWork,
} from '../../../../test/utils/in-memory-workflow.store';
import { WorkflowStatusName } from '../enums/workflow-status-name.enum';
import { WorkflowStatusRegistry } from './workflow-status-registry.domain.service';

describe('WorkflowStatusRegistry', () => {
  let store: InMemoryWorkflowStore;
  let unitOfWork: InMemoryWorkflowUnitOfWork;
  let registry: WorkflowStatusRegistry;

  beforeEach(() => {
    store = new InMemoryWorkflowStore();
    store.seedStatuses([
      WorkflowStatusName.UNASSIGNED,
      'archived',
      WorkflowStatusName.IN_REVIEW,
    ]);
    unitOfWork = new InMemoryWorkflowUnitOfWork(store);
    registry = new WorkflowStatusRegistry(unitOfWork);
  });

  it('should resolve seeded statuses by name and id', async () => {
    const inReview = await registry.getByName(WorkflowStatusName.IN_REVIEW);

    expect(inReview).toEqual({
      id: 3,
      name: WorkflowStatusName.IN_REVIEW,
      description: null,
    });
    expect(await registry.getById(1)).toMatchObject({
      name: WorkflowStatusName.UNASSIGNED,
    });
  });

  it('should ignore rows with unknown names', async () => {
    const all = await registry.getAll();

    expect(all.map((status) => status.name)).toEqual([
      WorkflowStatusName.UNASSIGNED,
      WorkflowStatusName.IN_REVIEW,
    ]);
    await expect(registry.getById(2)).rejects.toThrow(NotFoundException);
  });

  it('should fail when a status was never seeded', async () => {
    await expect(
      registry.getByName(WorkflowStatusName.COMPLETED),
    ).rejects.toThrow('Workflow status not found: completed');
  });

  it('should load the catalogue once', async () => {
    const findAll = jest.spyOn(unitOfWork.repositories.statuses, 'findAll');

    await Promise.all([
      registry.getByName(WorkflowStatusName.UNASSIGNED),
      registry.getById(3),
    ]);
    await registry.getAll();
    expect(findAll).toHaveBeenCalledTimes(1);
  });
});
