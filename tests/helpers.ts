import { InMemoryPortStoreAdapter } from '../src/adapters/in-memory-port-store.adapter';
import type { IPortStore } from '../src/interfaces/port-store.interface';
import type { ResolvedPortOperationsOptions } from '../src/interfaces/port-operations-module-options.interface';
import type { IWorkflowClient } from '../src/interfaces/workflow-client.interface';
import type {
  JobKind,
  JobVariables,
  PortJob,
} from '../src/interfaces/step-handler.interface';
import { resolvePortOperationsOptions } from '../src/port-operations.module';

/** 2025-03-14 09:30:00 local time */
export const FIXED_NOW = new Date(2025, 2, 14, 9, 30, 0);
export const FIXED_NOW_TEXT = '2025-03-14 09:30:00';

export function createMockStore(): jest.Mocked<IPortStore> {
  return {
    getContainer: jest.fn().mockResolvedValue(null),
    updateStorageStatus: jest.fn().mockResolvedValue(1),
    updateTransportTimestamps: jest.fn().mockResolvedValue(1),
    listActiveOperations: jest.fn().mockResolvedValue([]),
    listScenarioRows: jest.fn().mockResolvedValue([]),
    upsertProcessInstance: jest.fn().mockResolvedValue(undefined),
    appendProcessInstanceCompletion: jest.fn().mockResolvedValue(1),
    listProcessInstances: jest.fn().mockResolvedValue([]),
  };
}

export function createMockWorkflowClient(): jest.Mocked<IWorkflowClient> {
  let counter = 2251799813685248;
  return {
    createProcessInstance: jest.fn().mockImplementation(async () => ({
      processInstanceKey: String(counter++),
    })),
  };
}

export function createTestOptions(
  overrides: Partial<ResolvedPortOperationsOptions> = {},
): ResolvedPortOperationsOptions {
  return {
    ...resolvePortOperationsOptions({
      store: createSeededStore(),
      clock: () => FIXED_NOW,
      sequentialStartDelayMs: 0,
    }),
    ...overrides,
  };
}

/**
 * Two ships and two trucks. truck102 has only a check-in and is never
 * startable; C1003 is already stored.
 */
export function createSeededStore(): InMemoryPortStoreAdapter {
  return new InMemoryPortStoreAdapter({
    containers: [
      { container_id: 'C1001', operation_type: 'loading', weight: 12000 },
      { container_id: 'C1002', operation_type: 'unloading', weight: 35000 },
      { container_id: 'C1003', operation_type: 'unloading', weight: 18000 },
      { container_id: 'C1004', operation_type: 'loading', weight: 22000 },
    ],
    storage: [
      { container_id: 'C1001', storage_status: 'incomplete' },
      { container_id: 'C1002', storage_status: 'incomplete' },
      { container_id: 'C1003', storage_status: 'complete' },
      { container_id: 'C1004', storage_status: 'incomplete' },
    ],
    transportMeans: [
      {
        transportation_id: 'truck101',
        container_id: 'C1001',
        check_in: '2025-03-14 08:00:00',
        check_out: '2025-03-14 08:45:00',
      },
      { transportation_id: 'ship9101', container_id: 'C1002' },
      { transportation_id: 'ship9102', container_id: 'C1003' },
      {
        transportation_id: 'truck102',
        container_id: 'C1004',
        check_in: '2025-03-14 07:15:00',
      },
    ],
  });
}

export function createJob(
  type: JobKind,
  variables: JobVariables,
  overrides: Partial<PortJob> = {},
): PortJob {
  return {
    key: `job-${type}`,
    type,
    variables,
    ...overrides,
  };
}
