import { InMemoryPortStoreAdapter } from '../../src/adapters/in-memory-port-store.adapter';
import { createSeededStore } from '../helpers';

describe('InMemoryPortStoreAdapter', () => {
  describe('getContainer', () => {
    it('should join storage and transport details', async () => {
      const store = createSeededStore();

      await expect(store.getContainer('C1001')).resolves.toEqual({
        container_id: 'C1001',
        operation_type: 'loading',
        weight: 12000,
        storage_id: 1,
        storage_status: 'incomplete',
        transportation_id: 'truck101',
        check_in: new Date(2025, 2, 14, 8, 0, 0),
        check_out: new Date(2025, 2, 14, 8, 45, 0),
      });
    });

    it('should return null for unknown containers', async () => {
      await expect(createSeededStore().getContainer('C9999')).resolves.toBeNull();
    });

    it('should left join a container without storage or transport', async () => {
      const store = new InMemoryPortStoreAdapter({
        containers: [
          { container_id: 'C2001', operation_type: 'unloading', weight: 9000 },
        ],
      });

      const container = await store.getContainer('C2001');
      expect(container?.storage_id).toBeNull();
      expect(container?.storage_status).toBeNull();
      expect(container?.transportation_id).toBeNull();
    });

    it('should return copies', async () => {
      const store = createSeededStore();
      const first = await store.getContainer('C1001');
      first?.check_in?.setFullYear(1999);

      const second = await store.getContainer('C1001');
      expect(second?.check_in?.getFullYear()).toBe(2025);
    });
  });

  describe('updateStorageStatus', () => {
    it('should update the storage record and report one row', async () => {
      const store = createSeededStore();

      await expect(store.updateStorageStatus('C1001', 'complete')).resolves.toBe(1);
      expect(store.getStorageStatus('C1001')).toBe('complete');
    });

    it('should report zero rows when no storage record exists', async () => {
      const store = createSeededStore();
      await expect(store.updateStorageStatus('C9999', 'complete')).resolves.toBe(0);
    });
  });

  describe('updateTransportTimestamps', () => {
    it('should set only the supplied column', async () => {
      const store = createSeededStore();

      await expect(
        store.updateTransportTimestamps('truck102', {
          checkOut: '2025-03-14 09:00:00',
        }),
      ).resolves.toBe(1);

      expect(store.getTransportMean('truck102')).toEqual({
        transportation_id: 'truck102',
        container_id: 'C1004',
        check_in: new Date(2025, 2, 14, 7, 15, 0),
        check_out: new Date(2025, 2, 14, 9, 0, 0),
      });
    });

    it('should do nothing when no timestamp is supplied', async () => {
      const store = createSeededStore();
      await expect(store.updateTransportTimestamps('truck101', {})).resolves.toBe(0);
    });

    it('should accept ISO timestamps with a zone designator', async () => {
      const store = createSeededStore();

      await expect(
        store.updateTransportTimestamps('truck102', {
          checkOut: '2025-03-14T09:00:00Z',
        }),
      ).resolves.toBe(1);

      expect(store.getTransportMean('truck102')?.check_out).toEqual(
        new Date(2025, 2, 14, 9, 0, 0),
      );
    });

    it('should reject timestamps that do not parse', async () => {
      const store = createSeededStore();
      await expect(
        store.updateTransportTimestamps('truck101', { checkIn: 'soon' }),
      ).rejects.toThrow('invalid input syntax for type timestamp: "soon"');
    });
  });

  describe('listActiveOperations', () => {
    it('should list containers with incomplete storage ordered by id', async () => {
      const rows = await createSeededStore().listActiveOperations();

      expect(rows.map((row) => [row.container_id, row.transportation_id])).toEqual([
        ['C1001', 'truck101'],
        ['C1002', 'ship9101'],
        ['C1004', 'truck102'],
      ]);
    });
  });

  describe('listScenarioRows', () => {
    it('should inner join and order by transportation id', async () => {
      const store = createSeededStore();
      store.seed({
        transportMeans: [{ transportation_id: 'ship0001', container_id: 'C7777' }],
      });

      const rows = await store.listScenarioRows();
      expect(rows.map((row) => row.transportation_id)).toEqual([
        'ship9101',
        'ship9102',
        'truck101',
        'truck102',
      ]);
      expect(rows[1]).toEqual({
        container_id: 'C1003',
        operation_type: 'unloading',
        weight: 18000,
        transportation_id: 'ship9102',
        check_in: null,
        check_out: null,
        storage_status: 'complete',
      });
    });
  });

  describe('process instances', () => {
    it('should replace the description on upsert', async () => {
      const store = new InMemoryPortStoreAdapter();
      await store.upsertProcessInstance('42', 'first');
      await store.upsertProcessInstance('42', 'second');

      expect(store.getProcessInstanceDescription('42')).toBe('second');
    });

    it('should append a completion suffix to an existing row', async () => {
      const store = new InMemoryPortStoreAdapter();
      await store.upsertProcessInstance('42', 'Started: x');

      await expect(
        store.appendProcessInstanceCompletion('42', ', Status: completed'),
      ).resolves.toBe(1);
      expect(store.getProcessInstanceDescription('42')).toBe(
        'Started: x, Status: completed',
      );
    });

    it('should report zero rows for an unknown key', async () => {
      const store = new InMemoryPortStoreAdapter();
      await expect(
        store.appendProcessInstanceCompletion('404', ', Status: completed'),
      ).resolves.toBe(0);
      expect(store.getProcessInstanceDescription('404')).toBeUndefined();
    });

    it('should list keys newest first by numeric value', async () => {
      const store = new InMemoryPortStoreAdapter({
        processInstances: [
          { process_instance_key: '9', description: 'a' },
          { process_instance_key: '2251799813685249', description: 'b' },
          { process_instance_key: '10', description: null },
        ],
      });

      const keys = (await store.listProcessInstances()).map(
        (record) => record.process_instance_key,
      );
      expect(keys).toEqual(['2251799813685249', '10', '9']);
    });
  });
});
