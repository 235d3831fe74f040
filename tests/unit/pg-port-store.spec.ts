import type { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { PgPortStoreAdapter } from '../../src/adapters/pg-port-store.adapter';

function createQueryResult<T extends QueryResultRow>(
  rows: T[] = [],
  rowCount?: number,
): QueryResult<T> {
  return {
    rows,
    rowCount: rowCount ?? rows.length,
    command: '',
    oid: 0,
    fields: [],
  };
}

function createMockPool() {
  const release = jest.fn();
  const clientQuery = jest.fn<
    Promise<QueryResult<QueryResultRow>>,
    [string, unknown[]?]
  >();
  const connect = jest.fn<Promise<PoolClient>, []>().mockResolvedValue({
    query: clientQuery,
    release,
  } as unknown as PoolClient);

  const pool = { connect } as unknown as Pool;

  return { pool, connect, clientQuery, release };
}

describe('PgPortStoreAdapter', () => {
  describe('getContainer', () => {
    it('should return null when the container does not exist', async () => {
      const { pool, clientQuery, release } = createMockPool();
      clientQuery.mockResolvedValueOnce(createQueryResult([]));
      const adapter = new PgPortStoreAdapter(pool);

      await expect(adapter.getContainer('C9999')).resolves.toBeNull();
      expect(clientQuery.mock.calls[0][1]).toEqual(['C9999']);
      expect(release).toHaveBeenCalledTimes(1);
    });

    it('should map driver values into container details', async () => {
      const { pool, clientQuery } = createMockPool();
      const checkIn = new Date(2025, 2, 14, 8, 0, 0);
      clientQuery.mockResolvedValueOnce(
        createQueryResult([
          {
            container_id: 'C1001',
            operation_type: 'loading',
            weight: 12000,
            storage_id: 3,
            storage_status: 'incomplete',
            transportation_id: 'truck101',
            check_in: checkIn,
            check_out: '2025-03-14 08:45:00',
          },
        ]),
      );
      const adapter = new PgPortStoreAdapter(pool);

      await expect(adapter.getContainer('C1001')).resolves.toEqual({
        container_id: 'C1001',
        operation_type: 'loading',
        weight: 12000,
        storage_id: 3,
        storage_status: 'incomplete',
        transportation_id: 'truck101',
        check_in: checkIn,
        check_out: new Date(2025, 2, 14, 8, 45, 0),
      });
      expect(clientQuery.mock.calls[0][0]).toContain(
        'LEFT JOIN storage s ON c.container_id = s.container_id',
      );
    });

    it('should release the client when the query fails', async () => {
      const { pool, clientQuery, release } = createMockPool();
      clientQuery.mockRejectedValueOnce(new Error('connection reset'));
      const adapter = new PgPortStoreAdapter(pool);

      await expect(adapter.getContainer('C1001')).rejects.toThrow(
        'connection reset',
      );
      expect(release).toHaveBeenCalledTimes(1);
    });
  });

  describe('updateStorageStatus', () => {
    it('should update by container id and return rows affected', async () => {
      const { pool, clientQuery } = createMockPool();
      clientQuery.mockResolvedValueOnce(createQueryResult([], 1));
      const adapter = new PgPortStoreAdapter(pool);

      await expect(adapter.updateStorageStatus('C1001', 'complete')).resolves.toBe(1);
      expect(clientQuery).toHaveBeenCalledWith(
        'UPDATE storage SET storage_status = $1 WHERE container_id = $2',
        ['complete', 'C1001'],
      );
    });
  });

  describe('updateTransportTimestamps', () => {
    it('should set only check_in when only checkIn is supplied', async () => {
      const { pool, clientQuery } = createMockPool();
      clientQuery.mockResolvedValueOnce(createQueryResult([], 1));
      const adapter = new PgPortStoreAdapter(pool);

      await adapter.updateTransportTimestamps('truck101', {
        checkIn: '2025-03-14 08:00:00',
      });

      expect(clientQuery).toHaveBeenCalledWith(
        'UPDATE transport_mean SET check_in = $1 WHERE transportation_id = $2',
        ['2025-03-14 08:00:00', 'truck101'],
      );
    });

    it('should set both columns when both are supplied', async () => {
      const { pool, clientQuery } = createMockPool();
      clientQuery.mockResolvedValueOnce(createQueryResult([], 0));
      const adapter = new PgPortStoreAdapter(pool);

      await expect(
        adapter.updateTransportTimestamps('truck404', {
          checkIn: '2025-03-14 08:00:00',
          checkOut: '2025-03-14 08:45:00',
        }),
      ).resolves.toBe(0);

      expect(clientQuery).toHaveBeenCalledWith(
        'UPDATE transport_mean SET check_in = $1, check_out = $2 WHERE transportation_id = $3',
        ['2025-03-14 08:00:00', '2025-03-14 08:45:00', 'truck404'],
      );
    });

    it('should not touch the pool when nothing is supplied', async () => {
      const { pool, connect } = createMockPool();
      const adapter = new PgPortStoreAdapter(pool);

      await expect(adapter.updateTransportTimestamps('truck101', {})).resolves.toBe(0);
      expect(connect).not.toHaveBeenCalled();
    });
  });

  describe('appendProcessInstanceCompletion', () => {
    it('should read then write the description on one client', async () => {
      const { pool, connect, clientQuery } = createMockPool();
      clientQuery
        .mockResolvedValueOnce(createQueryResult([{ description: 'Started: x' }]))
        .mockResolvedValueOnce(createQueryResult([], 1));
      const adapter = new PgPortStoreAdapter(pool);

      await expect(
        adapter.appendProcessInstanceCompletion('42', ', Status: completed'),
      ).resolves.toBe(1);

      expect(connect).toHaveBeenCalledTimes(1);
      expect(clientQuery.mock.calls[1]).toEqual([
        'UPDATE process_instance SET description = $1 WHERE process_instance_key = $2',
        ['Started: x, Status: completed', '42'],
      ]);
    });

    it('should return 0 without updating when the key is unknown', async () => {
      const { pool, clientQuery } = createMockPool();
      clientQuery.mockResolvedValueOnce(createQueryResult([]));
      const adapter = new PgPortStoreAdapter(pool);

      await expect(
        adapter.appendProcessInstanceCompletion('404', ', Status: completed'),
      ).resolves.toBe(0);
      expect(clientQuery).toHaveBeenCalledTimes(1);
    });
  });

  describe('upsertProcessInstance', () => {
    it('should insert with ON CONFLICT replacing the description', async () => {
      const { pool, clientQuery } = createMockPool();
      clientQuery.mockResolvedValueOnce(createQueryResult([], 1));
      const adapter = new PgPortStoreAdapter(pool);

      await adapter.upsertProcessInstance('42', 'Started: x');

      const [text, params] = clientQuery.mock.calls[0];
      expect(text).toContain(
        'ON CONFLICT (process_instance_key) DO UPDATE SET description = EXCLUDED.description',
      );
      expect(params).toEqual(['42', 'Started: x']);
    });
  });

  describe('listScenarioRows', () => {
    it('should reject rows with an unknown storage status', async () => {
      const { pool, clientQuery } = createMockPool();
      clientQuery.mockResolvedValueOnce(
        createQueryResult([
          {
            container_id: 'C1',
            operation_type: 'loading',
            weight: 1,
            transportation_id: 'ship1',
            check_in: null,
            check_out: null,
            storage_status: 'lost',
          },
        ]),
      );
      const adapter = new PgPortStoreAdapter(pool);

      await expect(adapter.listScenarioRows()).rejects.toThrow(
        'Unknown storage_status lost for container C1',
      );
    });
  });

  describe('listProcessInstances', () => {
    it('should map BIGINT keys to strings', async () => {
      const { pool, clientQuery } = createMockPool();
      clientQuery.mockResolvedValueOnce(
        createQueryResult([
          { process_instance_key: '2251799813685249', description: 'b' },
          { process_instance_key: 7, description: null },
        ]),
      );
      const adapter = new PgPortStoreAdapter(pool);

      await expect(adapter.listProcessInstances()).resolves.toEqual([
        { process_instance_key: '2251799813685249', description: 'b' },
        { process_instance_key: '7', description: null },
      ]);
    });
  });
});
