import type { Pool, PoolClient } from 'pg';
import type {
  ActiveOperation,
  ContainerDetails,
  ProcessInstanceRecord,
  ScenarioRow,
  StorageStatus,
  TransportTimestamps,
} from '../interfaces/port-records.interface';
import type { IPortStore } from '../interfaces/port-store.interface';
import {
  RawRow,
  toContainerDetails,
  toProcessInstanceRecord,
  toScenarioRow,
} from './port-row.mapper';

const CONTAINER_DETAILS_QUERY = `SELECT c.container_id, c.operation_type, c.weight,
       s.storage_id, s.storage_status,
       t.transportation_id, t.check_in, t.check_out
FROM container c
LEFT JOIN storage s ON c.container_id = s.container_id
LEFT JOIN transport_mean t ON c.container_id = t.container_id
WHERE c.container_id = $1
LIMIT 1`;

const SCENARIO_ROWS_QUERY = `SELECT t.container_id, c.operation_type, c.weight,
       t.transportation_id, t.check_in, t.check_out, s.storage_status
FROM transport_mean t
JOIN container c ON t.container_id = c.container_id
JOIN storage s ON t.container_id = s.container_id
ORDER BY t.transportation_id, t.container_id`;

/**
 * node-postgres store. Each operation checks a client out of the pool and
 * releases it before resolving; no connection is held between calls.
 */
export class PgPortStoreAdapter implements IPortStore {
  constructor(private readonly pool: Pool) {}

  async getContainer(containerId: string): Promise<ContainerDetails | null> {
    return this.withClient(async (client) => {
      const result = await client.query<RawRow>(CONTAINER_DETAILS_QUERY, [
        containerId,
      ]);
      if (result.rows.length === 0) return null;
      return toContainerDetails(result.rows[0]);
    });
  }

  async updateStorageStatus(
    containerId: string,
    status: StorageStatus,
  ): Promise<number> {
    return this.withClient(async (client) => {
      const result = await client.query(
        `UPDATE storage SET storage_status = $1 WHERE container_id = $2`,
        [status, containerId],
      );
      return result.rowCount ?? 0;
    });
  }

  async updateTransportTimestamps(
    transportationId: string,
    timestamps: TransportTimestamps,
  ): Promise<number> {
    const assignments: string[] = [];
    const values: string[] = [];
    if (timestamps.checkIn !== undefined) {
      values.push(timestamps.checkIn);
      assignments.push(`check_in = $${values.length}`);
    }
    if (timestamps.checkOut !== undefined) {
      values.push(timestamps.checkOut);
      assignments.push(`check_out = $${values.length}`);
    }
    if (assignments.length === 0) return 0;

    values.push(transportationId);
    return this.withClient(async (client) => {
      const result = await client.query(
        `UPDATE transport_mean SET ${assignments.join(', ')} WHERE transportation_id = $${values.length}`,
        values,
      );
      return result.rowCount ?? 0;
    });
  }

  async listActiveOperations(): Promise<ActiveOperation[]> {
    return this.withClient(async (client) => {
      const result = await client.query<RawRow>(
        `SELECT * FROM active_operations ORDER BY container_id`,
      );
      return result.rows.map(toContainerDetails);
    });
  }

  async listScenarioRows(): Promise<ScenarioRow[]> {
    return this.withClient(async (client) => {
      const result = await client.query<RawRow>(SCENARIO_ROWS_QUERY);
      return result.rows.map(toScenarioRow);
    });
  }

  async upsertProcessInstance(key: string, description: string): Promise<void> {
    await this.withClient((client) =>
      client.query(
        `INSERT INTO process_instance (process_instance_key, description)
         VALUES ($1, $2)
         ON CONFLICT (process_instance_key) DO UPDATE SET description = EXCLUDED.description`,
        [key, description],
      ),
    );
  }

  async appendProcessInstanceCompletion(
    key: string,
    suffix: string,
  ): Promise<number> {
    return this.withClient(async (client) => {
      const current = await client.query<RawRow>(
        `SELECT description FROM process_instance WHERE process_instance_key = $1`,
        [key],
      );
      if (current.rows.length === 0) return 0;

      const existing = current.rows[0].description;
      const description = `${typeof existing === 'string' ? existing : ''}${suffix}`;
      const result = await client.query(
        `UPDATE process_instance SET description = $1 WHERE process_instance_key = $2`,
        [description, key],
      );
      return result.rowCount ?? 0;
    });
  }

  async listProcessInstances(): Promise<ProcessInstanceRecord[]> {
    return this.withClient(async (client) => {
      const result = await client.query<RawRow>(
        `SELECT process_instance_key::text AS process_instance_key, description
         FROM process_instance
         ORDER BY process_instance_key DESC`,
      );
      return result.rows.map(toProcessInstanceRecord);
    });
  }

  private async withClient<T>(
    cb: (client: PoolClient) => Promise<T>,
  ): Promise<T> {
    const client = await this.pool.connect();
    try {
      return await cb(client);
    } finally {
      client.release();
    }
  }
}
