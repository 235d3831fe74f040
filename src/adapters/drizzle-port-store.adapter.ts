import { sql, SQL } from 'drizzle-orm';
import type { PgDatabase } from 'drizzle-orm/pg-core';
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
  isRawRow,
  RawRow,
  toContainerDetails,
  toProcessInstanceRecord,
  toScenarioRow,
} from './port-row.mapper';

/**
 * Extracts row array from a Drizzle execute() result.
 * Different PG drivers return different shapes:
 * - postgres-js: returns the array directly
 * - node-postgres: returns { rows: [...] }
 */
function extractRows(result: unknown): RawRow[] {
  if (Array.isArray(result)) return result.filter(isRawRow);
  if (isRawRow(result) && Array.isArray(result.rows)) {
    return result.rows.filter(isRawRow);
  }
  return [];
}

/**
 * node-postgres reports `rowCount`, postgres-js `count`.
 */
function extractRowCount(result: unknown): number {
  if (typeof result !== 'object' || result === null) return 0;
  const count =
    'rowCount' in result
      ? result.rowCount
      : 'count' in result
        ? result.count
        : undefined;
  return typeof count === 'number' ? count : 0;
}

export class DrizzlePortStoreAdapter implements IPortStore {
  constructor(private readonly db: PgDatabase<any, any, any>) {}

  async getContainer(containerId: string): Promise<ContainerDetails | null> {
    const result = await this.db.execute(
      sql`SELECT c.container_id, c.operation_type, c.weight, s.storage_id, s.storage_status, t.transportation_id, t.check_in, t.check_out
          FROM container c
          LEFT JOIN storage s ON c.container_id = s.container_id
          LEFT JOIN transport_mean t ON c.container_id = t.container_id
          WHERE c.container_id = ${containerId}
          LIMIT 1`,
    );

    const rows = extractRows(result);
    return rows.length === 0 ? null : toContainerDetails(rows[0]);
  }

  async updateStorageStatus(
    containerId: string,
    status: StorageStatus,
  ): Promise<number> {
    const result = await this.db.execute(
      sql`UPDATE storage SET storage_status = ${status} WHERE container_id = ${containerId}`,
    );
    return extractRowCount(result);
  }

  async updateTransportTimestamps(
    transportationId: string,
    timestamps: TransportTimestamps,
  ): Promise<number> {
    const assignments: SQL[] = [];
    if (timestamps.checkIn !== undefined) {
      assignments.push(sql`check_in = ${timestamps.checkIn}`);
    }
    if (timestamps.checkOut !== undefined) {
      assignments.push(sql`check_out = ${timestamps.checkOut}`);
    }
    if (assignments.length === 0) return 0;

    const result = await this.db.execute(
      sql`UPDATE transport_mean SET ${sql.join(assignments, sql`, `)} WHERE transportation_id = ${transportationId}`,
    );
    return extractRowCount(result);
  }

  async listActiveOperations(): Promise<ActiveOperation[]> {
    const result = await this.db.execute(
      sql`SELECT * FROM active_operations ORDER BY container_id`,
    );
    return extractRows(result).map(toContainerDetails);
  }

  async listScenarioRows(): Promise<ScenarioRow[]> {
    const result = await this.db.execute(
      sql`SELECT t.container_id, c.operation_type, c.weight, t.transportation_id, t.check_in, t.check_out, s.storage_status
          FROM transport_mean t
          JOIN container c ON t.container_id = c.container_id
          JOIN storage s ON t.container_id = s.container_id
          ORDER BY t.transportation_id, t.container_id`,
    );
    return extractRows(result).map(toScenarioRow);
  }

  async upsertProcessInstance(key: string, description: string): Promise<void> {
    await this.db.execute(
      sql`INSERT INTO process_instance (process_instance_key, description)
          VALUES (${key}, ${description})
          ON CONFLICT (process_instance_key) DO UPDATE SET description = EXCLUDED.description`,
    );
  }

  async appendProcessInstanceCompletion(
    key: string,
    suffix: string,
  ): Promise<number> {
    const current = extractRows(
      await this.db.execute(
        sql`SELECT description FROM process_instance WHERE process_instance_key = ${key}`,
      ),
    );
    if (current.length === 0) return 0;

    const existing = current[0].description;
    const description = `${typeof existing === 'string' ? existing : ''}${suffix}`;
    const result = await this.db.execute(
      sql`UPDATE process_instance SET description = ${description} WHERE process_instance_key = ${key}`,
    );
    return extractRowCount(result);
  }

  async listProcessInstances(): Promise<ProcessInstanceRecord[]> {
    const result = await this.db.execute(
      sql`SELECT process_instance_key::text AS process_instance_key, description
          FROM process_instance
          ORDER BY process_instance_key DESC`,
    );
    return extractRows(result).map(toProcessInstanceRecord);
  }
}
