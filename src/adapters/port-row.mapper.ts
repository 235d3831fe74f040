import { isStorageStatus } from '../engines/storage-lifecycle.engine';
import type {
  ContainerDetails,
  ProcessInstanceRecord,
  ScenarioRow,
  StorageStatus,
} from '../interfaces/port-records.interface';
import { parseTimestamp } from '../utils/format-timestamp';

/**
 * Narrows raw driver rows to store records. Drivers differ on numeric and
 * timestamp types (BIGINT arrives as a string, TIMESTAMP as a Date or a
 * string), so every column is read loosely.
 */
export type RawRow = Record<string, unknown>;

export function isRawRow(value: unknown): value is RawRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(row: RawRow, column: string): string {
  const value = row[column];
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint') return String(value);
  throw new Error(`Column ${column} is missing or not text`);
}

function readNullableString(row: RawRow, column: string): string | null {
  const value = row[column];
  return value === null || value === undefined ? null : readString(row, column);
}

function readNumber(row: RawRow, column: string): number {
  const parsed = Number(row[column]);
  if (row[column] === null || row[column] === undefined || Number.isNaN(parsed)) {
    throw new Error(`Column ${column} is missing or not numeric`);
  }
  return parsed;
}

function readNullableNumber(row: RawRow, column: string): number | null {
  const value = row[column];
  return value === null || value === undefined ? null : readNumber(row, column);
}

function readDate(row: RawRow, column: string): Date | null {
  const value = row[column];
  if (value instanceof Date) return value;
  if (typeof value === 'string') return parseTimestamp(value);
  return null;
}

function readStorageStatus(row: RawRow, column: string): StorageStatus | null {
  const value = row[column];
  return isStorageStatus(value) ? value : null;
}

export function toContainerDetails(row: RawRow): ContainerDetails {
  return {
    container_id: readString(row, 'container_id'),
    operation_type: readString(row, 'operation_type'),
    weight: readNumber(row, 'weight'),
    storage_id: readNullableNumber(row, 'storage_id'),
    storage_status: readStorageStatus(row, 'storage_status'),
    transportation_id: readNullableString(row, 'transportation_id'),
    check_in: readDate(row, 'check_in'),
    check_out: readDate(row, 'check_out'),
  };
}

export function toScenarioRow(row: RawRow): ScenarioRow {
  const storageStatus = readStorageStatus(row, 'storage_status');
  if (!storageStatus) {
    throw new Error(
      `Unknown storage_status ${String(row.storage_status)} for container ${String(row.container_id)}`,
    );
  }
  return {
    container_id: readString(row, 'container_id'),
    operation_type: readString(row, 'operation_type'),
    weight: readNumber(row, 'weight'),
    transportation_id: readString(row, 'transportation_id'),
    check_in: readDate(row, 'check_in'),
    check_out: readDate(row, 'check_out'),
    storage_status: storageStatus,
  };
}

export function toProcessInstanceRecord(row: RawRow): ProcessInstanceRecord {
  return {
    process_instance_key: readString(row, 'process_instance_key'),
    description: readNullableString(row, 'description'),
  };
}
