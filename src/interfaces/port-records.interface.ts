export type OperationType = 'loading' | 'unloading';
export type StorageStatus = 'incomplete' | 'complete';

/**
 * Container joined with its storage record and transport mean, as stored.
 * Field names follow the relational columns.
 */
export interface ContainerDetails {
  container_id: string;
  operation_type: string;
  weight: number;
  storage_id: number | null;
  storage_status: StorageStatus | null;
  transportation_id: string | null;
  check_in: Date | null;
  check_out: Date | null;
}

/** A row of the `active_operations` view (storage not yet complete). */
export type ActiveOperation = ContainerDetails;

export interface ScenarioRow {
  container_id: string;
  operation_type: string;
  weight: number;
  transportation_id: string;
  check_in: Date | null;
  check_out: Date | null;
  storage_status: StorageStatus;
}

export interface ProcessInstanceRecord {
  /** Engine-issued int64 key, carried as a decimal string. */
  process_instance_key: string;
  description: string | null;
}

export interface TransportTimestamps {
  checkIn?: string;
  checkOut?: string;
}
