import {
  ActiveOperation,
  ContainerDetails,
  ProcessInstanceRecord,
  ScenarioRow,
  StorageStatus,
  TransportTimestamps,
} from './port-records.interface';

/**
 * Narrow read/write contract over the relational store. Every call acquires
 * its own connection and releases it before returning.
 */
export interface IPortStore {
  /**
   * Container with its storage record and transport mean (left joined).
   */
  getContainer(containerId: string): Promise<ContainerDetails | null>;

  /**
   * Sets storage_status for the container's storage record.
   * @returns number of rows affected (0 when no storage record exists)
   */
  updateStorageStatus(
    containerId: string,
    status: StorageStatus,
  ): Promise<number>;

  /**
   * Partial update: only the supplied timestamp columns are set. Resolves to 0
   * without querying when neither is supplied.
   */
  updateTransportTimestamps(
    transportationId: string,
    timestamps: TransportTimestamps,
  ): Promise<number>;

  /**
   * Rows of the `active_operations` view, ordered by container_id.
   */
  listActiveOperations(): Promise<ActiveOperation[]>;

  /**
   * Transport means inner joined with container and storage, ordered by
   * (transportation_id, container_id).
   */
  listScenarioRows(): Promise<ScenarioRow[]>;

  /**
   * Insert or replace the description. Uses ON CONFLICT DO UPDATE.
   */
  upsertProcessInstance(key: string, description: string): Promise<void>;

  /**
   * Reads the current description and writes it back with `suffix` appended.
   * @returns 0 when no row exists for the key
   */
  appendProcessInstanceCompletion(key: string, suffix: string): Promise<number>;

  listProcessInstances(): Promise<ProcessInstanceRecord[]>;
}
