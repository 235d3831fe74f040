import type {
  ActiveOperation,
  ContainerDetails,
  OperationType,
  ProcessInstanceRecord,
  ScenarioRow,
  StorageStatus,
  TransportTimestamps,
} from '../interfaces/port-records.interface';
import type { IPortStore } from '../interfaces/port-store.interface';
import { parseTimestamp } from '../utils/format-timestamp';

export interface ContainerSeed {
  container_id: string;
  operation_type: OperationType;
  weight: number;
}

export interface StorageSeed {
  container_id: string;
  storage_status: StorageStatus;
  storage_id?: number;
}

export interface TransportMeanSeed {
  transportation_id: string;
  container_id: string;
  check_in?: Date | string | null;
  check_out?: Date | string | null;
}

export interface InMemoryPortSeed {
  containers?: ContainerSeed[];
  storage?: StorageSeed[];
  transportMeans?: TransportMeanSeed[];
  processInstances?: ProcessInstanceRecord[];
}

interface StorageRow {
  storage_id: number;
  container_id: string;
  storage_status: StorageStatus;
}

export interface TransportMeanRow {
  transportation_id: string;
  container_id: string;
  check_in: Date | null;
  check_out: Date | null;
}

function toDate(value: Date | string | null | undefined): Date | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return new Date(value.getTime());
  const parsed = parseTimestamp(value);
  if (!parsed) {
    throw new Error(`invalid input syntax for type timestamp: "${value}"`);
  }
  return parsed;
}

function cloneDate(value: Date | null): Date | null {
  return value ? new Date(value.getTime()) : null;
}

function compareKeys(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Process instance keys are int64 decimal strings; order them numerically.
 */
function compareNumericKeys(a: string, b: string): number {
  try {
    const diff = BigInt(a) - BigInt(b);
    return diff === 0n ? 0 : diff < 0n ? -1 : 1;
  } catch {
    return compareKeys(a, b);
  }
}

/**
 * Store held in process memory, with the join and ordering semantics of the
 * relational views. Returned records are copies.
 */
export class InMemoryPortStoreAdapter implements IPortStore {
  private readonly containers = new Map<string, ContainerSeed>();
  private readonly storage = new Map<string, StorageRow>();
  private readonly transportMeans = new Map<string, TransportMeanRow>();
  private readonly processInstances = new Map<string, string | null>();
  private nextStorageId = 1;

  constructor(seed: InMemoryPortSeed = {}) {
    this.seed(seed);
  }

  seed(seed: InMemoryPortSeed): void {
    for (const container of seed.containers ?? []) {
      this.containers.set(container.container_id, { ...container });
    }
    for (const record of seed.storage ?? []) {
      const storageId = record.storage_id ?? this.nextStorageId;
      this.nextStorageId = Math.max(this.nextStorageId, storageId + 1);
      this.storage.set(record.container_id, {
        storage_id: storageId,
        container_id: record.container_id,
        storage_status: record.storage_status,
      });
    }
    for (const transport of seed.transportMeans ?? []) {
      this.transportMeans.set(transport.transportation_id, {
        transportation_id: transport.transportation_id,
        container_id: transport.container_id,
        check_in: toDate(transport.check_in),
        check_out: toDate(transport.check_out),
      });
    }
    for (const instance of seed.processInstances ?? []) {
      this.processInstances.set(
        instance.process_instance_key,
        instance.description,
      );
    }
  }

  async getContainer(containerId: string): Promise<ContainerDetails | null> {
    const container = this.containers.get(containerId);
    return container ? this.toDetails(container) : null;
  }

  async updateStorageStatus(
    containerId: string,
    status: StorageStatus,
  ): Promise<number> {
    const record = this.storage.get(containerId);
    if (!record) return 0;
    record.storage_status = status;
    return 1;
  }

  async updateTransportTimestamps(
    transportationId: string,
    timestamps: TransportTimestamps,
  ): Promise<number> {
    if (timestamps.checkIn === undefined && timestamps.checkOut === undefined) {
      return 0;
    }
    const transport = this.transportMeans.get(transportationId);
    if (!transport) return 0;

    const checkIn =
      timestamps.checkIn !== undefined ? toDate(timestamps.checkIn) : undefined;
    const checkOut =
      timestamps.checkOut !== undefined ? toDate(timestamps.checkOut) : undefined;
    if (checkIn !== undefined) transport.check_in = checkIn;
    if (checkOut !== undefined) transport.check_out = checkOut;
    return 1;
  }

  async listActiveOperations(): Promise<ActiveOperation[]> {
    const rows: ActiveOperation[] = [];
    for (const container of this.sortedContainers()) {
      const storage = this.storage.get(container.container_id);
      if (!storage || storage.storage_status !== 'incomplete') continue;
      for (const transport of this.transportsOf(container.container_id)) {
        rows.push(this.toDetails(container, transport));
      }
    }
    return rows;
  }

  async listScenarioRows(): Promise<ScenarioRow[]> {
    const rows: ScenarioRow[] = [];
    const transports = [...this.transportMeans.values()].sort(
      (a, b) =>
        compareKeys(a.transportation_id, b.transportation_id) ||
        compareKeys(a.container_id, b.container_id),
    );
    for (const transport of transports) {
      const container = this.containers.get(transport.container_id);
      const storage = this.storage.get(transport.container_id);
      if (!container || !storage) continue;
      rows.push({
        container_id: container.container_id,
        operation_type: container.operation_type,
        weight: container.weight,
        transportation_id: transport.transportation_id,
        check_in: cloneDate(transport.check_in),
        check_out: cloneDate(transport.check_out),
        storage_status: storage.storage_status,
      });
    }
    return rows;
  }

  async upsertProcessInstance(key: string, description: string): Promise<void> {
    this.processInstances.set(key, description);
  }

  async appendProcessInstanceCompletion(
    key: string,
    suffix: string,
  ): Promise<number> {
    if (!this.processInstances.has(key)) return 0;
    const existing = this.processInstances.get(key) ?? '';
    this.processInstances.set(key, `${existing}${suffix}`);
    return 1;
  }

  async listProcessInstances(): Promise<ProcessInstanceRecord[]> {
    return [...this.processInstances.entries()]
      .map(([process_instance_key, description]) => ({
        process_instance_key,
        description,
      }))
      .sort((a, b) =>
        compareNumericKeys(b.process_instance_key, a.process_instance_key),
      );
  }

  getStorageStatus(containerId: string): StorageStatus | null {
    return this.storage.get(containerId)?.storage_status ?? null;
  }

  getTransportMean(transportationId: string): TransportMeanRow | null {
    const transport = this.transportMeans.get(transportationId);
    return transport
      ? {
          ...transport,
          check_in: cloneDate(transport.check_in),
          check_out: cloneDate(transport.check_out),
        }
      : null;
  }

  getProcessInstanceDescription(key: string): string | null | undefined {
    return this.processInstances.get(key);
  }

  private sortedContainers(): ContainerSeed[] {
    return [...this.containers.values()].sort((a, b) =>
      compareKeys(a.container_id, b.container_id),
    );
  }

  private transportsOf(containerId: string): TransportMeanRow[] {
    return [...this.transportMeans.values()].filter(
      (transport) => transport.container_id === containerId,
    );
  }

  private toDetails(
    container: ContainerSeed,
    transport: TransportMeanRow | undefined = this.transportsOf(
      container.container_id,
    )[0],
  ): ContainerDetails {
    const storage = this.storage.get(container.container_id);
    return {
      container_id: container.container_id,
      operation_type: container.operation_type,
      weight: container.weight,
      storage_id: storage?.storage_id ?? null,
      storage_status: storage?.storage_status ?? null,
      transportation_id: transport?.transportation_id ?? null,
      check_in: cloneDate(transport?.check_in ?? null),
      check_out: cloneDate(transport?.check_out ?? null),
    };
  }
}
