import type { PoolConfig } from 'pg';
import type { PortOperationsModuleOptions } from '../interfaces/port-operations-module-options.interface';
import type { IPortStore } from '../interfaces/port-store.interface';
import {
  DEFAULT_BPMN_PROCESS_ID,
  DEFAULT_MAX_CONTAINER_WEIGHT_KG,
  DEFAULT_SEQUENTIAL_START_DELAY_MS,
} from '../port-operations.constants';
import { TimedActionSimulator } from '../simulators/timed-action.simulator';

export interface PortDatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  maxConnections: number;
}

export interface PortOperationsConfig {
  database: PortDatabaseConfig;
  bpmnProcessId: string;
  maxContainerWeightKg: number;
  sequentialStartDelayMs: number;
  /** 1 runs stages at nominal duration, 0 skips the delays */
  simulationSpeed: number;
}

export type PortEnvironment = Record<string, string | undefined>;

function parseInteger(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback;
  }

  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
}

function parseFactor(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback;
  }

  const parsed = Number.parseFloat(raw);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export function loadPortOperationsConfig(
  env: PortEnvironment = process.env,
): PortOperationsConfig {
  return {
    database: {
      host: env.PORT_DB_HOST ?? 'localhost',
      port: parseInteger(env.PORT_DB_PORT, 5432),
      database: env.PORT_DB_NAME ?? 'portmanagement',
      user: env.PORT_DB_USER ?? 'postgres',
      password: env.PORT_DB_PASSWORD ?? '',
      maxConnections: parseInteger(env.PORT_DB_POOL_MAX, 10),
    },
    bpmnProcessId: env.PORT_BPMN_PROCESS_ID || DEFAULT_BPMN_PROCESS_ID,
    maxContainerWeightKg: parseInteger(
      env.PORT_MAX_CONTAINER_WEIGHT_KG,
      DEFAULT_MAX_CONTAINER_WEIGHT_KG,
    ),
    sequentialStartDelayMs: parseInteger(
      env.PORT_SEQUENTIAL_START_DELAY_MS,
      DEFAULT_SEQUENTIAL_START_DELAY_MS,
    ),
    simulationSpeed: parseFactor(env.PORT_SIMULATION_SPEED, 1),
  };
}

export function toPoolConfig(config: PortOperationsConfig): PoolConfig {
  return {
    host: config.database.host,
    port: config.database.port,
    database: config.database.database,
    user: config.database.user,
    password: config.database.password,
    max: config.database.maxConnections,
  };
}

export function toModuleOptions(
  config: PortOperationsConfig,
  store: IPortStore,
): PortOperationsModuleOptions {
  return {
    store,
    simulator: new TimedActionSimulator({ speedFactor: config.simulationSpeed }),
    bpmnProcessId: config.bpmnProcessId,
    maxContainerWeightKg: config.maxContainerWeightKg,
    sequentialStartDelayMs: config.sequentialStartDelayMs,
  };
}
