export const PORT_OPERATIONS_MODULE_OPTIONS = Symbol('PORT_OPERATIONS_MODULE_OPTIONS');
export const PORT_OPERATIONS_OPTIONS = Symbol('PORT_OPERATIONS_OPTIONS');
export const PORT_STORE = Symbol('PORT_STORE');
export const ACTION_SIMULATOR = Symbol('ACTION_SIMULATOR');
export const WORKFLOW_CLIENT = Symbol('WORKFLOW_CLIENT');

export const DEFAULT_BPMN_PROCESS_ID = 'Port_Workflow';
/** ISO 668 maximum gross mass of a 40ft container, in kilograms. */
export const DEFAULT_MAX_CONTAINER_WEIGHT_KG = 30480;
export const DEFAULT_SEQUENTIAL_START_DELAY_MS = 1000;
export const DEFAULT_ACTIVE_OPERATIONS_CRON = '0 */5 * * * *';
export const ACTIVE_OPERATIONS_CRON_JOB = 'port-active-operations';

export const SENTINEL_VALUE = 'N/A';
export const TRUCK_PREFIX = 'truck';
export const SHIP_PREFIX = 'ship';

export const CRANE_LOADING_OPERATOR = 'CRANE-OP-001';
export const CRANE_UNLOADING_OPERATOR = 'CRANE-OP-002';
export const UNLOADING_ZONE = 'ZONE-A1';
export const SCALE_ID = 'SCALE-001';
export const WEIGHING_OPERATOR = 'WEIGH-OP-001';
export const STORAGE_OPERATOR = 'STORAGE-OP-001';
export const GATE_CHECK_IN_OPERATOR = 'GATE-OP-001';
export const GATE_CHECK_OUT_OPERATOR = 'GATE-OP-002';
