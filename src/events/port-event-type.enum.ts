export enum PortEventType {
  STEP_COMPLETED = 'port.step.completed',
  STEP_FAILED = 'port.step.failed',
  SCENARIO_STARTED = 'port.scenario.started',
  ACTIVE_OPERATIONS_SCANNED = 'port.active-operations.scanned',
}
