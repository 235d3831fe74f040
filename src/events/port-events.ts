import type { JobKind } from '../interfaces/step-handler.interface';

export interface StepCompletedEvent {
  jobKey: string;
  kind: JobKind;
  processInstanceKey?: string;
  containerId?: string;
  transportationId?: string;
  durationMs: number;
  timestamp: Date;
}

export interface StepFailedEvent {
  jobKey: string;
  kind: string;
  processInstanceKey?: string;
  errorName: string;
  error: string;
  timestamp: Date;
}

export interface ScenarioStartedEvent {
  processInstanceKey: string;
  bpmnProcessId: string;
  containerId: string;
  transportationId: string;
  timestamp: Date;
}

export interface ActiveOperationsScannedEvent {
  total: number;
  loading: number;
  unloading: number;
  trucks: number;
  ships: number;
  scannedAt: Date;
}
