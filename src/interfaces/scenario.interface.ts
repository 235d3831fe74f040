export interface ScenarioVariables {
  containerId: string;
  transportationId: string;
  operationType: string;
  weight: number;
  storageStatus: string;
  /** Trucks only, `YYYY-MM-DD HH:MM:SS` */
  checkIn?: string;
  /** Trucks only, `YYYY-MM-DD HH:MM:SS` */
  checkOut?: string;
}

export interface ScenarioBreakdown {
  total: number;
  ships: number;
  trucks: number;
  loading: number;
  unloading: number;
}

export type LaunchMode = 'sequential' | 'parallel';

export interface ScenarioLaunchFailure {
  containerId: string;
  transportationId: string;
  error: string;
}

export interface ScenarioLaunchOutcome {
  started: boolean;
  processInstanceKey?: string;
  error?: string;
}

export interface ScenarioLaunchResult {
  mode: LaunchMode;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  total: number;
  successful: number;
  failed: number;
  failures: ScenarioLaunchFailure[];
}
