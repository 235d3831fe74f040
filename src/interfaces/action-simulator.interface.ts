import type { JobKind } from './step-handler.interface';

export interface ActionStage {
  name: string;
  /** Nominal duration in milliseconds */
  durationMs: number;
}

export interface SimulatedAction {
  kind: JobKind;
  jobKey: string;
  stages: readonly ActionStage[];
}

export interface IActionSimulator {
  /**
   * Runs every stage in order. A stage, once started, always runs to the end;
   * `signal` is only consulted before the first stage and after the last.
   */
  perform(action: SimulatedAction, signal?: AbortSignal): Promise<void>;
}
