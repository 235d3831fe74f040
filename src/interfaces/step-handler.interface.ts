export type JobKind =
  | 'crane_loading'
  | 'crane_unloading'
  | 'weighing'
  | 'storage'
  | 'truck_checkin'
  | 'truck_checkout';

export const JOB_KINDS: readonly JobKind[] = [
  'crane_loading',
  'crane_unloading',
  'weighing',
  'storage',
  'truck_checkin',
  'truck_checkout',
];

/** Variable set exactly as the engine delivers it. */
export type JobVariables = Record<string, unknown>;

export interface PortJob {
  /** Engine-issued job key */
  key: string;
  type: JobKind;
  processInstanceKey?: string;
  variables: JobVariables;
  /** Cancellation request; honoured only outside the simulated stages */
  signal?: AbortSignal;
}

export interface IStepHandler {
  readonly kind: JobKind;
  handle(job: PortJob): Promise<JobVariables>;
}
