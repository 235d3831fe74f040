import type { ActionStage } from '../interfaces/action-simulator.interface';
import type { JobKind } from '../interfaces/step-handler.interface';

export const STAGE_PLANS: Record<JobKind, readonly ActionStage[]> = {
  crane_loading: [
    { name: 'Positioning crane', durationMs: 1000 },
    { name: 'Attaching container', durationMs: 1000 },
    { name: 'Lifting container', durationMs: 1000 },
    { name: 'Moving to target location', durationMs: 1000 },
    { name: 'Lowering container', durationMs: 1000 },
  ],
  crane_unloading: [
    { name: 'Positioning crane', durationMs: 1000 },
    { name: 'Attaching to container', durationMs: 1000 },
    { name: 'Lifting container', durationMs: 1000 },
    { name: 'Moving to unloading zone', durationMs: 1000 },
    { name: 'Placing container', durationMs: 1000 },
  ],
  weighing: [
    { name: 'Positioning container on scale', durationMs: 1000 },
    { name: 'Calibrating scale', durationMs: 500 },
    { name: 'Measuring weight', durationMs: 1000 },
  ],
  storage: [
    { name: 'Processing storage operation', durationMs: 500 },
    { name: 'Transporting to storage location', durationMs: 1500 },
    { name: 'Positioning container', durationMs: 1000 },
    { name: 'Securing container', durationMs: 1000 },
    { name: 'Finalizing storage', durationMs: 500 },
  ],
  truck_checkin: [
    { name: 'Verifying truck documents', durationMs: 500 },
    { name: 'Inspecting vehicle', durationMs: 500 },
  ],
  truck_checkout: [
    { name: 'Verifying cargo documentation', durationMs: 500 },
    { name: 'Final vehicle inspection', durationMs: 500 },
  ],
};
