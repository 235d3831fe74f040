import { JobCancelledError } from '../errors/job-cancelled.error';
import type {
  IActionSimulator,
  SimulatedAction,
} from '../interfaces/action-simulator.interface';

/**
 * Runs no delay and keeps every performed action, in order.
 */
export class InstantActionSimulator implements IActionSimulator {
  readonly performed: SimulatedAction[] = [];

  async perform(action: SimulatedAction, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new JobCancelledError(action.jobKey, action.kind, 'before-action');
    }
    this.performed.push(action);
    if (signal?.aborted) {
      throw new JobCancelledError(action.jobKey, action.kind, 'after-action');
    }
  }

  stageNames(): string[][] {
    return this.performed.map((action) => action.stages.map((stage) => stage.name));
  }
}
