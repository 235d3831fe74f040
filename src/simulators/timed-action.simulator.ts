import { Logger } from '@nestjs/common';
import { JobCancelledError } from '../errors/job-cancelled.error';
import type {
  IActionSimulator,
  SimulatedAction,
} from '../interfaces/action-simulator.interface';
import { sleep } from '../utils/sleep';

export interface TimedActionSimulatorOptions {
  /** Multiplier applied to every nominal stage duration. 0 runs instantly. */
  speedFactor?: number;
}

export class TimedActionSimulator implements IActionSimulator {
  private readonly logger = new Logger(TimedActionSimulator.name);
  private readonly speedFactor: number;

  constructor(options: TimedActionSimulatorOptions = {}) {
    const speedFactor = options.speedFactor ?? 1;
    if (!Number.isFinite(speedFactor) || speedFactor < 0) {
      throw new Error(`Invalid simulation speed factor ${speedFactor}`);
    }
    this.speedFactor = speedFactor;
  }

  async perform(action: SimulatedAction, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new JobCancelledError(action.jobKey, action.kind, 'before-action');
    }

    for (const stage of action.stages) {
      this.logger.log(`[${action.kind}/${action.jobKey}] ${stage.name}...`);
      const delay = stage.durationMs * this.speedFactor;
      if (delay > 0) {
        await sleep(delay);
      }
    }

    if (signal?.aborted) {
      throw new JobCancelledError(action.jobKey, action.kind, 'after-action');
    }
  }
}
