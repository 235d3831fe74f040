import { Inject, Injectable } from '@nestjs/common';
import type { IActionSimulator } from '../interfaces/action-simulator.interface';
import type { IPortStore } from '../interfaces/port-store.interface';
import type { ResolvedPortOperationsOptions } from '../interfaces/port-operations-module-options.interface';
import type {
  JobVariables,
  PortJob,
} from '../interfaces/step-handler.interface';
import {
  ACTION_SIMULATOR,
  PORT_OPERATIONS_OPTIONS,
  PORT_STORE,
  SCALE_ID,
  WEIGHING_OPERATOR,
} from '../port-operations.constants';
import { ProcessInstanceTracker } from '../services/process-instance-tracker.service';
import type { EntityFields } from '../utils/variable-translator';
import { PortStepHandler } from './port-step.handler';

export type WeightStatus = 'OK' | 'OVERWEIGHT';

export function classifyWeight(weightKg: number, maxKg: number): WeightStatus {
  return weightKg <= maxKg ? 'OK' : 'OVERWEIGHT';
}

/**
 * Read-only step: the weight comes from the store and nothing is written back.
 */
@Injectable()
export class WeighingHandler extends PortStepHandler {
  readonly kind = 'weighing' as const;
  protected readonly defaultOperationType = 'unknown';

  constructor(
    @Inject(PORT_STORE) store: IPortStore,
    @Inject(ACTION_SIMULATOR) simulator: IActionSimulator,
    tracker: ProcessInstanceTracker,
    @Inject(PORT_OPERATIONS_OPTIONS) options: ResolvedPortOperationsOptions,
  ) {
    super({ store, simulator, tracker, options });
  }

  protected async execute(
    job: PortJob,
    fields: EntityFields,
  ): Promise<JobVariables> {
    const container = await this.requireContainer(fields.container_id ?? '');
    const weight = Number(container.weight);

    await this.simulate(job);

    const maxKg = this.deps.options.maxContainerWeightKg;
    const weightStatus = classifyWeight(weight, maxKg);
    if (weightStatus === 'OVERWEIGHT') {
      this.logger.warn(
        `Container ${container.container_id} weighs ${weight} kg, above the ${maxKg} kg limit`,
      );
    } else {
      this.logger.log(`Container ${container.container_id} weighs ${weight} kg`);
    }

    return this.buildOutput(
      job.variables,
      {
        weighingStatus: 'completed',
        weighingTimestamp: this.now(),
        weight,
        weightUnit: 'kg',
        weightStatus,
        scaleId: SCALE_ID,
        weighingOperator: WEIGHING_OPERATOR,
      },
      this.resolveRouting(fields, container),
    );
  }
}
