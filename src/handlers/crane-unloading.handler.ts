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
  CRANE_UNLOADING_OPERATOR,
  PORT_OPERATIONS_OPTIONS,
  PORT_STORE,
  UNLOADING_ZONE,
} from '../port-operations.constants';
import { ProcessInstanceTracker } from '../services/process-instance-tracker.service';
import type { EntityFields } from '../utils/variable-translator';
import { PortStepHandler } from './port-step.handler';

@Injectable()
export class CraneUnloadingHandler extends PortStepHandler {
  readonly kind = 'crane_unloading' as const;
  protected readonly defaultOperationType = 'unloading';

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
    const containerId = fields.container_id ?? '';
    const container = await this.findContainer(containerId);
    if (container) {
      this.logger.log(
        `Container ${containerId}: ${container.weight} kg, storage ${container.storage_status ?? 'unknown'}`,
      );
    } else {
      this.logger.warn(`Container ${containerId} not found; continuing`);
    }

    await this.simulate(job);

    return this.buildOutput(
      job.variables,
      {
        craneUnloadingStatus: 'completed',
        craneUnloadingTimestamp: this.now(),
        craneOperator: CRANE_UNLOADING_OPERATOR,
        unloadingZone: UNLOADING_ZONE,
      },
      this.resolveRouting(fields, container),
    );
  }
}
