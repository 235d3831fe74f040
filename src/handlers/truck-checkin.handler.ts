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
  GATE_CHECK_IN_OPERATOR,
  PORT_OPERATIONS_OPTIONS,
  PORT_STORE,
} from '../port-operations.constants';
import { ProcessInstanceTracker } from '../services/process-instance-tracker.service';
import type { EntityFields } from '../utils/variable-translator';
import { PortStepHandler } from './port-step.handler';

@Injectable()
export class TruckCheckInHandler extends PortStepHandler {
  readonly kind = 'truck_checkin' as const;
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
    const transportationId = fields.transportation_id ?? '';
    const checkIn = fields.check_in || this.now();
    this.logger.log(
      `${fields.check_in ? 'Using supplied' : 'Minted'} check-in time ${checkIn} for ${transportationId}`,
    );

    await this.simulate(job);

    const checkInRecorded = await this.persist(
      'updateTransportTimestamps',
      transportationId,
      () => this.deps.store.updateTransportTimestamps(transportationId, { checkIn }),
    );

    return this.buildOutput(
      job.variables,
      {
        checkIn,
        truckCheckInStatus: 'completed',
        truckCheckInOperator: GATE_CHECK_IN_OPERATOR,
        checkInRecorded,
      },
      this.resolveRouting(fields),
    );
  }
}
