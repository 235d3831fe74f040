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
  GATE_CHECK_OUT_OPERATOR,
  PORT_OPERATIONS_OPTIONS,
  PORT_STORE,
} from '../port-operations.constants';
import { ProcessInstanceTracker } from '../services/process-instance-tracker.service';
import { parseTimestamp } from '../utils/format-timestamp';
import type { EntityFields } from '../utils/variable-translator';
import { PortStepHandler } from './port-step.handler';

/**
 * Minutes between two `YYYY-MM-DD HH:MM:SS` timestamps, or null when either
 * does not parse.
 */
export function gateStayMinutes(checkIn: string, checkOut: string): number | null {
  const from = parseTimestamp(checkIn);
  const to = parseTimestamp(checkOut);
  if (!from || !to) return null;
  return (to.getTime() - from.getTime()) / 60_000;
}

@Injectable()
export class TruckCheckOutHandler extends PortStepHandler {
  readonly kind = 'truck_checkout' as const;
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
    const checkOut = fields.check_out || this.now();
    this.logger.log(
      `${fields.check_out ? 'Using supplied' : 'Minted'} check-out time ${checkOut} for ${transportationId}`,
    );

    await this.simulate(job);

    if (fields.check_in) {
      const minutes = gateStayMinutes(fields.check_in, checkOut);
      if (minutes === null) {
        this.logger.warn(
          `Could not compute gate stay for ${transportationId} (check-in "${fields.check_in}")`,
        );
      } else {
        this.logger.log(`Truck ${transportationId} stayed ${minutes.toFixed(1)} minutes`);
      }
    }

    const checkOutRecorded = await this.persist(
      'updateTransportTimestamps',
      transportationId,
      () => this.deps.store.updateTransportTimestamps(transportationId, { checkOut }),
    );

    return this.buildOutput(
      job.variables,
      {
        checkOut,
        truckCheckOutStatus: 'completed',
        truckCheckOutOperator: GATE_CHECK_OUT_OPERATOR,
        checkOutRecorded,
      },
      this.resolveRouting(fields),
    );
  }
}
