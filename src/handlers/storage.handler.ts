import { Inject, Injectable } from '@nestjs/common';
import { completeStorage } from '../engines/storage-lifecycle.engine';
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
  STORAGE_OPERATOR,
} from '../port-operations.constants';
import { ProcessInstanceTracker } from '../services/process-instance-tracker.service';
import type { EntityFields } from '../utils/variable-translator';
import { PortStepHandler } from './port-step.handler';

@Injectable()
export class StorageHandler extends PortStepHandler {
  readonly kind = 'storage' as const;
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
    const containerId = container.container_id;
    const transition = completeStorage(container.storage_status);

    this.logger.log(
      `Container ${containerId}: ${container.weight} kg, storage ${container.storage_status ?? 'unrecorded'}`,
    );

    await this.simulate(job);

    const storageUpdated = await this.persist(
      'updateStorageStatus',
      containerId,
      () => this.deps.store.updateStorageStatus(containerId, transition.to),
    );
    if (storageUpdated) {
      this.logger.log(
        `Container ${containerId} storage ${transition.changed ? `${transition.from} -> ${transition.to}` : `already ${transition.to}`}`,
      );
    }

    if (job.processInstanceKey) {
      await this.deps.tracker.recordCompletion(job.processInstanceKey, 'completed');
    }

    return this.buildOutput(
      job.variables,
      {
        storageStatus: transition.to,
        storageTimestamp: this.now(),
        storageOperator: STORAGE_OPERATOR,
        storageId: container.storage_id,
        storageUpdated,
      },
      this.resolveRouting(fields, container),
    );
  }
}
