import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { CronJob } from 'cron';
import { PortEventType } from '../events/port-event-type.enum';
import type { ActiveOperationsScannedEvent } from '../events/port-events';
import type { IPortStore } from '../interfaces/port-store.interface';
import type { ResolvedPortOperationsOptions } from '../interfaces/port-operations-module-options.interface';
import {
  ACTIVE_OPERATIONS_CRON_JOB,
  PORT_OPERATIONS_OPTIONS,
  PORT_STORE,
  SHIP_PREFIX,
  TRUCK_PREFIX,
} from '../port-operations.constants';

export type ActiveOperationsSummary = ActiveOperationsScannedEvent;

@Injectable()
export class ActiveOperationsCronService implements OnModuleInit {
  private readonly logger = new Logger(ActiveOperationsCronService.name);

  constructor(
    @Inject(PORT_STORE) private readonly store: IPortStore,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly eventEmitter: EventEmitter2,
    @Inject(PORT_OPERATIONS_OPTIONS)
    private readonly options: Pick<
      ResolvedPortOperationsOptions,
      'enableActiveOperationsCron' | 'activeOperationsCronExpression'
    >,
  ) {}

  onModuleInit(): void {
    if (!this.options.enableActiveOperationsCron) {
      this.logger.log('Active operations cron disabled by configuration');
      return;
    }

    const job = new CronJob(this.options.activeOperationsCronExpression, () => {
      this.scanActiveOperations()
        .then((summary) => {
          this.logger.log(
            `Active operations: total=${summary.total}, loading=${summary.loading}, unloading=${summary.unloading}, trucks=${summary.trucks}, ships=${summary.ships}`,
          );
        })
        .catch((err) => {
          this.logger.error('Unhandled error in active operations cron', err);
        });
    });

    this.schedulerRegistry.addCronJob(ACTIVE_OPERATIONS_CRON_JOB, job);
    job.start();
    this.logger.log(
      `Active operations cron registered with expression: ${this.options.activeOperationsCronExpression}`,
    );
  }

  async scanActiveOperations(): Promise<ActiveOperationsSummary> {
    const operations = await this.store.listActiveOperations();

    const summary: ActiveOperationsSummary = {
      total: operations.length,
      loading: 0,
      unloading: 0,
      trucks: 0,
      ships: 0,
      scannedAt: new Date(),
    };

    for (const operation of operations) {
      if (operation.operation_type === 'loading') summary.loading++;
      if (operation.operation_type === 'unloading') summary.unloading++;

      const transportationId = operation.transportation_id ?? '';
      if (transportationId.startsWith(TRUCK_PREFIX)) summary.trucks++;
      if (transportationId.startsWith(SHIP_PREFIX)) summary.ships++;
    }

    this.eventEmitter.emit(
      PortEventType.ACTIVE_OPERATIONS_SCANNED,
      summary satisfies ActiveOperationsScannedEvent,
    );
    return summary;
  }
}
