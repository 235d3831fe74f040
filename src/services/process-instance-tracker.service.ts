import { Inject, Injectable, Logger } from '@nestjs/common';
import { TrackingFailure } from '../errors/tracking-failure.error';
import type { ProcessInstanceRecord } from '../interfaces/port-records.interface';
import type { IPortStore } from '../interfaces/port-store.interface';
import type { ResolvedPortOperationsOptions } from '../interfaces/port-operations-module-options.interface';
import {
  PORT_OPERATIONS_OPTIONS,
  PORT_STORE,
} from '../port-operations.constants';
import { formatTimestamp } from '../utils/format-timestamp';

/**
 * Audit trail of engine process instances. Every operation is best-effort:
 * failures are logged and reported as `false`, never thrown.
 */
@Injectable()
export class ProcessInstanceTracker {
  private readonly logger = new Logger(ProcessInstanceTracker.name);

  constructor(
    @Inject(PORT_STORE) private readonly store: IPortStore,
    @Inject(PORT_OPERATIONS_OPTIONS)
    private readonly options: Pick<ResolvedPortOperationsOptions, 'clock'>,
  ) {}

  /**
   * Writes a fresh `Started: ...` description. An existing description for
   * the key is replaced, not appended to.
   */
  async recordStart(
    key: string,
    operationType?: string,
    containerId?: string,
    transportationId?: string,
  ): Promise<boolean> {
    const parts = [`Started: ${formatTimestamp(this.options.clock())}`];
    if (operationType) parts.push(`Operation: ${operationType}`);
    if (containerId) parts.push(`Container: ${containerId}`);
    if (transportationId) parts.push(`Transport: ${transportationId}`);
    const description = parts.join(', ');

    try {
      await this.store.upsertProcessInstance(key, description);
      this.logger.log(`Process instance ${key} recorded: ${description}`);
      return true;
    } catch (error) {
      this.report(new TrackingFailure(key, 'recordStart', error));
      return false;
    }
  }

  /**
   * Appends `, Ended: <ts>, Status: <status>`. Unknown keys are a no-op.
   *
   * The store reads then writes the description, so two completions racing on
   * one key can lose an update.
   */
  async recordCompletion(key: string, status = 'completed'): Promise<boolean> {
    const suffix = `, Ended: ${formatTimestamp(this.options.clock())}, Status: ${status}`;

    try {
      const affected = await this.store.appendProcessInstanceCompletion(
        key,
        suffix,
      );
      if (affected === 0) {
        this.logger.debug(
          `Process instance ${key} not recorded; completion skipped`,
        );
        return false;
      }
      this.logger.log(`Process instance ${key} completed with status ${status}`);
      return true;
    } catch (error) {
      this.report(new TrackingFailure(key, 'recordCompletion', error));
      return false;
    }
  }

  async listProcessInstances(): Promise<ProcessInstanceRecord[]> {
    try {
      return await this.store.listProcessInstances();
    } catch (error) {
      this.report(new TrackingFailure('*', 'list', error));
      return [];
    }
  }

  private report(failure: TrackingFailure): void {
    this.logger.warn(failure.message);
  }
}
