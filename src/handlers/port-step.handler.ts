import { Logger } from '@nestjs/common';
import { EntityNotFoundError } from '../errors/entity-not-found.error';
import { PersistenceFailure } from '../errors/persistence-failure.error';
import type { IActionSimulator } from '../interfaces/action-simulator.interface';
import type { ContainerDetails } from '../interfaces/port-records.interface';
import type { IPortStore } from '../interfaces/port-store.interface';
import type { ResolvedPortOperationsOptions } from '../interfaces/port-operations-module-options.interface';
import type {
  IStepHandler,
  JobKind,
  JobVariables,
  PortJob,
} from '../interfaces/step-handler.interface';
import type { ProcessInstanceTracker } from '../services/process-instance-tracker.service';
import { STAGE_PLANS } from '../simulators/stage-plans';
import { formatTimestamp } from '../utils/format-timestamp';
import { checkRequiredVariables } from '../utils/validation-gate';
import { EntityFields, toExternal, toInternal } from '../utils/variable-translator';

export interface StepHandlerDependencies {
  store: IPortStore;
  simulator: IActionSimulator;
  tracker: ProcessInstanceTracker;
  options: ResolvedPortOperationsOptions;
}

export interface RoutingFields {
  containerId: string;
  transportationId?: string;
  operationType: string;
}

/**
 * Shared step contract: validate, record the process start, run the kind's
 * `execute`, then return the input variables overlaid with the result and the
 * routing fields.
 */
export abstract class PortStepHandler implements IStepHandler {
  abstract readonly kind: JobKind;
  protected abstract readonly defaultOperationType: string;
  protected readonly logger: Logger;

  protected constructor(protected readonly deps: StepHandlerDependencies) {
    this.logger = new Logger(this.constructor.name);
  }

  async handle(job: PortJob): Promise<JobVariables> {
    const { fields } = toInternal(job.variables);
    this.logger.log(
      `Starting ${this.kind} job ${job.key}: container=${fields.container_id ?? '-'}, transport=${fields.transportation_id ?? '-'}, operation=${fields.operation_type ?? '-'}`,
    );

    const failure = checkRequiredVariables(this.kind, fields);
    if (failure) {
      this.logger.error(failure.message);
      throw failure;
    }

    if (job.processInstanceKey) {
      await this.deps.tracker.recordStart(
        job.processInstanceKey,
        fields.operation_type ?? this.defaultOperationType,
        fields.container_id,
        fields.transportation_id,
      );
    }

    const output = await this.execute(job, fields);
    this.logger.log(`${this.kind} job ${job.key} completed`);
    return output;
  }

  protected abstract execute(
    job: PortJob,
    fields: EntityFields,
  ): Promise<JobVariables>;

  protected async simulate(job: PortJob): Promise<void> {
    await this.deps.simulator.perform(
      { kind: this.kind, jobKey: job.key, stages: STAGE_PLANS[this.kind] },
      job.signal,
    );
  }

  /**
   * Reads the container; a store error is logged and treated as absent.
   */
  protected async findContainer(
    containerId: string,
  ): Promise<ContainerDetails | null> {
    try {
      return await this.deps.store.getContainer(containerId);
    } catch (error) {
      this.logger.error(
        new PersistenceFailure('getContainer', containerId, error).message,
      );
      return null;
    }
  }

  protected async requireContainer(
    containerId: string,
  ): Promise<ContainerDetails> {
    const container = await this.findContainer(containerId);
    if (!container) {
      const notFound = new EntityNotFoundError('container', containerId, this.kind);
      this.logger.error(notFound.message);
      throw notFound;
    }
    return container;
  }

  /**
   * Runs a single idempotent write. Zero rows and store errors are logged and
   * reported as `false`; neither fails the job.
   */
  protected async persist(
    operation: string,
    key: string,
    write: () => Promise<number>,
  ): Promise<boolean> {
    try {
      const affected = await write();
      if (affected > 0) {
        return true;
      }
      this.logger.warn(new PersistenceFailure(operation, key).message);
      return false;
    } catch (error) {
      this.logger.error(new PersistenceFailure(operation, key, error).message);
      return false;
    }
  }

  protected resolveRouting(
    fields: EntityFields,
    container?: ContainerDetails | null,
  ): RoutingFields {
    return {
      // Validation guarantees container_id for every kind.
      containerId: fields.container_id ?? container?.container_id ?? '',
      transportationId:
        fields.transportation_id ?? container?.transportation_id ?? undefined,
      operationType:
        fields.operation_type ??
        container?.operation_type ??
        this.defaultOperationType,
    };
  }

  /**
   * Merges the step result over the job variables. Routing fields are always
   * written under their camelCase names; a caller alias such as `container_id`
   * is kept alongside with the same value.
   */
  protected buildOutput(
    input: JobVariables,
    result: JobVariables,
    routing: RoutingFields,
  ): JobVariables {
    const output = toExternal(
      {
        container_id: routing.containerId,
        transportation_id: routing.transportationId,
        operation_type: routing.operationType,
      },
      { ...input, ...result },
    );

    output.containerId = routing.containerId;
    if (routing.transportationId !== undefined) {
      output.transportationId = routing.transportationId;
    }
    output.operationType = routing.operationType;
    return output;
  }

  protected now(): string {
    return formatTimestamp(this.deps.options.clock());
  }
}
