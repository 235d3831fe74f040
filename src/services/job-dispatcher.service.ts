import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { PortEventType } from '../events/port-event-type.enum';
import type {
  StepCompletedEvent,
  StepFailedEvent,
} from '../events/port-events';
import type {
  JobVariables,
  PortJob,
} from '../interfaces/step-handler.interface';
import { toInternal } from '../utils/variable-translator';
import { StepHandlerRegistry } from './step-handler-registry.service';

@Injectable()
export class JobDispatcher {
  private readonly logger = new Logger(JobDispatcher.name);

  constructor(
    private readonly registry: StepHandlerRegistry,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Runs the job through its handler. Fatal failures are rethrown so the
   * engine can fail the task.
   */
  async dispatch(job: PortJob): Promise<JobVariables> {
    const startedAt = Date.now();

    try {
      const handler = this.registry.getOrThrow(job.type);
      const variables = await handler.handle(job);
      const { fields } = toInternal(variables);

      this.eventEmitter.emit(PortEventType.STEP_COMPLETED, {
        jobKey: job.key,
        kind: handler.kind,
        processInstanceKey: job.processInstanceKey,
        containerId: fields.container_id,
        transportationId: fields.transportation_id,
        durationMs: Date.now() - startedAt,
        timestamp: new Date(),
      } satisfies StepCompletedEvent);

      return variables;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(
        `Job ${job.key} (${job.type}) failed: ${err.name}: ${err.message}`,
      );

      this.eventEmitter.emit(PortEventType.STEP_FAILED, {
        jobKey: job.key,
        kind: job.type,
        processInstanceKey: job.processInstanceKey,
        errorName: err.name,
        error: err.message,
        timestamp: new Date(),
      } satisfies StepFailedEvent);

      throw error;
    }
  }
}
