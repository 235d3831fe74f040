import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { WorkflowClientNotConfiguredError } from '../errors/workflow-client-not-configured.error';
import { PortEventType } from '../events/port-event-type.enum';
import type { ScenarioStartedEvent } from '../events/port-events';
import type { ResolvedPortOperationsOptions } from '../interfaces/port-operations-module-options.interface';
import type {
  LaunchMode,
  ScenarioLaunchOutcome,
  ScenarioLaunchResult,
  ScenarioVariables,
} from '../interfaces/scenario.interface';
import type { IWorkflowClient } from '../interfaces/workflow-client.interface';
import {
  PORT_OPERATIONS_OPTIONS,
  WORKFLOW_CLIENT,
} from '../port-operations.constants';
import { sleep } from '../utils/sleep';
import { ScenarioReconstructor } from './scenario-reconstructor.service';

/**
 * Starts workflows for reconstructed scenarios, one at a time or all at once.
 * Parallel mode has no concurrency cap: every scenario is started immediately.
 */
@Injectable()
export class ScenarioLauncher {
  private readonly logger = new Logger(ScenarioLauncher.name);

  constructor(
    private readonly reconstructor: ScenarioReconstructor,
    private readonly eventEmitter: EventEmitter2,
    @Inject(PORT_OPERATIONS_OPTIONS)
    private readonly options: Pick<
      ResolvedPortOperationsOptions,
      'bpmnProcessId' | 'sequentialStartDelayMs'
    >,
    @Optional()
    @Inject(WORKFLOW_CLIENT)
    private readonly client?: IWorkflowClient | null,
  ) {}

  async startScenario(
    variables: ScenarioVariables,
  ): Promise<ScenarioLaunchOutcome> {
    const client = this.requireClient();

    if (!variables.transportationId) {
      const error = `transportationId missing for ${variables.containerId || 'unknown container'}`;
      this.logger.error(`Refusing to start scenario: ${error}`);
      return { started: false, error };
    }

    try {
      const { processInstanceKey } = await client.createProcessInstance({
        bpmnProcessId: this.options.bpmnProcessId,
        variables,
      });

      this.eventEmitter.emit(PortEventType.SCENARIO_STARTED, {
        processInstanceKey,
        bpmnProcessId: this.options.bpmnProcessId,
        containerId: variables.containerId,
        transportationId: variables.transportationId,
        timestamp: new Date(),
      } satisfies ScenarioStartedEvent);

      this.logger.log(
        `Started ${this.options.bpmnProcessId} for ${variables.containerId} via ${variables.transportationId}: instance ${processInstanceKey}`,
      );
      return { started: true, processInstanceKey };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `Failed to start workflow for ${variables.containerId}: ${message}`,
      );
      return { started: false, error: message };
    }
  }

  async startAll(
    mode: LaunchMode,
    scenarios?: ScenarioVariables[],
  ): Promise<ScenarioLaunchResult> {
    this.requireClient();
    const startedAt = new Date();
    const batch =
      scenarios ?? (await this.reconstructor.listStartableScenarios());

    this.logger.log(`Starting ${batch.length} workflow(s) in ${mode} mode`);

    const outcomes =
      mode === 'parallel'
        ? await Promise.all(batch.map((scenario) => this.startScenario(scenario)))
        : await this.startSequentially(batch);

    const result: ScenarioLaunchResult = {
      mode,
      startedAt,
      finishedAt: startedAt,
      durationMs: 0,
      total: batch.length,
      successful: 0,
      failed: 0,
      failures: [],
    };

    outcomes.forEach((outcome, index) => {
      if (outcome.started) {
        result.successful++;
        return;
      }
      result.failed++;
      result.failures.push({
        containerId: batch[index].containerId,
        transportationId: batch[index].transportationId,
        error: outcome.error ?? 'unknown error',
      });
    });

    result.finishedAt = new Date();
    result.durationMs = result.finishedAt.getTime() - startedAt.getTime();

    this.logger.log(
      `Launch summary: total=${result.total}, successful=${result.successful}, failed=${result.failed}`,
    );
    return result;
  }

  private async startSequentially(
    scenarios: ScenarioVariables[],
  ): Promise<ScenarioLaunchOutcome[]> {
    const outcomes: ScenarioLaunchOutcome[] = [];

    for (const [index, scenario] of scenarios.entries()) {
      this.logger.log(`[${index + 1}/${scenarios.length}] ${scenario.containerId}`);
      outcomes.push(await this.startScenario(scenario));

      if (index < scenarios.length - 1 && this.options.sequentialStartDelayMs > 0) {
        await sleep(this.options.sequentialStartDelayMs);
      }
    }

    return outcomes;
  }

  private requireClient(): IWorkflowClient {
    if (!this.client) {
      throw new WorkflowClientNotConfiguredError();
    }
    return this.client;
  }
}
