import type { IPortStore } from './port-store.interface';
import type { IActionSimulator } from './action-simulator.interface';
import type { IWorkflowClient } from './workflow-client.interface';

export interface PortOperationsModuleOptions {
  /** Store adapter instance implementing IPortStore */
  store: IPortStore;
  /** Engine client used by the scenario launcher */
  workflowClient?: IWorkflowClient;
  /** Stage runner override. Default: TimedActionSimulator at nominal speed */
  simulator?: IActionSimulator;

  /** Process id used when starting scenarios. Default: 'Port_Workflow' */
  bpmnProcessId?: string;

  /** Weighing threshold in kg, inclusive. Default: 30480 */
  maxContainerWeightKg?: number;

  /** Delay between starts in sequential mode. Default: 1000 */
  sequentialStartDelayMs?: number;

  /** Source of every minted timestamp. Default: () => new Date() */
  clock?: () => Date;

  /** Register the active operations scan cron. Default: false */
  enableActiveOperationsCron?: boolean;

  /** Cron expression for the scan. Default: every 5 minutes */
  activeOperationsCronExpression?: string;
}

export interface PortOperationsAsyncOptions {
  imports?: any[];
  useFactory: (
    ...args: any[]
  ) => Promise<PortOperationsModuleOptions> | PortOperationsModuleOptions;
  inject?: any[];
}

export interface ResolvedPortOperationsOptions {
  bpmnProcessId: string;
  maxContainerWeightKg: number;
  sequentialStartDelayMs: number;
  clock: () => Date;
  enableActiveOperationsCron: boolean;
  activeOperationsCronExpression: string;
}
