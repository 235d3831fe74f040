import type { ScenarioVariables } from './scenario.interface';

export interface CreateProcessInstanceRequest {
  bpmnProcessId: string;
  variables: ScenarioVariables;
}

export interface CreateProcessInstanceResponse {
  processInstanceKey: string;
}

/**
 * Port onto the external workflow engine, used only to start process instances.
 */
export interface IWorkflowClient {
  createProcessInstance(
    request: CreateProcessInstanceRequest,
  ): Promise<CreateProcessInstanceResponse>;
}
