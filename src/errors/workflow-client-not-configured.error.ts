export class WorkflowClientNotConfiguredError extends Error {
  constructor() {
    super(
      'No workflow client configured. Pass `workflowClient` to PortOperationsModule to start scenarios.',
    );
    this.name = 'WorkflowClientNotConfiguredError';
  }
}
