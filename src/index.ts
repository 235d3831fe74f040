// Module
export {
  PortOperationsModule,
  resolvePortOperationsOptions,
} from './port-operations.module';

// Services
export { JobDispatcher } from './services/job-dispatcher.service';
export { StepHandlerRegistry } from './services/step-handler-registry.service';
export { ProcessInstanceTracker } from './services/process-instance-tracker.service';
export { ScenarioReconstructor } from './services/scenario-reconstructor.service';
export { ScenarioLauncher } from './services/scenario-launcher.service';
export { ActiveOperationsCronService } from './services/active-operations-cron.service';
export type { ActiveOperationsSummary } from './services/active-operations-cron.service';

// Handlers
export { PortStepHandler } from './handlers/port-step.handler';
export type {
  RoutingFields,
  StepHandlerDependencies,
} from './handlers/port-step.handler';
export { CraneLoadingHandler } from './handlers/crane-loading.handler';
export { CraneUnloadingHandler } from './handlers/crane-unloading.handler';
export { WeighingHandler, classifyWeight } from './handlers/weighing.handler';
export type { WeightStatus } from './handlers/weighing.handler';
export { StorageHandler } from './handlers/storage.handler';
export { TruckCheckInHandler } from './handlers/truck-checkin.handler';
export {
  TruckCheckOutHandler,
  gateStayMinutes,
} from './handlers/truck-checkout.handler';

// Engines and simulators
export {
  StorageLifecycle,
  completeStorage,
  isStorageStatus,
} from './engines/storage-lifecycle.engine';
export type { StorageTransition } from './engines/storage-lifecycle.engine';
export { TimedActionSimulator } from './simulators/timed-action.simulator';
export type { TimedActionSimulatorOptions } from './simulators/timed-action.simulator';
export { InstantActionSimulator } from './simulators/instant-action.simulator';
export { STAGE_PLANS } from './simulators/stage-plans';

// Utils
export {
  toInternal,
  toExternal,
  externalNameOf,
} from './utils/variable-translator';
export type {
  EntityFields,
  EntityFieldName,
  TranslatedVariables,
} from './utils/variable-translator';
export {
  checkRequiredVariables,
  requiredVariablesFor,
} from './utils/validation-gate';
export {
  formatTimestamp,
  parseTimestamp,
  toTimestampString,
} from './utils/format-timestamp';

// Interfaces
export type { IPortStore } from './interfaces/port-store.interface';
export type {
  ActiveOperation,
  ContainerDetails,
  OperationType,
  ProcessInstanceRecord,
  ScenarioRow,
  StorageStatus,
  TransportTimestamps,
} from './interfaces/port-records.interface';
export type {
  IStepHandler,
  JobKind,
  JobVariables,
  PortJob,
} from './interfaces/step-handler.interface';
export { JOB_KINDS } from './interfaces/step-handler.interface';
export type {
  ActionStage,
  IActionSimulator,
  SimulatedAction,
} from './interfaces/action-simulator.interface';
export type {
  CreateProcessInstanceRequest,
  CreateProcessInstanceResponse,
  IWorkflowClient,
} from './interfaces/workflow-client.interface';
export type {
  LaunchMode,
  ScenarioBreakdown,
  ScenarioLaunchFailure,
  ScenarioLaunchOutcome,
  ScenarioLaunchResult,
  ScenarioVariables,
} from './interfaces/scenario.interface';
export type {
  PortOperationsAsyncOptions,
  PortOperationsModuleOptions,
  ResolvedPortOperationsOptions,
} from './interfaces/port-operations-module-options.interface';

// Adapters
export { PgPortStoreAdapter } from './adapters/pg-port-store.adapter';
export { DrizzlePortStoreAdapter } from './adapters/drizzle-port-store.adapter';
export { InMemoryPortStoreAdapter } from './adapters/in-memory-port-store.adapter';
export type {
  ContainerSeed,
  InMemoryPortSeed,
  StorageSeed,
  TransportMeanSeed,
  TransportMeanRow,
} from './adapters/in-memory-port-store.adapter';

// Errors
export { ValidationFailure } from './errors/validation-failure.error';
export type { ValidationFailureReason } from './errors/validation-failure.error';
export { EntityNotFoundError } from './errors/entity-not-found.error';
export { PersistenceFailure } from './errors/persistence-failure.error';
export { TrackingFailure } from './errors/tracking-failure.error';
export { JobCancelledError } from './errors/job-cancelled.error';
export { HandlerNotRegisteredError } from './errors/handler-not-registered.error';
export { DuplicateHandlerRegistrationError } from './errors/duplicate-handler-registration.error';
export { InvalidStorageTransitionError } from './errors/invalid-storage-transition.error';
export { WorkflowClientNotConfiguredError } from './errors/workflow-client-not-configured.error';

// Events
export { PortEventType } from './events/port-event-type.enum';
export type {
  ActiveOperationsScannedEvent,
  ScenarioStartedEvent,
  StepCompletedEvent,
  StepFailedEvent,
} from './events/port-events';

// Config
export {
  loadPortOperationsConfig,
  toModuleOptions,
  toPoolConfig,
} from './config/port-operations.config';
export type {
  PortDatabaseConfig,
  PortEnvironment,
  PortOperationsConfig,
} from './config/port-operations.config';

// CLI
export { generatePortSchema } from './cli/generate-schema';

// Constants
export {
  PORT_OPERATIONS_MODULE_OPTIONS,
  PORT_OPERATIONS_OPTIONS,
  PORT_STORE,
  ACTION_SIMULATOR,
  WORKFLOW_CLIENT,
  DEFAULT_BPMN_PROCESS_ID,
  DEFAULT_MAX_CONTAINER_WEIGHT_KG,
  DEFAULT_SEQUENTIAL_START_DELAY_MS,
  DEFAULT_ACTIVE_OPERATIONS_CRON,
  ACTIVE_OPERATIONS_CRON_JOB,
} from './port-operations.constants';
