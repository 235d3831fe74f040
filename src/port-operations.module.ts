import { DynamicModule, Module, Provider } from '@nestjs/common';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { ScheduleModule } from '@nestjs/schedule';
import { CraneLoadingHandler } from './handlers/crane-loading.handler';
import { CraneUnloadingHandler } from './handlers/crane-unloading.handler';
import { StorageHandler } from './handlers/storage.handler';
import { TruckCheckInHandler } from './handlers/truck-checkin.handler';
import { TruckCheckOutHandler } from './handlers/truck-checkout.handler';
import { WeighingHandler } from './handlers/weighing.handler';
import {
  PortOperationsAsyncOptions,
  PortOperationsModuleOptions,
  ResolvedPortOperationsOptions,
} from './interfaces/port-operations-module-options.interface';
import type { IStepHandler } from './interfaces/step-handler.interface';
import {
  ACTION_SIMULATOR,
  DEFAULT_ACTIVE_OPERATIONS_CRON,
  DEFAULT_BPMN_PROCESS_ID,
  DEFAULT_MAX_CONTAINER_WEIGHT_KG,
  DEFAULT_SEQUENTIAL_START_DELAY_MS,
  PORT_OPERATIONS_MODULE_OPTIONS,
  PORT_OPERATIONS_OPTIONS,
  PORT_STORE,
  WORKFLOW_CLIENT,
} from './port-operations.constants';
import { ActiveOperationsCronService } from './services/active-operations-cron.service';
import { JobDispatcher } from './services/job-dispatcher.service';
import { ProcessInstanceTracker } from './services/process-instance-tracker.service';
import { ScenarioLauncher } from './services/scenario-launcher.service';
import { ScenarioReconstructor } from './services/scenario-reconstructor.service';
import { StepHandlerRegistry } from './services/step-handler-registry.service';
import { TimedActionSimulator } from './simulators/timed-action.simulator';

const STEP_HANDLERS = [
  CraneLoadingHandler,
  CraneUnloadingHandler,
  WeighingHandler,
  StorageHandler,
  TruckCheckInHandler,
  TruckCheckOutHandler,
];

export function resolvePortOperationsOptions(
  options: PortOperationsModuleOptions,
): ResolvedPortOperationsOptions {
  return {
    bpmnProcessId: options.bpmnProcessId ?? DEFAULT_BPMN_PROCESS_ID,
    maxContainerWeightKg:
      options.maxContainerWeightKg ?? DEFAULT_MAX_CONTAINER_WEIGHT_KG,
    sequentialStartDelayMs:
      options.sequentialStartDelayMs ?? DEFAULT_SEQUENTIAL_START_DELAY_MS,
    clock: options.clock ?? (() => new Date()),
    enableActiveOperationsCron: options.enableActiveOperationsCron ?? false,
    activeOperationsCronExpression:
      options.activeOperationsCronExpression ?? DEFAULT_ACTIVE_OPERATIONS_CRON,
  };
}

const coreProviders: Provider[] = [
  ...STEP_HANDLERS,
  {
    provide: StepHandlerRegistry,
    useFactory: (...handlers: IStepHandler[]) =>
      StepHandlerRegistry.fromHandlers(handlers),
    inject: STEP_HANDLERS,
  },
  ProcessInstanceTracker,
  JobDispatcher,
  ScenarioReconstructor,
  ScenarioLauncher,
  ActiveOperationsCronService,
];

const moduleExports = [
  JobDispatcher,
  StepHandlerRegistry,
  ProcessInstanceTracker,
  ScenarioReconstructor,
  ScenarioLauncher,
  ActiveOperationsCronService,
  PORT_STORE,
];

@Module({})
export class PortOperationsModule {
  static forRoot(options: PortOperationsModuleOptions): DynamicModule {
    return {
      module: PortOperationsModule,
      imports: [ScheduleModule.forRoot(), EventEmitterModule.forRoot()],
      providers: [
        {
          provide: PORT_STORE,
          useValue: options.store,
        },
        {
          provide: ACTION_SIMULATOR,
          useValue: options.simulator ?? new TimedActionSimulator(),
        },
        {
          provide: WORKFLOW_CLIENT,
          useValue: options.workflowClient ?? null,
        },
        {
          provide: PORT_OPERATIONS_OPTIONS,
          useValue: resolvePortOperationsOptions(options),
        },
        ...coreProviders,
      ],
      exports: moduleExports,
      global: true,
    };
  }

  static forRootAsync(options: PortOperationsAsyncOptions): DynamicModule {
    return {
      module: PortOperationsModule,
      imports: [
        ScheduleModule.forRoot(),
        EventEmitterModule.forRoot(),
        ...(options.imports ?? []),
      ],
      providers: [
        {
          provide: PORT_OPERATIONS_MODULE_OPTIONS,
          useFactory: options.useFactory,
          inject: options.inject ?? [],
        },
        {
          provide: PORT_STORE,
          useFactory: (opts: PortOperationsModuleOptions) => opts.store,
          inject: [PORT_OPERATIONS_MODULE_OPTIONS],
        },
        {
          provide: ACTION_SIMULATOR,
          useFactory: (opts: PortOperationsModuleOptions) =>
            opts.simulator ?? new TimedActionSimulator(),
          inject: [PORT_OPERATIONS_MODULE_OPTIONS],
        },
        {
          provide: WORKFLOW_CLIENT,
          useFactory: (opts: PortOperationsModuleOptions) =>
            opts.workflowClient ?? null,
          inject: [PORT_OPERATIONS_MODULE_OPTIONS],
        },
        {
          provide: PORT_OPERATIONS_OPTIONS,
          useFactory: resolvePortOperationsOptions,
          inject: [PORT_OPERATIONS_MODULE_OPTIONS],
        },
        ...coreProviders,
      ],
      exports: moduleExports,
      global: true,
    };
  }
}
