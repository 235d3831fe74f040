import { EventEmitter2 } from '@nestjs/event-emitter';
import { HandlerNotRegisteredError } from '../../src/errors/handler-not-registered.error';
import { PortEventType } from '../../src/events/port-event-type.enum';
import { CraneLoadingHandler } from '../../src/handlers/crane-loading.handler';
import { WeighingHandler } from '../../src/handlers/weighing.handler';
import { JobDispatcher } from '../../src/services/job-dispatcher.service';
import { ProcessInstanceTracker } from '../../src/services/process-instance-tracker.service';
import { StepHandlerRegistry } from '../../src/services/step-handler-registry.service';
import { InstantActionSimulator } from '../../src/simulators/instant-action.simulator';
import { createJob, createSeededStore, createTestOptions } from '../helpers';

describe('JobDispatcher', () => {
  let dispatcher: JobDispatcher;
  let emitSpy: jest.SpyInstance;

  beforeEach(() => {
    const store = createSeededStore();
    const options = createTestOptions();
    const simulator = new InstantActionSimulator();
    const tracker = new ProcessInstanceTracker(store, options);
    const registry = StepHandlerRegistry.fromHandlers([
      new CraneLoadingHandler(store, simulator, tracker, options),
      new WeighingHandler(store, simulator, tracker, options),
    ]);
    const emitter = new EventEmitter2();
    emitSpy = jest.spyOn(emitter, 'emit');
    dispatcher = new JobDispatcher(registry, emitter);
  });

  it('should run the handler for the job type and emit completion', async () => {
    const output = await dispatcher.dispatch(
      createJob(
        'weighing',
        { containerId: 'C1001', transportationId: 'truck101' },
        { key: 'job-7', processInstanceKey: '42' },
      ),
    );

    expect(output.weightStatus).toBe('OK');
    expect(emitSpy).toHaveBeenCalledWith(
      PortEventType.STEP_COMPLETED,
      expect.objectContaining({
        jobKey: 'job-7',
        kind: 'weighing',
        processInstanceKey: '42',
        containerId: 'C1001',
        transportationId: 'truck101',
      }),
    );
  });

  it('should emit a failure and rethrow fatal errors', async () => {
    await expect(
      dispatcher.dispatch(createJob('weighing', { containerId: 'C9999' })),
    ).rejects.toThrow('container "C9999" not found (required by weighing).');

    expect(emitSpy).toHaveBeenCalledWith(
      PortEventType.STEP_FAILED,
      expect.objectContaining({
        kind: 'weighing',
        errorName: 'EntityNotFoundError',
      }),
    );
  });

  it('should fail jobs without a registered handler', async () => {
    await expect(
      dispatcher.dispatch(createJob('storage', { containerId: 'C1001' })),
    ).rejects.toBeInstanceOf(HandlerNotRegisteredError);

    expect(emitSpy).toHaveBeenCalledWith(
      PortEventType.STEP_FAILED,
      expect.objectContaining({
        kind: 'storage',
        errorName: 'HandlerNotRegisteredError',
      }),
    );
  });
});
