import type { JobKind } from '../interfaces/step-handler.interface';

export class JobCancelledError extends Error {
  constructor(
    public readonly jobKey: string,
    public readonly handlerKind: JobKind,
    public readonly phase: 'before-action' | 'after-action',
  ) {
    super(
      `Job ${jobKey} (${handlerKind}) cancelled ${phase === 'before-action' ? 'before' : 'after'} its simulated action.`,
    );
    this.name = 'JobCancelledError';
  }
}
