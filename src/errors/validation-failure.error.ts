import type { JobKind } from '../interfaces/step-handler.interface';

export type ValidationFailureReason = 'missing' | 'sentinel' | 'invalid-prefix';

export class ValidationFailure extends Error {
  constructor(
    public readonly field: string,
    public readonly handlerKind: JobKind,
    public readonly reason: ValidationFailureReason,
    detail?: string,
  ) {
    super(
      reason === 'invalid-prefix'
        ? `Invalid variable "${field}" for ${handlerKind}: ${detail ?? 'unexpected prefix'}`
        : `Missing required variable "${field}" for ${handlerKind}` +
            (reason === 'sentinel' ? ' (placeholder value)' : ''),
    );
    this.name = 'ValidationFailure';
  }
}
