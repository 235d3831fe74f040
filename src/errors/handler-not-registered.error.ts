export class HandlerNotRegisteredError extends Error {
  constructor(public readonly kind: string) {
    super(`No step handler registered for job type "${kind}".`);
    this.name = 'HandlerNotRegisteredError';
  }
}
