import type { JobKind } from '../interfaces/step-handler.interface';

export class EntityNotFoundError extends Error {
  constructor(
    public readonly entity: 'container',
    public readonly key: string,
    public readonly handlerKind: JobKind,
  ) {
    super(`${entity} "${key}" not found (required by ${handlerKind}).`);
    this.name = 'EntityNotFoundError';
  }
}
