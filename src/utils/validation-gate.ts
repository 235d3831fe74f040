import { ValidationFailure } from '../errors/validation-failure.error';
import type { JobKind } from '../interfaces/step-handler.interface';
import { SENTINEL_VALUE, TRUCK_PREFIX } from '../port-operations.constants';
import {
  EntityFieldName,
  EntityFields,
  externalNameOf,
} from './variable-translator';

const REQUIRED_FIELDS: Record<JobKind, readonly EntityFieldName[]> = {
  crane_loading: ['container_id', 'transportation_id'],
  crane_unloading: ['container_id', 'transportation_id'],
  weighing: ['container_id'],
  storage: ['container_id'],
  truck_checkin: ['container_id', 'transportation_id'],
  truck_checkout: ['container_id', 'transportation_id'],
};

const TRUCK_ONLY: ReadonlySet<JobKind> = new Set<JobKind>([
  'truck_checkin',
  'truck_checkout',
]);

export function requiredVariablesFor(kind: JobKind): string[] {
  return REQUIRED_FIELDS[kind].map(externalNameOf);
}

/**
 * Checks the required variables of a job kind. Pure: performs no I/O.
 * @returns the first failure, or null when the job may proceed
 */
export function checkRequiredVariables(
  kind: JobKind,
  fields: EntityFields,
): ValidationFailure | null {
  for (const field of REQUIRED_FIELDS[kind]) {
    const value = fields[field];
    const name = externalNameOf(field);

    if (value === undefined || (typeof value === 'string' && value.trim() === '')) {
      return new ValidationFailure(name, kind, 'missing');
    }
    if (value === SENTINEL_VALUE) {
      return new ValidationFailure(name, kind, 'sentinel');
    }
  }

  const transportationId = fields.transportation_id;
  if (
    TRUCK_ONLY.has(kind) &&
    transportationId !== undefined &&
    !transportationId.startsWith(TRUCK_PREFIX)
  ) {
    return new ValidationFailure(
      externalNameOf('transportation_id'),
      kind,
      'invalid-prefix',
      `"${transportationId}" must start with "${TRUCK_PREFIX}"`,
    );
  }

  return null;
}
