import type { JobVariables } from '../interfaces/step-handler.interface';
import { toTimestampString } from './format-timestamp';

/**
 * Entity fields a job variable set can carry, named after the relational
 * columns. `undefined` means "not provided".
 */
export interface EntityFields {
  container_id?: string;
  transportation_id?: string;
  operation_type?: string;
  weight?: number;
  storage_id?: number;
  storage_status?: string;
  check_in?: string;
  check_out?: string;
  process_instance_key?: string;
}

export type EntityFieldName = keyof EntityFields;

export interface TranslatedVariables {
  fields: EntityFields;
  /** Keys that are not known fields, or whose value could not be mapped */
  passthrough: JobVariables;
}

type FieldType = 'string' | 'number' | 'timestamp';

interface FieldMapping {
  external: string;
  internal: EntityFieldName;
  type: FieldType;
}

const FIELD_MAPPINGS: readonly FieldMapping[] = [
  { external: 'containerId', internal: 'container_id', type: 'string' },
  { external: 'transportationId', internal: 'transportation_id', type: 'string' },
  { external: 'operationType', internal: 'operation_type', type: 'string' },
  { external: 'weight', internal: 'weight', type: 'number' },
  { external: 'storageId', internal: 'storage_id', type: 'number' },
  { external: 'storageStatus', internal: 'storage_status', type: 'string' },
  { external: 'checkIn', internal: 'check_in', type: 'timestamp' },
  { external: 'checkOut', internal: 'check_out', type: 'timestamp' },
  { external: 'processInstanceKey', internal: 'process_instance_key', type: 'string' },
];

function normalizeKey(key: string): string {
  return key.replace(/[_\-\s]/g, '').toLowerCase();
}

const MAPPING_BY_NORMALIZED_KEY = new Map<string, FieldMapping>(
  FIELD_MAPPINGS.map((mapping) => [normalizeKey(mapping.external), mapping]),
);

export function externalNameOf(field: EntityFieldName): string {
  const mapping = FIELD_MAPPINGS.find((candidate) => candidate.internal === field);
  return mapping ? mapping.external : field;
}

function coerceString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'bigint') return value.toString();
  return undefined;
}

function coerceNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function coerceTimestamp(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (value instanceof Date) return toTimestampString(value) ?? undefined;
  return undefined;
}

function coerce(value: unknown, type: FieldType): string | number | undefined {
  switch (type) {
    case 'string':
      return coerceString(value);
    case 'number':
      return coerceNumber(value);
    case 'timestamp':
      return coerceTimestamp(value);
  }
}

function assignField(
  fields: EntityFields,
  name: EntityFieldName,
  value: string | number,
): void {
  switch (name) {
    case 'weight':
    case 'storage_id':
      if (typeof value === 'number') fields[name] = value;
      return;
    default:
      if (typeof value === 'string') fields[name] = value;
  }
}

/**
 * Splits an engine variable set into known entity fields and passthrough keys.
 * Key matching ignores case, underscores, dashes and spaces.
 */
export function toInternal(variables: JobVariables): TranslatedVariables {
  const fields: EntityFields = {};
  const passthrough: JobVariables = {};

  for (const [key, value] of Object.entries(variables)) {
    const mapping = MAPPING_BY_NORMALIZED_KEY.get(normalizeKey(key));
    const coerced =
      mapping && value !== null && value !== undefined
        ? coerce(value, mapping.type)
        : undefined;

    if (!mapping || coerced === undefined || fields[mapping.internal] !== undefined) {
      passthrough[key] = value;
      continue;
    }

    assignField(fields, mapping.internal, coerced);
  }

  return { fields, passthrough };
}

function findTargetKey(base: JobVariables, mapping: FieldMapping): string {
  if (Object.prototype.hasOwnProperty.call(base, mapping.external)) {
    return mapping.external;
  }
  const normalized = normalizeKey(mapping.external);
  const existing = Object.keys(base).find(
    (key) => normalizeKey(key) === normalized,
  );
  return existing ?? mapping.external;
}

/**
 * Writes entity fields back onto a copy of `base`, reusing the key `base`
 * already has for a field so the caller's casing survives.
 */
export function toExternal(
  fields: EntityFields,
  base: JobVariables = {},
): JobVariables {
  const result: JobVariables = { ...base };

  for (const mapping of FIELD_MAPPINGS) {
    const value = fields[mapping.internal];
    if (value === undefined) continue;
    result[findTargetKey(base, mapping)] = value;
  }

  return result;
}
