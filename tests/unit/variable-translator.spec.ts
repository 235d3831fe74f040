import {
  externalNameOf,
  toExternal,
  toInternal,
} from '../../src/utils/variable-translator';

describe('toInternal', () => {
  it('should map camelCase keys to entity fields', () => {
    const { fields, passthrough } = toInternal({
      containerId: 'C1001',
      transportationId: 'truck101',
      operationType: 'loading',
    });

    expect(fields).toEqual({
      container_id: 'C1001',
      transportation_id: 'truck101',
      operation_type: 'loading',
    });
    expect(passthrough).toEqual({});
  });

  it('should match keys ignoring case and underscores', () => {
    expect(toInternal({ ContainerID: 'C1' }).fields.container_id).toBe('C1');
    expect(toInternal({ container_id: 'C2' }).fields.container_id).toBe('C2');
    expect(toInternal({ 'transportation-id': 't' }).fields.transportation_id).toBe('t');
  });

  it('should keep a second alias of a mapped field in passthrough', () => {
    const { fields, passthrough } = toInternal({
      containerId: 'C1',
      ContainerID: 'C2',
    });

    expect(fields.container_id).toBe('C1');
    expect(passthrough).toEqual({ ContainerID: 'C2' });
  });

  it('should coerce numeric strings and numbers to the field type', () => {
    const { fields } = toInternal({
      weight: '12000',
      storageId: 7,
      containerId: 1001,
    });

    expect(fields.weight).toBe(12000);
    expect(fields.storage_id).toBe(7);
    expect(fields.container_id).toBe('1001');
  });

  it('should format Date values as timestamp text', () => {
    const { fields } = toInternal({ checkIn: new Date(2025, 0, 2, 3, 4, 5) });
    expect(fields.check_in).toBe('2025-01-02 03:04:05');
  });

  it('should pass through null and uncoercible values under the key they arrived with', () => {
    const { fields, passthrough } = toInternal({
      transportationId: null,
      weight: 'heavy',
      storageId: Number.POSITIVE_INFINITY,
      craneOperator: 'CRANE-OP-001',
    });

    expect(fields).toEqual({});
    expect(passthrough).toEqual({
      transportationId: null,
      weight: 'heavy',
      storageId: Number.POSITIVE_INFINITY,
      craneOperator: 'CRANE-OP-001',
    });
  });

  it('should keep empty strings and zero as provided values', () => {
    const { fields } = toInternal({ containerId: '', weight: 0 });
    expect(fields.container_id).toBe('');
    expect(fields.weight).toBe(0);
  });
});

describe('toExternal', () => {
  it('should write fields onto canonical keys when base has none', () => {
    expect(toExternal({ container_id: 'C1', weight: 5 })).toEqual({
      containerId: 'C1',
      weight: 5,
    });
  });

  it('should reuse the key already present in base', () => {
    const result = toExternal(
      { container_id: 'C9', weight: 5 },
      { container_id: 'C1', other: true },
    );

    expect(result).toEqual({ container_id: 'C9', other: true, weight: 5 });
  });

  it('should prefer the exact canonical key over an alias', () => {
    const result = toExternal(
      { container_id: 'C9' },
      { ContainerID: 'C1', containerId: 'C2' },
    );

    expect(result).toEqual({ ContainerID: 'C1', containerId: 'C9' });
  });

  it('should skip fields that are not provided', () => {
    expect(toExternal({ transportation_id: undefined }, { a: 1 })).toEqual({
      a: 1,
    });
  });

  it('should not mutate base', () => {
    const base = { containerId: 'C1' };
    toExternal({ container_id: 'C2' }, base);
    expect(base).toEqual({ containerId: 'C1' });
  });
});

describe('round trip', () => {
  it('should restore a variable set whose values already have field types', () => {
    const variables = {
      containerId: 'C1001',
      transportationId: 'truck101',
      operationType: 'loading',
      weight: 12000,
      checkIn: '2025-03-14 08:00:00',
      craneLoadingStatus: 'completed',
    };

    const { fields, passthrough } = toInternal(variables);
    expect(toExternal(fields, passthrough)).toEqual(variables);
  });
});

describe('externalNameOf', () => {
  it('should return the camelCase variable name of a field', () => {
    expect(externalNameOf('transportation_id')).toBe('transportationId');
    expect(externalNameOf('process_instance_key')).toBe('processInstanceKey');
  });
});
