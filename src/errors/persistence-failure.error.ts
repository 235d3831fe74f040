export class PersistenceFailure extends Error {
  constructor(
    public readonly operation: string,
    public readonly key: string,
    public readonly cause?: unknown,
  ) {
    super(
      `Store operation ${operation} failed for "${key}": ` +
        (cause instanceof Error ? cause.message : 'no matching row'),
    );
    this.name = 'PersistenceFailure';
  }
}
