export class InvalidStorageTransitionError extends Error {
  constructor(
    public readonly from: string,
    public readonly to: string,
  ) {
    super(`Storage status cannot move from "${from}" to "${to}".`);
    this.name = 'InvalidStorageTransitionError';
  }
}
