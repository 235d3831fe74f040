export class TrackingFailure extends Error {
  constructor(
    public readonly processInstanceKey: string,
    public readonly operation: 'recordStart' | 'recordCompletion' | 'list',
    public readonly cause?: unknown,
  ) {
    super(
      `Process instance ${operation} failed for ${processInstanceKey}: ` +
        (cause instanceof Error ? cause.message : String(cause)),
    );
    this.name = 'TrackingFailure';
  }
}
