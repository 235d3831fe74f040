export class DuplicateHandlerRegistrationError extends Error {
  constructor(
    public readonly kind: string,
    public readonly class1: string,
    public readonly class2: string,
  ) {
    super(
      `Duplicate step handler for job type "${kind}". ` +
        `Both ${class1} and ${class2} are registered for it.`,
    );
    this.name = 'DuplicateHandlerRegistrationError';
  }
}
