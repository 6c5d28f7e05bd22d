export class IndexConfigurationError extends Error {
  constructor(
    readonly option: string,
    readonly value: unknown,
    expectation: string
  ) {
    super(`Invalid ${option}: ${String(value)} (expected ${expectation})`);
    this.name = 'IndexConfigurationError';
  }
}
