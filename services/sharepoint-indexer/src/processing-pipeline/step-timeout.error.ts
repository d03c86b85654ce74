export class StepTimeoutError extends Error {
  public constructor(
    public readonly stepName: string,
    public readonly timeoutMs: number,
  ) {
    super(`Step ${stepName} timed out after ${timeoutMs}ms`);
    this.name = 'StepTimeoutError';
  }
}
