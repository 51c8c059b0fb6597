export class RunStoreError extends Error {
  constructor(
    public readonly runId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "RunStoreError";
  }
}
