export class RunBusyError extends Error {
  constructor(public readonly runId: string) {
    super(`Run ${runId} is already being driven in this process`);
    this.name = "RunBusyError";
  }
}
