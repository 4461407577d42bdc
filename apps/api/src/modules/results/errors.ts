export class RunNotFoundError extends Error {
  constructor(readonly runId: number) {
    super(`Run ${runId} not found`);
    this.name = 'RunNotFoundError';
  }
}

/** Raised when a run is asked to do something its status forbids, e.g. resuming a completed run. */
export class RunStateError extends Error {
  constructor(
    message: string,
    readonly runId: number
  ) {
    super(message);
    this.name = 'RunStateError';
  }
}
