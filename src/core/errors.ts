/** Transport-level failure of an outbound request, after retries. */
export class NetworkError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "NetworkError";
    this.status = status;
  }
}

/** Input or output file problems that stop a run before any record is processed. */
export class FatalIoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FatalIoError";
  }
}
