export class UpdateFailedError extends Error {
  readonly column: number;

  constructor(column: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Screen update failed at column ${column}: ${reason}`, { cause });
    this.name = "UpdateFailedError";
    this.column = column;
  }
}

export class SlotBusyError extends Error {
  constructor() {
    super("Screen is already held by another pass");
    this.name = "SlotBusyError";
  }
}
