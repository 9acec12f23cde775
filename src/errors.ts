export type TraccErrorCode =
  | "ALREADY_TRACKING"
  | "NOT_TRACKING"
  | "STORE_UNREADABLE"
  | "IO_FAILURE";

export class TraccError extends Error {
  readonly code: TraccErrorCode;

  constructor(code: TraccErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "TraccError";
    this.code = code;
  }
}

export function isTraccError(
  err: unknown,
  code?: TraccErrorCode
): err is TraccError {
  return err instanceof TraccError && (code === undefined || err.code === code);
}

export function describeCause(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
