export type MenuSyncErrorCode =
  | "DuplicateRequest"
  | "TransportFailure"
  | "ProtocolMismatch"
  | "Shutdown"
  | "PropertiesUnavailable";

export class MenuSyncError extends Error {
  readonly code: MenuSyncErrorCode;

  constructor(code: MenuSyncErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MenuSyncError";
    this.code = code;
  }
}

export function isMenuSyncError(err: unknown, code?: MenuSyncErrorCode): err is MenuSyncError {
  if (!(err instanceof MenuSyncError)) return false;
  return code === undefined || err.code === code;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Wraps anything a transport throws so waiting callers always see a `MenuSyncError`. */
export function toTransportFailure(err: unknown): MenuSyncError {
  if (err instanceof MenuSyncError) return err;
  return new MenuSyncError("TransportFailure", errorMessage(err), { cause: err });
}
