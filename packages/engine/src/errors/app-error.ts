/**
 * Error taxonomy shared by every fallible operation in the engine.
 *
 * Core functions never throw for expected failures. They return a
 * {@link Result}, and raw exceptions from Node APIs are caught at the call
 * site and converted with {@link fromUnknown} or {@link fail}.
 */

export type AppErrorKind =
  | "IO"
  | "Invalid"
  | "NotFound"
  | "NotPermitted"
  | "Unknown";

export interface AppError {
  kind: AppErrorKind;
  message: string;
  cause?: unknown;
  /** What a `NotFound` is missing; a file unless set. */
  missing?: "page" | "file";
}

export interface Success<T> {
  ok: true;
  value: T;
}

export interface Failure {
  ok: false;
  error: AppError;
}

export type Result<T> = Success<T> | Failure;

export function ok<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function fail(
  kind: AppErrorKind,
  message: string,
  cause?: unknown,
): Failure {
  return cause === undefined
    ? { ok: false, error: { kind, message } }
    : { ok: false, error: { kind, message, cause } };
}

export function describeError(error: AppError): string {
  return `${error.kind}: ${error.message}`;
}

/** Node's `err.code` (ENOENT, EACCES, ...) when present. */
export function errnoCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err) {
    const { code } = err;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Wrap an exception that escaped a core operation. Anything that is not an
 * `Error` is a bug somewhere and maps to `Unknown`.
 */
export function fromUnknown(err: unknown, context: string): Failure {
  if (err instanceof Error) {
    return fail(
      errnoCode(err) ? "IO" : "Unknown",
      `${context}: ${err.message}`,
      err,
    );
  }
  return fail("Unknown", `${context}: ${String(err)}`, err);
}
