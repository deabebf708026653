/**
 * errors.ts: The one error type every gateway call throws.
 *
 * KINDS:
 *   domain        – an expected backend refusal (bad credentials, user exists…)
 *   unauthorized  – backend answered 401
 *   connection    – the request never got a response
 *   unexpected    – any other status, or a body we could not parse
 *   cancelled     – the caller aborted (page navigated away); never shown
 */

export type ApiErrorKind =
  | "domain"
  | "unauthorized"
  | "connection"
  | "unexpected"
  | "cancelled";

export class ApiError extends Error {
  readonly kind: ApiErrorKind;
  readonly status?: number;

  constructor(kind: ApiErrorKind, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "ApiError";
    this.kind = kind;
    this.status = options.status;
  }
}

export const UNKNOWN_ERROR_MESSAGE = "An unknown error occurred. Please try again.";
export const CONNECTION_ERROR_MESSAGE = "Unable to connect to the server. Please try again later.";
export const UNAUTHORIZED_MESSAGE = "Your session is not authorized. Please log in again.";

export function isCancelled(err: unknown): boolean {
  return err instanceof ApiError && err.kind === "cancelled";
}

/** User-facing text for anything a page catches. */
export function errorMessage(err: unknown): string {
  if (err instanceof ApiError) return err.message;
  return UNKNOWN_ERROR_MESSAGE;
}
