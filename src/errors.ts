export type AppAuthErrorKind =
  | "InvalidInput"
  | "KeyNotFound"
  | "KeyInvalid"
  | "SigningError"
  | "RemoteError"
  | "MalformedResponse"
  | "NotFound"
  | "NoInstallations";

export type AppAuthErrorOptions = {
  status?: number;
  remoteMessage?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
};

/**
 * Failure raised by every toolkit operation. `step` names the operation that
 * failed and prefixes the message; `remoteMessage` carries GitHub's own text.
 */
export class AppAuthError extends Error {
  readonly kind: AppAuthErrorKind;
  readonly step: string;
  readonly status?: number;
  readonly remoteMessage?: string;
  readonly details?: Record<string, unknown>;

  constructor(kind: AppAuthErrorKind, step: string, description: string, options: AppAuthErrorOptions = {}) {
    super(`${step}: ${description}`, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "AppAuthError";
    this.kind = kind;
    this.step = step;
    this.status = options.status;
    this.remoteMessage = options.remoteMessage;
    this.details = options.details;
    Error.captureStackTrace(this, this.constructor);
  }
}

export function isAppAuthError(error: unknown, kind?: AppAuthErrorKind): error is AppAuthError {
  if (!(error instanceof AppAuthError)) {
    return false;
  }
  return kind === undefined || error.kind === kind;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
