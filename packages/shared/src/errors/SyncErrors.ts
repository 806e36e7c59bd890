export type AuthErrorCode = "not_signed_in" | "network";

export type SyncErrorCode =
  | "timeout"
  | "parse_failure"
  | "respond_failure"
  | "listener_failure"
  | "cancelled";

export type ErrorDetails = Record<string, unknown>;

type ErrorInput<C extends string> = {
  code: C;
  message: string;
  remediation?: string[];
  details?: ErrorDetails;
  cause?: unknown;
};

export class AuthError extends Error {
  readonly code: AuthErrorCode;
  readonly remediation: string[];
  readonly details?: ErrorDetails;

  constructor({ code, message, remediation, details, cause }: ErrorInput<AuthErrorCode>) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "AuthError";
    this.code = code;
    this.remediation = remediation ?? [];
    this.details = details;
  }
}

export class SyncError extends Error {
  readonly code: SyncErrorCode;
  readonly remediation: string[];
  readonly details?: ErrorDetails;

  constructor({ code, message, remediation, details, cause }: ErrorInput<SyncErrorCode>) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "SyncError";
    this.code = code;
    this.remediation = remediation ?? [];
    this.details = details;
  }
}

export const createNotSignedInError = (detail?: string): AuthError =>
  new AuthError({
    code: "not_signed_in",
    message: detail
      ? `Unable to sync task: not signed in (${detail}).`
      : "Unable to sync task: not signed in.",
    remediation: ["Sign in and try the sync again."],
  });

export const createNetworkAuthError = (cause: unknown, details?: ErrorDetails): AuthError =>
  new AuthError({
    code: "network",
    message: `Failed to acquire sync token: ${errorMessage(cause)}`,
    remediation: ["Check your network connection and retry."],
    details,
    cause,
  });

export const createSyncTimeoutError = (timeoutMs: number): SyncError =>
  new SyncError({
    code: "timeout",
    message: `Sync timeout - no callback received within ${Math.round(timeoutMs / 1000)}s`,
    remediation: ["Run the sync again and finish the flow in the browser."],
    details: { timeoutMs },
  });

export const isAuthError = (error: unknown): error is AuthError => error instanceof AuthError;

export const isSyncError = (error: unknown): error is SyncError => error instanceof SyncError;

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const NOT_SIGNED_IN_PATTERNS = [/not[_\s-]*signed[_\s-]*in/i, /unauthori[sz]ed/i, /http\s*40[13]/i, /invalid[_\s-]*session/i];

export const isNotSignedInMessage = (message?: string | null): boolean => {
  if (!message) return false;
  return NOT_SIGNED_IN_PATTERNS.some((pattern) => pattern.test(message));
};
