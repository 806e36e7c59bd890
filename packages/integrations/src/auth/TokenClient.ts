import {
  AuthError,
  createNetworkAuthError,
  createNotSignedInError,
  errorMessage,
  isNotSignedInMessage,
  joinUrlPath,
} from "@ctxsync/shared";

export interface TokenSource {
  acquire(): Promise<string>;
}

export interface TokenClientOptions {
  apiBaseUrl: string;
  /** Credential of the signed-in desktop session; absent means signed out. */
  sessionToken?: string;
  timeoutMs?: number;
}

const readToken = (payload: unknown): string | undefined => {
  if (typeof payload !== "object" || payload === null || !("token" in payload)) return undefined;
  return typeof payload.token === "string" && payload.token ? payload.token : undefined;
};

export const TOKEN_PATH = "/api/v1/llm-token";

/**
 * Exchanges the desktop session for a short-lived bearer token. Failures are
 * reported as AuthError; retrying is left to the caller.
 */
export class TokenClient implements TokenSource {
  constructor(private options: TokenClientOptions) {}

  async acquire(): Promise<string> {
    if (!this.options.sessionToken) {
      throw createNotSignedInError("no session credential configured");
    }
    const url = joinUrlPath(this.options.apiBaseUrl, TOKEN_PATH);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs ?? 30_000);
    try {
      return await this.request(url, this.options.sessionToken, controller.signal);
    } finally {
      clearTimeout(timeout);
    }
  }

  /** Runs under the caller's abort signal until the body has been read. */
  private async request(url: URL, sessionToken: string, signal: AbortSignal): Promise<string> {
    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          accept: "application/json",
          authorization: `Bearer ${sessionToken}`,
        },
        body: "{}",
        signal,
      });
    } catch (error) {
      throw createNetworkAuthError(error, { url: url.toString() });
    }

    if (response.status === 401 || response.status === 403) {
      throw createNotSignedInError(`token issuer returned ${response.status}`);
    }
    if (!response.ok) {
      const detail = await response.text().catch(() => "");
      if (isNotSignedInMessage(detail)) {
        throw createNotSignedInError(`token issuer returned ${response.status}`);
      }
      throw createNetworkAuthError(
        new Error(`token request failed (${response.status}): ${detail || response.statusText}`),
        { status: response.status },
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw createNetworkAuthError(new Error(`malformed token response: ${errorMessage(error)}`));
    }
    const token = readToken(body);
    if (!token) {
      throw new AuthError({
        code: "network",
        message: "Failed to acquire sync token: response did not include a token",
        remediation: ["Retry the sync; contact support if it keeps failing."],
      });
    }
    return token;
  }
}
