export interface CallbackConfig {
  host: string;
  timeoutMs: number;
  /** Reject callbacks missing account_id, product_id or board_id instead of storing empty ids. */
  strictCoreIds: boolean;
}

export interface EmbeddingConfig {
  model: string;
}

export interface LoggingConfig {
  directory: string;
}

export interface CtxsyncConfig {
  webBaseUrl: string;
  apiBaseUrl: string;
  signInUrl: string;
  sessionToken?: string;
  requestTimeoutMs: number;
  callback: CallbackConfig;
  embedding: EmbeddingConfig;
  logging: LoggingConfig;
}

export const DEFAULT_WEB_BASE_URL = "https://app.ctxsync.dev";
export const DEFAULT_API_BASE_URL = "https://api.ctxsync.dev";
export const DEFAULT_SIGN_IN_PATH = "/auth/sign-in";

export const DEFAULT_CALLBACK: CallbackConfig = {
  host: "127.0.0.1",
  timeoutMs: 5 * 60 * 1000,
  strictCoreIds: false,
};

export const DEFAULT_EMBEDDING: EmbeddingConfig = {
  model: "text-embedding-small",
};

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/** Largest delay `setTimeout` honours; longer values fire immediately. */
export const MAX_TIMEOUT_MS = 2_147_483_647;
