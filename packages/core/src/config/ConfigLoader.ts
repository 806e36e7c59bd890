import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { PathHelper } from "@ctxsync/shared";
import {
  DEFAULT_API_BASE_URL,
  DEFAULT_CALLBACK,
  DEFAULT_EMBEDDING,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_SIGN_IN_PATH,
  DEFAULT_WEB_BASE_URL,
  MAX_TIMEOUT_MS,
  type CallbackConfig,
  type CtxsyncConfig,
  type EmbeddingConfig,
  type LoggingConfig,
} from "./Config.js";

export interface ConfigSource {
  webBaseUrl?: string;
  apiBaseUrl?: string;
  signInUrl?: string;
  sessionToken?: string;
  requestTimeoutMs?: number;
  callback?: Partial<CallbackConfig>;
  embedding?: Partial<EmbeddingConfig>;
  logging?: Partial<LoggingConfig>;
}

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  cli?: ConfigSource;
  configPath?: string;
}

const LOOPBACK_HOSTS = new Set(["127.0.0.1", "localhost", "::1"]);

const parseNumberStrict = (value: string | undefined, label: string): number | undefined => {
  if (!value) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid ${label}: expected number.`);
  }
  return parsed;
};

const parseBooleanStrict = (value: string | undefined, label: string): boolean | undefined => {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  throw new Error(`Invalid ${label}: expected boolean.`);
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const normalizeStringField = (value: unknown, label: string): string | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new Error(`Invalid ${label}: expected string.`);
  }
  return value;
};

const normalizeNumberField = (value: unknown, label: string): number | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`Invalid ${label}: expected number.`);
  }
  return value;
};

const normalizeBooleanField = (value: unknown, label: string): boolean | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") {
    throw new Error(`Invalid ${label}: expected boolean.`);
  }
  return value;
};

const normalizeSection = (value: unknown, label: string): Record<string, unknown> | undefined => {
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    throw new Error(`Invalid ${label}: expected object.`);
  }
  return value;
};

type Assignable = string | number | boolean | undefined;

const assign = <T extends object, K extends keyof T>(target: T, key: K, value: T[K] & Assignable): void => {
  if (value !== undefined) target[key] = value;
};

export const normalizeConfigSource = (raw: unknown, label = "config"): ConfigSource => {
  if (!isRecord(raw)) {
    throw new Error(`Invalid ${label}: expected object.`);
  }
  const source: ConfigSource = {};
  assign(source, "webBaseUrl", normalizeStringField(raw.webBaseUrl, `${label}.webBaseUrl`));
  assign(source, "apiBaseUrl", normalizeStringField(raw.apiBaseUrl, `${label}.apiBaseUrl`));
  assign(source, "signInUrl", normalizeStringField(raw.signInUrl, `${label}.signInUrl`));
  assign(source, "sessionToken", normalizeStringField(raw.sessionToken, `${label}.sessionToken`));
  assign(source, "requestTimeoutMs", normalizeNumberField(raw.requestTimeoutMs, `${label}.requestTimeoutMs`));

  const callbackRaw = normalizeSection(raw.callback, `${label}.callback`);
  if (callbackRaw) {
    const callback: Partial<CallbackConfig> = {};
    assign(callback, "host", normalizeStringField(callbackRaw.host, `${label}.callback.host`));
    assign(callback, "timeoutMs", normalizeNumberField(callbackRaw.timeoutMs, `${label}.callback.timeoutMs`));
    assign(
      callback,
      "strictCoreIds",
      normalizeBooleanField(callbackRaw.strictCoreIds, `${label}.callback.strictCoreIds`),
    );
    source.callback = callback;
  }
  const embeddingRaw = normalizeSection(raw.embedding, `${label}.embedding`);
  if (embeddingRaw) {
    const embedding: Partial<EmbeddingConfig> = {};
    assign(embedding, "model", normalizeStringField(embeddingRaw.model, `${label}.embedding.model`));
    source.embedding = embedding;
  }
  const loggingRaw = normalizeSection(raw.logging, `${label}.logging`);
  if (loggingRaw) {
    const logging: Partial<LoggingConfig> = {};
    assign(logging, "directory", normalizeStringField(loggingRaw.directory, `${label}.logging.directory`));
    source.logging = logging;
  }
  return source;
};

const findConfigFile = (cwd: string): string | undefined => {
  const candidates = ["ctxsync.config.yaml", "ctxsync.config.yml", "ctxsync.config.json", ".ctxsyncrc"];
  for (const candidate of candidates) {
    const candidatePath = path.join(cwd, candidate);
    if (existsSync(candidatePath)) {
      return candidatePath;
    }
  }
  return undefined;
};

const readConfigFile = async (configPath?: string): Promise<ConfigSource | undefined> => {
  if (!configPath) return undefined;
  if (!existsSync(configPath)) return undefined;
  const content = await readFile(configPath, "utf8");
  if (!content.trim()) return undefined;
  // JSON documents are valid YAML, so one parser covers every candidate file.
  return normalizeConfigSource(YAML.parse(content), path.basename(configPath));
};

const loadEnvConfig = (env: NodeJS.ProcessEnv): ConfigSource => {
  const config: ConfigSource = {};
  if (env.CTXSYNC_WEB_BASE_URL) config.webBaseUrl = env.CTXSYNC_WEB_BASE_URL;
  if (env.CTXSYNC_API_BASE_URL) config.apiBaseUrl = env.CTXSYNC_API_BASE_URL;
  if (env.CTXSYNC_SIGN_IN_URL) config.signInUrl = env.CTXSYNC_SIGN_IN_URL;
  if (env.CTXSYNC_SESSION_TOKEN) config.sessionToken = env.CTXSYNC_SESSION_TOKEN;
  assign(
    config,
    "requestTimeoutMs",
    parseNumberStrict(env.CTXSYNC_REQUEST_TIMEOUT_MS, "CTXSYNC_REQUEST_TIMEOUT_MS"),
  );

  const callback: Partial<CallbackConfig> = {};
  if (env.CTXSYNC_CALLBACK_HOST) callback.host = env.CTXSYNC_CALLBACK_HOST;
  assign(callback, "timeoutMs", parseNumberStrict(env.CTXSYNC_CALLBACK_TIMEOUT_MS, "CTXSYNC_CALLBACK_TIMEOUT_MS"));
  assign(
    callback,
    "strictCoreIds",
    parseBooleanStrict(env.CTXSYNC_CALLBACK_STRICT_IDS, "CTXSYNC_CALLBACK_STRICT_IDS"),
  );
  if (Object.keys(callback).length) config.callback = callback;
  if (env.CTXSYNC_EMBEDDING_MODEL) config.embedding = { model: env.CTXSYNC_EMBEDDING_MODEL };
  if (env.CTXSYNC_LOG_DIR) config.logging = { directory: env.CTXSYNC_LOG_DIR };
  return config;
};

const mergeConfigs = (
  defaults: CtxsyncConfig,
  fileConfig?: ConfigSource,
  envConfig?: ConfigSource,
  cliConfig?: ConfigSource,
): CtxsyncConfig => ({
  ...defaults,
  ...fileConfig,
  ...envConfig,
  ...cliConfig,
  callback: {
    ...defaults.callback,
    ...fileConfig?.callback,
    ...envConfig?.callback,
    ...cliConfig?.callback,
  },
  embedding: {
    ...defaults.embedding,
    ...fileConfig?.embedding,
    ...envConfig?.embedding,
    ...cliConfig?.embedding,
  },
  logging: {
    ...defaults.logging,
    ...fileConfig?.logging,
    ...envConfig?.logging,
    ...cliConfig?.logging,
  },
});

const isHttpUrl = (value: string): boolean => {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
};

const isTimeout = (value: number): boolean => value > 0 && value <= MAX_TIMEOUT_MS;

const assertValid = (config: CtxsyncConfig): void => {
  const errors: string[] = [];
  if (!isHttpUrl(config.webBaseUrl)) errors.push("webBaseUrl");
  if (!isHttpUrl(config.apiBaseUrl)) errors.push("apiBaseUrl");
  if (!isHttpUrl(config.signInUrl)) errors.push("signInUrl");
  if (!isTimeout(config.requestTimeoutMs)) errors.push("requestTimeoutMs");
  if (!isTimeout(config.callback.timeoutMs)) errors.push("callback.timeoutMs");
  if (!LOOPBACK_HOSTS.has(config.callback.host)) errors.push("callback.host");
  if (!config.embedding.model.trim()) errors.push("embedding.model");
  if (errors.length) {
    throw new Error(`Invalid config values: ${errors.join(", ")}`);
  }
};

export const loadConfig = async (options: LoadConfigOptions = {}): Promise<CtxsyncConfig> => {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? findConfigFile(cwd);
  const fileConfig = await readConfigFile(configPath);
  const envConfig = loadEnvConfig(env);

  const defaults: CtxsyncConfig = {
    webBaseUrl: DEFAULT_WEB_BASE_URL,
    apiBaseUrl: DEFAULT_API_BASE_URL,
    signInUrl: "",
    sessionToken: undefined,
    requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
    callback: DEFAULT_CALLBACK,
    embedding: DEFAULT_EMBEDDING,
    logging: { directory: PathHelper.getLogDir() },
  };

  const merged = mergeConfigs(defaults, fileConfig, envConfig, options.cli);
  const finalized: CtxsyncConfig = {
    ...merged,
    signInUrl: merged.signInUrl || new URL(DEFAULT_SIGN_IN_PATH, merged.webBaseUrl).toString(),
    logging: { directory: path.resolve(cwd, merged.logging.directory) },
  };
  assertValid(finalized);
  return finalized;
};
