import path from "node:path";
import { MAX_TIMEOUT_MS, loadConfig, type ConfigSource, type CtxsyncConfig } from "@ctxsync/core";

export interface ConfigArgs {
  configPath?: string;
  cli: ConfigSource;
  json: boolean;
}

export const configFlagsUsage = `[--config <PATH>] \\
  [--web-base-url <URL>] [--api-base-url <URL>] [--sign-in-url <URL>] \\
  [--session-token <TOKEN>] [--request-timeout-ms <MS>] [--log-dir <PATH>] [--json]`;

export const createConfigArgs = (): ConfigArgs => ({ cli: {}, json: false });

const parseNumberFlag = (flag: string, value: string | undefined): number => {
  const parsed = Number(value);
  if (value === undefined || value === "" || !Number.isFinite(parsed)) {
    throw new Error(`Invalid ${flag}: expected number.`);
  }
  return parsed;
};

const requireValue = (flag: string, value: string | undefined): string => {
  if (value === undefined || value.startsWith("--")) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
};

/**
 * Consumes one shared configuration flag at `index`. Returns the index of the
 * last consumed argument, or undefined when the flag is not a shared one.
 */
export const readConfigFlag = (argv: string[], index: number, args: ConfigArgs): number | undefined => {
  const arg = argv[index];
  const value = argv[index + 1];
  switch (arg) {
    case "--config":
      args.configPath = path.resolve(requireValue(arg, value));
      return index + 1;
    case "--web-base-url":
      args.cli.webBaseUrl = requireValue(arg, value);
      return index + 1;
    case "--api-base-url":
      args.cli.apiBaseUrl = requireValue(arg, value);
      return index + 1;
    case "--sign-in-url":
      args.cli.signInUrl = requireValue(arg, value);
      return index + 1;
    case "--session-token":
      args.cli.sessionToken = requireValue(arg, value);
      return index + 1;
    case "--request-timeout-ms":
      args.cli.requestTimeoutMs = parseTimeoutFlag(arg, value);
      return index + 1;
    case "--log-dir":
      args.cli.logging = { directory: requireValue(arg, value) };
      return index + 1;
    case "--json":
      args.json = true;
      return index;
    default:
      return undefined;
  }
};

const parseTimeoutFlag = (flag: string, value: string | undefined): number => {
  const parsed = parseNumberFlag(flag, value);
  if (parsed <= 0 || parsed > MAX_TIMEOUT_MS) {
    throw new Error(`Invalid ${flag}: expected 1 to ${MAX_TIMEOUT_MS} milliseconds.`);
  }
  return parsed;
};

export const readTimeoutFlag = (argv: string[], index: number): number => parseTimeoutFlag(argv[index], argv[index + 1]);

export const loadCliConfig = (args: ConfigArgs): Promise<CtxsyncConfig> =>
  loadConfig({ configPath: args.configPath, cli: args.cli });
