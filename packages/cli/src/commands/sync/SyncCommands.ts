import {
  ContextSnapshotFile,
  SyncOrchestrator,
  SyncedContextStore,
  createFileSinkFactory,
  type SyncOutcome,
} from "@ctxsync/core";
import { SystemBrowserLauncher, TokenClient, type BrowserLauncher } from "@ctxsync/integrations";
import { PathHelper, errorMessage, type SyncedContext } from "@ctxsync/shared";
import {
  configFlagsUsage,
  createConfigArgs,
  loadCliConfig,
  readConfigFlag,
  readTimeoutFlag,
  type ConfigArgs,
} from "../shared/ConfigArgs.js";

interface SyncArgs {
  config: ConfigArgs;
  openBrowser: boolean;
  help: boolean;
}

interface SimpleArgs {
  config: ConfigArgs;
  help: boolean;
}

const syncUsage = `ctxsync sync \\
  [--timeout-ms <MS>] [--strict-ids] [--no-browser] \\
  ${configFlagsUsage}`;

const statusUsage = `ctxsync status ${configFlagsUsage}`;
const clearUsage = `ctxsync clear ${configFlagsUsage}`;

export const parseSyncArgs = (argv: string[]): SyncArgs => {
  const parsed: SyncArgs = { config: createConfigArgs(), openBrowser: true, help: false };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case "--timeout-ms":
        parsed.config.cli.callback = { ...parsed.config.cli.callback, timeoutMs: readTimeoutFlag(argv, i) };
        i += 1;
        break;
      case "--strict-ids":
        parsed.config.cli.callback = { ...parsed.config.cli.callback, strictCoreIds: true };
        break;
      case "--no-browser":
        parsed.openBrowser = false;
        break;
      case "--help":
      case "-h":
        parsed.help = true;
        break;
      default: {
        const consumed = readConfigFlag(argv, i, parsed.config);
        if (consumed === undefined) {
          throw new Error(`Unknown option for sync: ${arg}`);
        }
        i = consumed;
        break;
      }
    }
  }
  return parsed;
};

const parseSimpleArgs = (command: string, argv: string[]): SimpleArgs => {
  const parsed: SimpleArgs = { config: createConfigArgs(), help: false };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") {
      parsed.help = true;
      continue;
    }
    const consumed = readConfigFlag(argv, i, parsed.config);
    if (consumed === undefined) {
      throw new Error(`Unknown option for ${command}: ${arg}`);
    }
    i = consumed;
  }
  return parsed;
};

export type SyncedContextJson = Omit<SyncedContext, "synced_at"> & { synced_at: string };

export const contextToJson = (context: Readonly<SyncedContext>): SyncedContextJson => ({
  ...context,
  synced_at: context.synced_at.toISOString(),
});

export const formatContextLines = (context: Readonly<SyncedContext>): string[] => {
  const lines = [
    `Account: ${context.account_name || "(unnamed)"} [${context.account_id || "-"}]`,
    `Product: ${context.product_name || "(unnamed)"} [${context.product_id || "-"}]`,
    `Big bet: ${context.big_bet || "(unnamed)"} [${context.board_id || "-"}]`,
  ];
  if (context.task_id) {
    lines.push(`Work item: ${context.work_item || "(unnamed)"} [${context.task_id}]`);
  }
  lines.push(`Synced at: ${context.synced_at.toISOString()}`);
  return lines;
};

/** Opens the system browser, or prints the URL when no browser should be used or it fails to start. */
export class CliBrowserLauncher implements BrowserLauncher {
  constructor(private launcher?: BrowserLauncher) {}

  open(url: string, onError?: (error: Error) => void): void {
    if (!this.launcher) {
      // eslint-disable-next-line no-console
      console.log(`Open this URL to finish the sync: ${url}`);
      return;
    }
    this.launcher.open(url, (error) => {
      // eslint-disable-next-line no-console
      console.error(`Could not open a browser (${error.message}). Open this URL instead: ${url}`);
      onError?.(error);
    });
  }
}

const reportFailure = (outcome: Extract<SyncOutcome, { status: "failed" }>, json: boolean): void => {
  if (json) {
    // eslint-disable-next-line no-console
    console.log(
      JSON.stringify(
        {
          status: "failed",
          code: outcome.error.code,
          message: outcome.error.message,
          remediation: outcome.error.remediation,
          action: outcome.remediation ?? null,
        },
        null,
        2,
      ),
    );
  } else {
    // eslint-disable-next-line no-console
    console.error(outcome.error.message);
    for (const hint of outcome.error.remediation) {
      // eslint-disable-next-line no-console
      console.error(`  - ${hint}`);
    }
    if (outcome.remediation) {
      // eslint-disable-next-line no-console
      console.error(`${outcome.remediation.label}: ${outcome.remediation.url}`);
    }
  }
  process.exitCode = 1;
};

const openSnapshot = (): ContextSnapshotFile =>
  new ContextSnapshotFile(PathHelper.getContextSnapshotPath(), (error) => {
    // eslint-disable-next-line no-console
    console.error(`Failed to save synced context: ${errorMessage(error)}`);
  });

export class SyncCommands {
  static async runSync(argv: string[]): Promise<void> {
    const args = parseSyncArgs(argv);
    if (args.help) {
      // eslint-disable-next-line no-console
      console.log(syncUsage);
      return;
    }
    const config = await loadCliConfig(args.config);
    const snapshot = openSnapshot();
    const store = new SyncedContextStore(await snapshot.load());
    const detach = snapshot.attach(store);
    const orchestrator = new SyncOrchestrator({
      tokens: new TokenClient({
        apiBaseUrl: config.apiBaseUrl,
        sessionToken: config.sessionToken,
        timeoutMs: config.requestTimeoutMs,
      }),
      browser: new CliBrowserLauncher(args.openBrowser ? new SystemBrowserLauncher() : undefined),
      store,
      config,
      createEvents: createFileSinkFactory(config.logging.directory),
    });
    const cancel = () => {
      void orchestrator.dispose();
    };
    process.once("SIGINT", cancel);
    try {
      const attempt = orchestrator.start();
      if (!args.config.json) {
        attempt.onStateChange((state) => {
          if (state === "awaiting_callback") {
            // eslint-disable-next-line no-console
            console.log(`Waiting for the browser callback on port ${attempt.port ?? "?"}...`);
          }
        });
      }
      const outcome = await attempt.result;
      await snapshot.flush();
      if (outcome.status === "failed") {
        reportFailure(outcome, args.config.json);
        return;
      }
      // eslint-disable-next-line no-console
      console.log(
        args.config.json
          ? JSON.stringify({ status: "completed", context: contextToJson(outcome.context) }, null, 2)
          : ["Synced task context:", ...formatContextLines(outcome.context).map((line) => `  ${line}`)].join("\n"),
      );
    } finally {
      process.off("SIGINT", cancel);
      detach();
    }
  }

  static async runStatus(argv: string[]): Promise<void> {
    const args = parseSimpleArgs("status", argv);
    if (args.help) {
      // eslint-disable-next-line no-console
      console.log(statusUsage);
      return;
    }
    const context = await openSnapshot().load();
    if (args.config.json) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(context ? { synced: true, context: contextToJson(context) } : { synced: false }, null, 2));
      return;
    }
    // eslint-disable-next-line no-console
    console.log(
      context
        ? ["Synced task context:", ...formatContextLines(context).map((line) => `  ${line}`)].join("\n")
        : "No task synced. Run `ctxsync sync` to pick one.",
    );
  }

  static async runClear(argv: string[]): Promise<void> {
    const args = parseSimpleArgs("clear", argv);
    if (args.help) {
      // eslint-disable-next-line no-console
      console.log(clearUsage);
      return;
    }
    const snapshot = openSnapshot();
    const previous = await snapshot.load();
    const store = new SyncedContextStore(previous);
    const detach = snapshot.attach(store);
    store.clear();
    await snapshot.flush();
    detach();
    // eslint-disable-next-line no-console
    console.log(previous ? "Cleared synced task context." : "No task synced.");
  }
}
