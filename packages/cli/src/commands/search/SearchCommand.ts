import { randomUUID } from "node:crypto";
import {
  ContextSnapshotFile,
  FILE_SEARCH_TOOL_NAME,
  SyncedContextStore,
  ToolRegistry,
  createFileSearchTool,
  createFileSinkFactory,
} from "@ctxsync/core";
import { SearchClient, TokenClient } from "@ctxsync/integrations";
import { PathHelper, type SearchFilter } from "@ctxsync/shared";
import { configFlagsUsage, createConfigArgs, loadCliConfig, readConfigFlag, type ConfigArgs } from "../shared/ConfigArgs.js";

interface SearchArgs {
  config: ConfigArgs;
  query?: string;
  limit?: number;
  filter: SearchFilter;
  help: boolean;
}

const searchUsage = `ctxsync search [<QUERY>] \\
  [--thread <THREAD_ID>] [--type <conversations|tasks|compressed|all>] \\
  [--content-type <work_item|big_bet|auto>] [--limit <1-100>] \\
  [--account-id <ID>] [--product-id <ID>] [--board-id <ID>] [--task-id <ID>] \\
  ${configFlagsUsage}`;

const FILTER_FLAGS = new Map<string, keyof SearchFilter>([
  ["--thread", "thread_id"],
  ["--type", "search_type"],
  ["--content-type", "content_type"],
  ["--account-id", "account_id"],
  ["--product-id", "product_id"],
  ["--board-id", "board_id"],
  ["--task-id", "task_id"],
]);

export const parseSearchArgs = (argv: string[]): SearchArgs => {
  const parsed: SearchArgs = { config: createConfigArgs(), filter: {}, help: false };
  const words: string[] = [];
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const filterKey = FILTER_FLAGS.get(arg);
    if (filterKey) {
      const value = argv[i + 1];
      if (value === undefined) throw new Error(`Missing value for ${arg}`);
      parsed.filter[filterKey] = value;
      i += 1;
      continue;
    }
    if (arg === "--limit") {
      const limit = Number(argv[i + 1]);
      if (!Number.isFinite(limit)) throw new Error("Invalid --limit: expected number.");
      parsed.limit = limit;
      i += 1;
      continue;
    }
    if (arg === "--help" || arg === "-h") {
      parsed.help = true;
      continue;
    }
    const consumed = readConfigFlag(argv, i, parsed.config);
    if (consumed !== undefined) {
      i = consumed;
      continue;
    }
    if (arg.startsWith("--")) {
      throw new Error(`Unknown option for search: ${arg}`);
    }
    words.push(arg);
  }
  if (words.length) parsed.query = words.join(" ");
  return parsed;
};

export class SearchCommand {
  static async run(argv: string[]): Promise<void> {
    const args = parseSearchArgs(argv);
    if (args.help) {
      // eslint-disable-next-line no-console
      console.log(searchUsage);
      return;
    }
    const config = await loadCliConfig(args.config);
    const snapshot = new ContextSnapshotFile(PathHelper.getContextSnapshotPath());
    const store = new SyncedContextStore(await snapshot.load());
    const registry = new ToolRegistry();
    registry.register(
      createFileSearchTool({
        store,
        tokens: new TokenClient({
          apiBaseUrl: config.apiBaseUrl,
          sessionToken: config.sessionToken,
          timeoutMs: config.requestTimeoutMs,
        }),
        search: new SearchClient({ apiBaseUrl: config.apiBaseUrl, timeoutMs: config.requestTimeoutMs }),
      }),
    );

    const input = {
      query: args.query,
      limit: args.limit,
      filter: Object.keys(args.filter).length ? args.filter : undefined,
    };
    const callId = `search-${randomUUID()}`;
    if (!args.config.json) {
      // eslint-disable-next-line no-console
      console.log(`${registry.describeCall(FILE_SEARCH_TOOL_NAME, input)}...`);
    }
    const result = await registry.execute(FILE_SEARCH_TOOL_NAME, input, {
      callId,
      events: createFileSinkFactory(config.logging.directory)(callId),
    });
    if (!result.ok) {
      // eslint-disable-next-line no-console
      console.error(`search failed: ${result.error ?? "unknown error"}`);
      process.exitCode = 1;
      return;
    }
    // eslint-disable-next-line no-console
    console.log(args.config.json ? JSON.stringify(result.data, null, 2) : result.output.trimEnd());
  }
}
