#!/usr/bin/env node
import { createRequire } from "node:module";
import { EmbedCommand } from "../commands/embed/EmbedCommand.js";
import { SearchCommand } from "../commands/search/SearchCommand.js";
import { SyncCommands } from "../commands/sync/SyncCommands.js";

export const USAGE =
  "Usage: ctxsync <sync|status|clear|search|embed> [...args]\n" +
  "  sync    open the browser, pick a task and store its context\n" +
  "  status  show the synced task context\n" +
  "  clear   forget the synced task context\n" +
  "  search  search planning context scoped to the synced task\n" +
  "  embed   embed texts with the cloud embedding endpoint\n" +
  "Run `ctxsync <command> --help` for command flags.";

// Source layout first, then the compiled layout under dist/.
const PACKAGE_JSON_CANDIDATES = ["../../package.json", "../../../../../packages/cli/package.json"];

export const readCliVersion = (): string => {
  const require = createRequire(import.meta.url);
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    let pkg: unknown;
    try {
      pkg = require(candidate);
    } catch {
      continue;
    }
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  }
  return "dev";
};

export class CtxsyncEntrypoint {
  static async run(argv: string[] = process.argv.slice(2)): Promise<void> {
    const [command, ...rest] = argv;
    if (command === "--version" || command === "-v" || command === "version") {
      // eslint-disable-next-line no-console
      console.log(readCliVersion());
      return;
    }
    if (command === "--help" || command === "-h" || command === "help") {
      // eslint-disable-next-line no-console
      console.log(USAGE);
      return;
    }
    if (!command) {
      throw new Error(USAGE);
    }
    if (command === "sync") {
      await SyncCommands.runSync(rest);
      return;
    }
    if (command === "status") {
      await SyncCommands.runStatus(rest);
      return;
    }
    if (command === "clear") {
      await SyncCommands.runClear(rest);
      return;
    }
    if (command === "search") {
      await SearchCommand.run(rest);
      return;
    }
    if (command === "embed") {
      await EmbedCommand.run(rest);
      return;
    }
    throw new Error(`Unknown command: ${command}`);
  }
}

if (process.argv[1] && process.argv[1].endsWith("CtxsyncEntrypoint.js")) {
  CtxsyncEntrypoint.run().catch((error) => {
    // eslint-disable-next-line no-console
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
}
