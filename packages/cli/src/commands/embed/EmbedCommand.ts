import { readFile } from "node:fs/promises";
import path from "node:path";
import { EmbeddingService, createFileSinkFactory } from "@ctxsync/core";
import { EmbeddingClient, TokenClient } from "@ctxsync/integrations";
import { configFlagsUsage, createConfigArgs, loadCliConfig, readConfigFlag, type ConfigArgs } from "../shared/ConfigArgs.js";

interface EmbedArgs {
  config: ConfigArgs;
  texts: string[];
  file?: string;
  model?: string;
  help: boolean;
}

const embedUsage = `ctxsync embed [<TEXT> ...] [--file <PATH>] [--model <MODEL>] \\
  ${configFlagsUsage}`;

export const parseEmbedArgs = (argv: string[]): EmbedArgs => {
  const parsed: EmbedArgs = { config: createConfigArgs(), texts: [], help: false };
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    switch (arg) {
      case "--file":
        parsed.file = argv[i + 1] ? path.resolve(argv[i + 1]) : undefined;
        i += 1;
        break;
      case "--model":
        parsed.model = argv[i + 1];
        i += 1;
        break;
      case "--help":
      case "-h":
        parsed.help = true;
        break;
      default: {
        const consumed = readConfigFlag(argv, i, parsed.config);
        if (consumed !== undefined) {
          i = consumed;
        } else if (arg.startsWith("--")) {
          throw new Error(`Unknown option for embed: ${arg}`);
        } else {
          parsed.texts.push(arg);
        }
        break;
      }
    }
  }
  if (parsed.model) parsed.config.cli.embedding = { model: parsed.model };
  return parsed;
};

const readInputLines = async (file: string): Promise<string[]> => {
  const content = await readFile(file, "utf8");
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean);
};

export class EmbedCommand {
  static async run(argv: string[]): Promise<void> {
    const args = parseEmbedArgs(argv);
    if (args.help) {
      // eslint-disable-next-line no-console
      console.log(embedUsage);
      return;
    }
    const texts = [...args.texts, ...(args.file ? await readInputLines(args.file) : [])];
    if (!texts.length) {
      throw new Error("No input texts. Pass text arguments or --file <PATH>.");
    }
    const config = await loadCliConfig(args.config);
    const tokens = new TokenClient({
      apiBaseUrl: config.apiBaseUrl,
      sessionToken: config.sessionToken,
      timeoutMs: config.requestTimeoutMs,
    });
    const client = new EmbeddingClient(tokens, {
      apiBaseUrl: config.apiBaseUrl,
      model: config.embedding.model,
      timeoutMs: config.requestTimeoutMs,
    });
    const service = new EmbeddingService(client, createFileSinkFactory(config.logging.directory)("embed"));
    const vectors = await service.embedAll(texts);
    const dimensions = vectors[0]?.length ?? 0;
    // eslint-disable-next-line no-console
    console.log(
      args.config.json
        ? JSON.stringify({ model: config.embedding.model, count: vectors.length, dimensions, vectors }, null, 2)
        : `Embedded ${vectors.length} texts with ${config.embedding.model} (${dimensions} dimensions)`,
    );
  }
}
