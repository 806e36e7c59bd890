import { promises as fs } from "node:fs";
import path from "node:path";
import { PathHelper, type SyncedContext } from "@ctxsync/shared";
import type { SyncedContextStore } from "./SyncedContextStore.js";

const REQUIRED_FIELDS = ["account_id", "account_name", "product_id", "product_name", "board_id"] as const;
const OPTIONAL_FIELDS = ["big_bet", "big_bet_description", "task_id", "work_item", "work_item_description"] as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const decodeSnapshot = (raw: unknown): SyncedContext | undefined => {
  if (!isRecord(raw)) return undefined;
  if (typeof raw.synced_at !== "string") return undefined;
  const syncedAt = new Date(raw.synced_at);
  if (Number.isNaN(syncedAt.getTime())) return undefined;
  const context: SyncedContext = {
    account_id: "",
    account_name: "",
    product_id: "",
    product_name: "",
    board_id: "",
    synced_at: syncedAt,
  };
  for (const field of REQUIRED_FIELDS) {
    const value = raw[field];
    if (typeof value !== "string") return undefined;
    context[field] = value;
  }
  for (const field of OPTIONAL_FIELDS) {
    const value = raw[field];
    if (value === undefined) continue;
    if (typeof value !== "string") return undefined;
    context[field] = value;
  }
  return context;
};

/**
 * Persists the store's context so separate CLI invocations share the last
 * sync. The file is removed when the store is cleared.
 */
export class ContextSnapshotFile {
  readonly filePath: string;
  private writes: Promise<void> = Promise.resolve();

  constructor(
    filePath: string = PathHelper.getContextSnapshotPath(),
    private onError?: (error: unknown) => void,
  ) {
    this.filePath = filePath;
  }

  async load(): Promise<SyncedContext | undefined> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return undefined;
      throw error;
    }
    try {
      return decodeSnapshot(JSON.parse(content));
    } catch {
      return undefined;
    }
  }

  async save(context: Readonly<SyncedContext> | undefined): Promise<void> {
    if (!context) {
      await fs.rm(this.filePath, { force: true });
      return;
    }
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const payload = { ...context, synced_at: context.synced_at.toISOString() };
    await fs.writeFile(this.filePath, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
  }

  /** Mirrors every store change to disk until the returned function is called. */
  attach(store: SyncedContextStore): () => void {
    return store.subscribe((context) => {
      this.writes = this.writes.then(() => this.save(context)).catch((error: unknown) => this.onError?.(error));
    });
  }

  flush(): Promise<void> {
    return this.writes;
  }
}

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";
