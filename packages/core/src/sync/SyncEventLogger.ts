import { promises as fs } from "node:fs";
import path from "node:path";

export interface SyncLogEvent {
  type: string;
  timestamp: string;
  attemptId: string;
  data: Record<string, unknown>;
}

/** Sink for sync lifecycle events. Implementations must not throw into the caller. */
export interface SyncEventSink {
  log(type: string, data?: Record<string, unknown>): Promise<void>;
}

export const noopSyncEventSink: SyncEventSink = {
  log: async () => undefined,
};

/**
 * Appends one JSON line per event to `<logDir>/<attemptId>.jsonl`.
 */
export class SyncEventLogger implements SyncEventSink {
  readonly logPath: string;
  readonly logDir: string;
  readonly attemptId: string;
  private writes: Promise<void> = Promise.resolve();

  constructor(logDir: string, attemptId: string, private onWriteError?: (error: unknown) => void) {
    this.logDir = path.resolve(logDir);
    this.attemptId = attemptId;
    this.logPath = path.join(this.logDir, `${attemptId}.jsonl`);
  }

  log(type: string, data: Record<string, unknown> = {}): Promise<void> {
    const event: SyncLogEvent = {
      type,
      timestamp: new Date().toISOString(),
      attemptId: this.attemptId,
      data,
    };
    // Serialized so lines land in emission order even when callers do not await.
    this.writes = this.writes.then(() => this.append(event));
    return this.writes;
  }

  private async append(event: SyncLogEvent): Promise<void> {
    try {
      await fs.mkdir(this.logDir, { recursive: true });
      await fs.appendFile(this.logPath, `${JSON.stringify(event)}\n`, "utf8");
    } catch (error) {
      this.onWriteError?.(error);
    }
  }
}

export type SyncEventSinkFactory = (attemptId: string) => SyncEventSink;

export const createFileSinkFactory =
  (logDir: string, onWriteError?: (error: unknown) => void): SyncEventSinkFactory =>
  (attemptId) =>
    new SyncEventLogger(logDir, attemptId, onWriteError);

/** In-memory sink used by embedders that keep events for display. */
export class MemorySyncEventSink implements SyncEventSink {
  readonly events: Array<{ type: string; data: Record<string, unknown> }> = [];

  async log(type: string, data: Record<string, unknown> = {}): Promise<void> {
    this.events.push({ type, data });
  }

  types(): string[] {
    return this.events.map((event) => event.type);
  }
}
