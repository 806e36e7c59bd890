import http, { type IncomingMessage, type Server, type ServerResponse } from "node:http";
import {
  SyncError,
  createSyncTimeoutError,
  errorMessage,
  missingCoreKeys,
  parseCallbackQuery,
  type SyncedContext,
} from "@ctxsync/shared";
import { noopSyncEventSink, type SyncEventSink } from "./SyncEventLogger.js";

export const SYNC_COMPLETE_HTML = `<!DOCTYPE html>
<html>
<head>
  <title>Sync Complete</title>
  <script>window.close();</script>
</head>
<body>
  <h1>Sync Complete!</h1>
  <p>You can close this tab and return to your editor.</p>
</body>
</html>`;

export interface CallbackListenerOptions {
  host?: string;
  strictCoreIds?: boolean;
  events?: SyncEventSink;
  now?: () => Date;
}

interface PendingWait {
  resolve: (context: SyncedContext) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

type Rejection = { status: number; reason: string };

/**
 * One-shot loopback HTTP listener for the browser sync callback. The socket
 * lives from `bind()` until the first valid callback, the deadline, or
 * `close()`, whichever comes first.
 */
export class CallbackListener {
  private server: Server | undefined;
  private boundPort: number | undefined;
  private pending: PendingWait | undefined;
  private received: SyncedContext | undefined;
  private waited = false;
  private closed = false;
  private readonly host: string;
  private readonly strictCoreIds: boolean;
  private readonly events: SyncEventSink;
  private readonly now: () => Date;

  constructor(options: CallbackListenerOptions = {}) {
    this.host = options.host ?? "127.0.0.1";
    this.strictCoreIds = options.strictCoreIds ?? false;
    this.events = options.events ?? noopSyncEventSink;
    this.now = options.now ?? (() => new Date());
  }

  get port(): number | undefined {
    return this.boundPort;
  }

  async bind(): Promise<number> {
    if (this.closed) {
      throw new SyncError({ code: "cancelled", message: "Callback listener was closed before binding" });
    }
    if (this.server) {
      throw new SyncError({ code: "listener_failure", message: "Callback listener is already bound" });
    }
    const server = http.createServer((req, res) => {
      void this.handleRequest(req, res);
    });
    this.server = server;
    try {
      await new Promise<void>((resolve, reject) => {
        server.once("error", reject);
        server.listen(0, this.host, () => {
          server.off("error", reject);
          resolve();
        });
      });
    } catch (error) {
      this.server = undefined;
      throw new SyncError({
        code: "listener_failure",
        message: `Failed to bind callback listener on ${this.host}: ${errorMessage(error)}`,
        remediation: ["Check that loopback networking is available and retry."],
        details: { host: this.host },
        cause: error,
      });
    }
    if (this.closed) {
      // close() already owns the server and finishes the shutdown.
      throw new SyncError({ code: "cancelled", message: "Callback listener was closed while binding" });
    }
    const address = server.address();
    if (!address || typeof address === "string") {
      await this.shutdown();
      throw new SyncError({ code: "listener_failure", message: "Callback listener has no TCP address" });
    }
    this.boundPort = address.port;
    return this.boundPort;
  }

  /** Waits for the first valid callback; the deadline is one timer, armed once. */
  listen(timeoutMs: number): Promise<SyncedContext> {
    if (this.closed) {
      return Promise.reject(new SyncError({ code: "cancelled", message: "Sync was cancelled" }));
    }
    if (!this.server) {
      return Promise.reject(
        new SyncError({ code: "listener_failure", message: "Callback listener is not bound" }),
      );
    }
    if (this.waited) {
      return Promise.reject(
        new SyncError({ code: "listener_failure", message: "Callback listener is already waiting" }),
      );
    }
    this.waited = true;
    if (this.received) {
      const context = this.received;
      return this.releaseSocket().then(() => context);
    }
    return new Promise<SyncedContext>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = undefined;
        void this.events.log("callback_timeout", { timeoutMs });
        void this.releaseSocket().then(() => reject(createSyncTimeoutError(timeoutMs)));
      }, timeoutMs);
      this.pending = { resolve, reject, timer };
    });
  }

  /** Releases the socket and cancels a pending wait. Safe to call repeatedly. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const pending = this.pending;
    this.pending = undefined;
    if (pending) {
      clearTimeout(pending.timer);
      pending.reject(new SyncError({ code: "cancelled", message: "Sync was cancelled" }));
    }
    await this.shutdown();
  }

  protected writeResponse(
    res: ServerResponse,
    status: number,
    contentType: string,
    body: string,
  ): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      res.once("error", reject);
      res.once("close", () => {
        if (!res.writableFinished) reject(new Error("connection closed before the response was sent"));
      });
      res.writeHead(status, { "Content-Type": contentType, Connection: "close" });
      res.end(body, () => resolve());
    });
  }

  private validate(req: IncomingMessage): { context: SyncedContext } | Rejection {
    if (req.method !== "GET") {
      return { status: 400, reason: `unexpected method ${req.method ?? "unknown"}` };
    }
    let url: URL;
    try {
      url = new URL(req.url ?? "", "http://localhost");
    } catch {
      return { status: 400, reason: "request target is not a valid URL" };
    }
    if (url.pathname !== "/") {
      return { status: 404, reason: `unexpected path ${url.pathname}` };
    }
    const context = parseCallbackQuery(url.searchParams, this.now());
    if (this.strictCoreIds) {
      const missing = missingCoreKeys(context);
      if (missing.length) {
        return { status: 400, reason: `missing ${missing.join(", ")}` };
      }
    }
    return { context };
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (this.closed || this.received) {
      res.writeHead(410, { "Content-Type": "text/plain", Connection: "close" });
      res.end("Sync already finished");
      return;
    }
    const outcome = this.validate(req);
    if (!("context" in outcome)) {
      await this.events.log("parse_failure", { reason: outcome.reason, status: outcome.status });
      try {
        await this.writeResponse(res, outcome.status, "text/plain", `Invalid sync callback: ${outcome.reason}`);
      } catch (error) {
        await this.events.log("respond_failure", { status: outcome.status, error: errorMessage(error) });
      }
      return;
    }

    this.received = outcome.context;
    try {
      await this.writeResponse(res, 200, "text/html", SYNC_COMPLETE_HTML);
    } catch (error) {
      await this.events.log("respond_failure", { status: 200, error: errorMessage(error) });
    }
    await this.events.log("callback_received", { task_id: outcome.context.task_id ?? null });

    const pending = this.pending;
    if (!pending) return;
    this.pending = undefined;
    clearTimeout(pending.timer);
    await this.releaseSocket();
    pending.resolve(outcome.context);
  }

  /** Shutdown for paths that must still settle the wait; close errors are logged. */
  private async releaseSocket(): Promise<void> {
    try {
      await this.shutdown();
    } catch (error) {
      await this.events.log("listener_close_failure", { error: errorMessage(error) });
    }
  }

  private async shutdown(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = undefined;
    if (!server.listening) {
      // close() on a server that is still binding never settles its listen callback.
      const started = await new Promise<boolean>((resolve) => {
        server.once("listening", () => resolve(true));
        server.once("error", () => resolve(false));
      });
      if (!started) return;
    }
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });
  }
}
