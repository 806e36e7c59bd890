import { randomUUID } from "node:crypto";
import {
  AuthError,
  SyncError,
  createNetworkAuthError,
  errorMessage,
  isAuthError,
  isSyncError,
  type SyncedContext,
} from "@ctxsync/shared";
import type { BrowserLauncher, TokenSource } from "@ctxsync/integrations";
import type { CtxsyncConfig } from "../config/Config.js";
import { CallbackListener } from "./CallbackListener.js";
import { buildHandoffUrl } from "./HandoffUrlBuilder.js";
import type { SyncedContextStore } from "./SyncedContextStore.js";
import { noopSyncEventSink, type SyncEventSink, type SyncEventSinkFactory } from "./SyncEventLogger.js";

export type SyncAttemptState =
  | "acquiring_token"
  | "listener_bound"
  | "awaiting_callback"
  | "completed"
  | "failed"
  | "disposed";

export interface RemediationAction {
  label: string;
  url: string;
}

export type SyncOutcome =
  | { status: "completed"; context: Readonly<SyncedContext> }
  | { status: "failed"; error: AuthError | SyncError; remediation?: RemediationAction };

export type SyncConfig = Pick<CtxsyncConfig, "webBaseUrl" | "signInUrl" | "callback">;

export interface SyncOrchestratorDeps {
  tokens: TokenSource;
  browser: BrowserLauncher;
  store: SyncedContextStore;
  config: SyncConfig;
  createListener?: (events: SyncEventSink) => CallbackListener;
  createEvents?: SyncEventSinkFactory;
  createAttemptId?: () => string;
}

type StateListener = (state: SyncAttemptState) => void;

const TERMINAL_STATES = new Set<SyncAttemptState>(["completed", "failed", "disposed"]);

const asSyncError = (error: unknown): SyncError =>
  isSyncError(error)
    ? error
    : new SyncError({ code: "listener_failure", message: errorMessage(error), cause: error });

const cancelledError = (): SyncError =>
  new SyncError({ code: "cancelled", message: "Sync was cancelled" });

/**
 * A single run of the browser handshake. Steps run strictly in order:
 * token, listener bind, browser handoff, callback wait. `result` never rejects.
 */
export class SyncAttempt {
  readonly id: string;
  readonly events: SyncEventSink;
  readonly result: Promise<SyncOutcome>;
  private currentState: SyncAttemptState = "acquiring_token";
  private listener: CallbackListener | undefined;
  private disposed = false;
  private stateListeners = new Set<StateListener>();

  constructor(
    private deps: SyncOrchestratorDeps,
    id: string,
  ) {
    this.id = id;
    this.events = deps.createEvents?.(id) ?? noopSyncEventSink;
    this.result = this.run().catch((error: unknown) => this.fail(asSyncError(error)));
  }

  get state(): SyncAttemptState {
    return this.currentState;
  }

  get port(): number | undefined {
    return this.listener?.port;
  }

  onStateChange(listener: StateListener): () => void {
    this.stateListeners.add(listener);
    return () => {
      this.stateListeners.delete(listener);
    };
  }

  /** Detaches the attempt from the store and releases its listener. */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    if (TERMINAL_STATES.has(this.currentState)) return;
    this.transition("disposed");
    await this.events.log("attempt_disposed");
    await this.releaseListener();
  }

  private async releaseListener(): Promise<void> {
    const listener = this.listener;
    if (!listener) return;
    try {
      await listener.close();
    } catch (error) {
      await this.events.log("listener_close_failure", { error: errorMessage(error) });
    }
  }

  private transition(state: SyncAttemptState): void {
    if (TERMINAL_STATES.has(this.currentState)) return;
    this.currentState = state;
    for (const listener of [...this.stateListeners]) {
      listener(state);
    }
  }

  private async fail(error: AuthError | SyncError, remediation?: RemediationAction): Promise<SyncOutcome> {
    this.transition("failed");
    await this.events.log("attempt_failed", { code: error.code, message: error.message });
    return remediation ? { status: "failed", error, remediation } : { status: "failed", error };
  }

  private cancelled(): Promise<SyncOutcome> {
    return this.fail(cancelledError());
  }

  private async run(): Promise<SyncOutcome> {
    // First transition happens after the caller had a chance to subscribe.
    await Promise.resolve();
    await this.events.log("attempt_started");

    let token: string;
    try {
      token = await this.deps.tokens.acquire();
    } catch (error) {
      const authError = isAuthError(error) ? error : createNetworkAuthError(error);
      return this.fail(authError, { label: "Sign in", url: this.deps.config.signInUrl });
    }
    if (this.disposed) return this.cancelled();
    await this.events.log("token_acquired");

    const listener =
      this.deps.createListener?.(this.events) ??
      new CallbackListener({
        host: this.deps.config.callback.host,
        strictCoreIds: this.deps.config.callback.strictCoreIds,
        events: this.events,
      });
    this.listener = listener;
    try {
      return await this.handoff(listener, token);
    } finally {
      await this.releaseListener();
    }
  }

  private async handoff(listener: CallbackListener, token: string): Promise<SyncOutcome> {
    let port: number;
    try {
      port = await listener.bind();
    } catch (error) {
      if (this.disposed) return this.cancelled();
      return this.fail(asSyncError(error));
    }
    if (this.disposed) return this.cancelled();
    this.transition("listener_bound");
    await this.events.log("listener_bound", { port });

    const handoff = buildHandoffUrl(this.deps.config.webBaseUrl, token, port);
    const logOpenFailure = (error: unknown) => {
      void this.events.log("browser_open_failed", { error: errorMessage(error) });
    };
    try {
      this.deps.browser.open(handoff.toString(), logOpenFailure);
    } catch (error) {
      logOpenFailure(error);
    }
    await this.events.log("browser_opened", { port });

    this.transition("awaiting_callback");
    let context: SyncedContext;
    try {
      context = await listener.listen(this.deps.config.callback.timeoutMs);
    } catch (error) {
      if (this.disposed) return this.cancelled();
      return this.fail(asSyncError(error));
    }
    if (this.disposed) return this.cancelled();

    this.deps.store.set(context);
    this.transition("completed");
    await this.events.log("attempt_completed", { task_id: context.task_id ?? null });
    return { status: "completed", context: this.deps.store.get() ?? context };
  }
}

/**
 * Starts sync attempts against a shared store. Only the latest attempt can
 * publish: starting a new one disposes the outstanding attempt.
 */
export class SyncOrchestrator {
  private current: SyncAttempt | undefined;

  constructor(private deps: SyncOrchestratorDeps) {}

  get activeAttempt(): SyncAttempt | undefined {
    return this.current;
  }

  start(): SyncAttempt {
    const previous = this.current;
    const attempt = new SyncAttempt(this.deps, this.deps.createAttemptId?.() ?? randomUUID());
    this.current = attempt;
    if (previous) {
      void previous.dispose();
    }
    return attempt;
  }

  async dispose(): Promise<void> {
    const attempt = this.current;
    this.current = undefined;
    await attempt?.dispose();
  }
}
