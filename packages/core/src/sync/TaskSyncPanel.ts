import { isAuthError, type SyncedContext } from "@ctxsync/shared";
import type { SyncedContextStore } from "./SyncedContextStore.js";
import type { RemediationAction, SyncOrchestrator, SyncOutcome } from "./SyncOrchestrator.js";

export const SIGN_IN_NOTICE = "Unable to sync task. Please ensure you're signed in and try again.";

export interface PanelNotice {
  message: string;
  action?: RemediationAction;
}

export interface TaskSyncPanelState {
  expanded: boolean;
  syncing: boolean;
  context?: Readonly<SyncedContext>;
  notice?: PanelNotice;
}

const QUIET_FAILURES = new Set<string>(["cancelled", "timeout"]);

type PanelListener = (state: Readonly<TaskSyncPanelState>) => void;

/**
 * UI-facing state of the task sync section. Rendering lives elsewhere; this
 * class only tracks what to show.
 */
export class TaskSyncPanel {
  private current: TaskSyncPanelState;
  private listeners = new Set<PanelListener>();
  private unsubscribeStore: () => void;
  private disposed = false;

  constructor(
    private store: SyncedContextStore,
    private orchestrator: SyncOrchestrator,
  ) {
    const context = store.get();
    this.current = { expanded: !context, syncing: false, context };
    this.unsubscribeStore = store.subscribe((next) => {
      // Collapse once a task is synced, reopen when it is cleared.
      this.update({ context: next, expanded: !next });
    });
  }

  get state(): Readonly<TaskSyncPanelState> {
    return this.current;
  }

  subscribe(listener: PanelListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  toggle(): void {
    this.update({ expanded: !this.current.expanded });
  }

  dismissNotice(): void {
    this.update({ notice: undefined });
  }

  async sync(): Promise<SyncOutcome> {
    const attempt = this.orchestrator.start();
    this.update({ syncing: true, notice: undefined });
    const outcome = await attempt.result;
    if (this.disposed || this.orchestrator.activeAttempt !== attempt) return outcome;
    if (outcome.status === "completed") {
      this.update({ syncing: false });
      return outcome;
    }
    if (isAuthError(outcome.error)) {
      this.update({ syncing: false, notice: { message: SIGN_IN_NOTICE, action: outcome.remediation } });
    } else if (QUIET_FAILURES.has(outcome.error.code)) {
      // The panel stays as it was before the sync; the attempt log has the details.
      this.update({ syncing: false });
    } else {
      this.update({ syncing: false, notice: { message: outcome.error.message } });
    }
    return outcome;
  }

  clear(): void {
    this.store.clear();
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    this.unsubscribeStore();
    this.listeners.clear();
    await this.orchestrator.dispose();
  }

  private update(patch: Partial<TaskSyncPanelState>): void {
    if (this.disposed) return;
    this.current = { ...this.current, ...patch };
    const snapshot = this.current;
    for (const listener of [...this.listeners]) {
      listener(snapshot);
    }
  }
}
