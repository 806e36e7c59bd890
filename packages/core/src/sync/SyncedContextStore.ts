import { cloneSyncedContext, type SyncedContext } from "@ctxsync/shared";

export type SyncedContextListener = (context: Readonly<SyncedContext> | undefined) => void;

/**
 * Holds the current synced context. Every read returns the same frozen
 * snapshot until the next `set` or `clear` swaps the reference.
 */
export class SyncedContextStore {
  private current: Readonly<SyncedContext> | undefined;
  private listeners = new Set<SyncedContextListener>();

  constructor(initial?: SyncedContext) {
    if (initial) this.current = Object.freeze(cloneSyncedContext(initial));
  }

  get(): Readonly<SyncedContext> | undefined {
    return this.current;
  }

  set(context: SyncedContext): void {
    this.current = Object.freeze(cloneSyncedContext(context));
    this.emit();
  }

  clear(): void {
    if (!this.current) return;
    this.current = undefined;
    this.emit();
  }

  subscribe(listener: SyncedContextListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private emit(): void {
    const snapshot = this.current;
    for (const listener of [...this.listeners]) {
      listener(snapshot);
    }
  }
}
