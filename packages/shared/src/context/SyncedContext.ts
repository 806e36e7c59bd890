/**
 * Task context delivered by the browser sync flow. Values are replaced
 * wholesale on every successful sync and never edited in place.
 */
export interface SyncedContext {
  account_id: string;
  account_name: string;
  product_id: string;
  product_name: string;
  /** Board ("big bet") the user picked; empty string when the callback omitted it. */
  board_id: string;
  big_bet?: string;
  big_bet_description?: string;
  /** Absent for board-level syncs. */
  task_id?: string;
  work_item?: string;
  work_item_description?: string;
  synced_at: Date;
}

export const CORE_CONTEXT_KEYS = ["account_id", "product_id", "board_id"] as const;

export type CoreContextKey = (typeof CORE_CONTEXT_KEYS)[number];

/**
 * Filter sent with remote search calls. Unset fields are left off the wire
 * entirely; `search_type` travels as `type`.
 */
export interface SearchFilter {
  search_type?: string;
  content_type?: string;
  thread_id?: string;
  account_id?: string;
  product_id?: string;
  board_id?: string;
  task_id?: string;
}

export const SCOPED_FILTER_KEYS = ["account_id", "product_id", "board_id", "task_id"] as const;

export type ScopedFilterKey = (typeof SCOPED_FILTER_KEYS)[number];

export const AUTO_CONTENT_TYPE = "auto";

export const hasValue = (value: string | undefined | null): value is string =>
  typeof value === "string" && value.length > 0;

export const missingCoreKeys = (context: SyncedContext): CoreContextKey[] =>
  CORE_CONTEXT_KEYS.filter((key) => !hasValue(context[key]));

export const cloneSyncedContext = (context: SyncedContext): SyncedContext => ({
  ...context,
  synced_at: new Date(context.synced_at.getTime()),
});

export const serializeSearchFilter = (filter: SearchFilter): Record<string, string> => {
  const wire: Record<string, string> = {};
  if (hasValue(filter.search_type)) wire.type = filter.search_type;
  if (hasValue(filter.content_type)) wire.content_type = filter.content_type;
  if (hasValue(filter.thread_id)) wire.thread_id = filter.thread_id;
  for (const key of SCOPED_FILTER_KEYS) {
    const value = filter[key];
    if (hasValue(value)) wire[key] = value;
  }
  return wire;
};
