import {
  AUTO_CONTENT_TYPE,
  SCOPED_FILTER_KEYS,
  hasValue,
  type SearchFilter,
  type SyncedContext,
} from "@ctxsync/shared";

/**
 * Scopes a caller filter to the synced task. Caller values win; ambient ids
 * fill the gaps, and empty strings on either side count as unset.
 */
export const mergeContextFilter = (
  caller?: SearchFilter,
  ambient?: Readonly<SyncedContext>,
): SearchFilter => {
  if (!ambient) return caller ? { ...caller } : {};

  const merged: SearchFilter = { ...caller };
  let inferred = false;
  for (const key of SCOPED_FILTER_KEYS) {
    const explicit = caller?.[key];
    if (hasValue(explicit)) continue;
    const fallback = ambient[key];
    if (hasValue(fallback)) {
      merged[key] = fallback;
      inferred = true;
    } else {
      delete merged[key];
    }
  }
  if (inferred && !hasValue(merged.content_type)) {
    merged.content_type = AUTO_CONTENT_TYPE;
  }
  return merged;
};
