import type { SyncedContext } from "./SyncedContext.js";

type OptionalField = "big_bet" | "big_bet_description" | "task_id" | "work_item" | "work_item_description";
type RequiredField = "account_id" | "account_name" | "product_id" | "product_name" | "board_id";

const REQUIRED_PARAMS: Record<string, RequiredField> = {
  account_id: "account_id",
  account_name: "account_name",
  product_id: "product_id",
  product_name: "product_name",
  board_id: "board_id",
};

const OPTIONAL_PARAMS: Record<string, OptionalField> = {
  board_name: "big_bet",
  board_description: "big_bet_description",
  task_id: "task_id",
  task_name: "work_item",
  task_description: "work_item_description",
};

/**
 * Builds a context from callback query parameters. Unknown keys are ignored,
 * repeated keys keep the last value, and `synced_at` is always `now`.
 */
export const parseCallbackQuery = (
  query: URLSearchParams | string,
  now: Date = new Date(),
): SyncedContext => {
  const params = typeof query === "string" ? new URLSearchParams(query) : query;
  const context: SyncedContext = {
    account_id: "",
    account_name: "",
    product_id: "",
    product_name: "",
    board_id: "",
    synced_at: now,
  };
  for (const [key, value] of params) {
    const required = REQUIRED_PARAMS[key];
    if (required) {
      context[required] = value;
      continue;
    }
    const optional = OPTIONAL_PARAMS[key];
    if (optional) {
      context[optional] = value;
    }
  }
  return context;
};

export const encodeCallbackQuery = (context: SyncedContext): URLSearchParams => {
  const params = new URLSearchParams();
  for (const [param, field] of Object.entries(REQUIRED_PARAMS)) {
    params.set(param, context[field]);
  }
  for (const [param, field] of Object.entries(OPTIONAL_PARAMS)) {
    const value = context[field];
    if (value !== undefined) params.set(param, value);
  }
  return params;
};
