export * from "./context/SyncedContext.js";
export * from "./context/CallbackQuery.js";
export * from "./errors/SyncErrors.js";
export * from "./paths/PathHelper.js";
export * from "./paths/UrlPath.js";
