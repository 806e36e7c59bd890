export * from "./config/Config.js";
export * from "./config/ConfigLoader.js";
export * from "./sync/SyncedContextStore.js";
export * from "./sync/ContextFilterMerger.js";
export * from "./sync/HandoffUrlBuilder.js";
export * from "./sync/CallbackListener.js";
export * from "./sync/SyncEventLogger.js";
export * from "./sync/SyncOrchestrator.js";
export * from "./sync/ContextSnapshotFile.js";
export * from "./sync/TaskSyncPanel.js";
export * from "./tools/ToolTypes.js";
export * from "./tools/ToolRegistry.js";
export * from "./tools/search/FileSearchTool.js";
export * from "./embeddings/EmbeddingService.js";
