export * from "./auth/TokenClient.js";
export * from "./search/SearchClient.js";
export * from "./embeddings/EmbeddingClient.js";
export * from "./system/SystemBrowserLauncher.js";
