import { joinUrlPath } from "@ctxsync/shared";
import type { TokenSource } from "../auth/TokenClient.js";

export interface EmbeddingClientOptions {
  apiBaseUrl: string;
  model: string;
  timeoutMs?: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readEntries = (payload: unknown): unknown[] => {
  if (!isRecord(payload) || payload.data === undefined) return [];
  if (!Array.isArray(payload.data)) {
    throw new Error("Failed to parse embedding response: data is not an array");
  }
  return payload.data;
};

export const EMBEDDINGS_PATH = "/embeddings";
export const EMBEDDING_BATCH_SIZE = 100;

const isVector = (value: unknown): value is number[] =>
  Array.isArray(value) && value.every((entry) => typeof entry === "number");

export class EmbeddingClient {
  readonly batchSize = EMBEDDING_BATCH_SIZE;

  constructor(
    private tokens: TokenSource,
    private options: EmbeddingClientOptions,
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const token = await this.tokens.acquire();
    const url = joinUrlPath(this.options.apiBaseUrl, EMBEDDINGS_PATH);
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs ?? 60_000);
    try {
      const response = await fetch(url, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          authorization: `Bearer ${token}`,
        },
        body: JSON.stringify({ model: this.options.model, input: texts }),
        signal: controller.signal,
      });
      if (!response.ok) {
        const detail = await response.text().catch(() => "");
        throw new Error(`Embedding request failed with status ${response.status}: ${detail}`);
      }
      const entries = readEntries(await response.json());
      if (entries.length !== texts.length) {
        throw new Error(
          `Failed to parse embedding response: expected ${texts.length} vectors, got ${entries.length}`,
        );
      }
      const vectors: number[][] = [];
      for (const entry of entries) {
        const embedding = isRecord(entry) ? entry.embedding : undefined;
        if (!isVector(embedding)) {
          throw new Error("Failed to parse embedding response: embedding is not a number array");
        }
        vectors.push(embedding);
      }
      return vectors;
    } finally {
      clearTimeout(timeout);
    }
  }
}
