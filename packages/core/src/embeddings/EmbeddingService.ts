import { EMBEDDING_BATCH_SIZE } from "@ctxsync/integrations";
import type { SyncEventSink } from "../sync/SyncEventLogger.js";

export interface EmbeddingProvider {
  readonly batchSize?: number;
  embed(texts: string[]): Promise<number[][]>;
}

export type EmbeddingProgress = (completed: number, total: number) => void;

/** Splits large inputs into provider-sized batches, sent one after another. */
export class EmbeddingService {
  constructor(
    private provider: EmbeddingProvider,
    private events?: SyncEventSink,
  ) {}

  get batchSize(): number {
    return Math.max(1, this.provider.batchSize ?? EMBEDDING_BATCH_SIZE);
  }

  async embedAll(texts: string[], onProgress?: EmbeddingProgress): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let offset = 0; offset < texts.length; offset += this.batchSize) {
      const batch = texts.slice(offset, offset + this.batchSize);
      const embedded = await this.provider.embed(batch);
      if (embedded.length !== batch.length) {
        throw new Error(`Embedding provider returned ${embedded.length} vectors for ${batch.length} inputs`);
      }
      vectors.push(...embedded);
      await this.events?.log("embedding_batch", { offset, size: batch.length });
      onProgress?.(vectors.length, texts.length);
    }
    return vectors;
  }
}
