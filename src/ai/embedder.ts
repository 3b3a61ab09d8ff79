import type { Genkit } from 'genkit';
import { DEFAULT_RANKING_CONFIG } from '@/lib/config';
import { EmbeddingFailure, errorMessage } from '@/lib/errors';
import { SingleSlot } from '@/lib/single-slot';
import type { TextEmbedder, Vector } from '@/lib/types';
import { l2Normalize } from '@/lib/vector';

/** Raw model access: one vector per input text, in order. */
export interface EmbeddingBackend {
  embed(texts: string[]): Promise<number[][]>;
}

export class GenkitEmbeddingBackend implements EmbeddingBackend {
  constructor(
    private readonly ai: Genkit,
    private readonly embedder: string
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    const batch = await this.ai.embedMany({ embedder: this.embedder, content: texts });
    return batch.map(e => e.embedding);
  }
}

/**
 * Unit-normalised sentence embeddings. One encode call runs against the
 * backend at a time; concurrent callers wait their turn. Pass a shared
 * `slot` to serialise with other model calls as well.
 */
export class Embedder implements TextEmbedder {
  constructor(
    private readonly backend: EmbeddingBackend,
    private readonly batchSize = DEFAULT_RANKING_CONFIG.embeddingBatchSize,
    private readonly slot = new SingleSlot()
  ) {}

  encode(texts: readonly string[]): Promise<Vector[]> {
    return this.slot.run(() => this.encodeNow([...texts]));
  }

  private async encodeNow(texts: string[]): Promise<Vector[]> {
    const out: Vector[] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      const batch = texts.slice(i, i + this.batchSize);
      let vectors: number[][];
      try {
        vectors = await this.backend.embed(batch);
      } catch (e) {
        throw new EmbeddingFailure(`Embedding request failed: ${errorMessage(e)}`, { cause: e });
      }
      if (vectors.length !== batch.length) {
        throw new EmbeddingFailure(`Embedder returned ${vectors.length} vectors for ${batch.length} texts.`);
      }
      out.push(...vectors.map(l2Normalize));
    }
    return out;
  }
}
