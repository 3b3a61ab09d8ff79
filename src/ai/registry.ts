import { Embedder, GenkitEmbeddingBackend } from '@/ai/embedder';
import { getAi } from '@/ai/genkit';
import { createGenkitEntityTagger } from '@/ai/flows/tag-skill-entities';
import { createGenkitSummaryGenerator, type SummaryGenerator } from '@/ai/flows/generate-fit-summary';
import type { AppConfig } from '@/lib/config';
import { debug } from '@/lib/logger';
import { SingleSlot } from '@/lib/single-slot';
import type { EntityTagger, TaggedEntity, TextEmbedder } from '@/lib/types';

export type ModelFactories<M> = { [K in keyof M]: () => M[K] | Promise<M[K]> };

export interface ModelHandle<T> {
  readonly model: T;
  release(): void;
}

/**
 * Owns lazily-built, shared model instances. Each model is constructed at most
 * once (concurrent first acquirers share the build) and lives until the
 * registry is dropped; handles only track who is using it.
 */
export class ModelRegistry<M> {
  private readonly built: { [K in keyof M]?: Promise<M[K]> } = {};
  private readonly refs = new Map<keyof M, number>();

  constructor(private readonly factories: ModelFactories<M>) {}

  async acquire<K extends keyof M>(name: K): Promise<ModelHandle<M[K]>> {
    const model = await this.load(name);
    this.refs.set(name, this.refCount(name) + 1);

    let released = false;
    return {
      model,
      release: () => {
        if (released) return;
        released = true;
        this.refs.set(name, this.refCount(name) - 1);
      },
    };
  }

  refCount(name: keyof M): number {
    return this.refs.get(name) ?? 0;
  }

  isLoaded(name: keyof M): boolean {
    return this.built[name] !== undefined;
  }

  private load<K extends keyof M>(name: K): Promise<M[K]> {
    const existing = this.built[name];
    if (existing) return existing;

    debug(`[models] building ${String(name)}`);
    const pending = new Promise<M[K]>((resolve, reject) => {
      try {
        resolve(this.factories[name]());
      } catch (e) {
        reject(e);
      }
    });
    this.built[name] = pending;
    // Forget a failed build so the next acquire can try again.
    void pending.catch(() => {
      if (this.built[name] === pending) delete this.built[name];
    });
    return pending;
  }
}

/** Tagging calls queue on a single slot, shared with the embedder by `createModelRegistry`. */
export class SerializedTagger implements EntityTagger {
  constructor(
    private readonly inner: EntityTagger,
    private readonly slot = new SingleSlot()
  ) {}

  tagEntities(chunk: string): Promise<TaggedEntity[]> {
    return this.slot.run(() => this.inner.tagEntities(chunk));
  }
}

export type RankerModels = {
  embedder: TextEmbedder;
  tagger: EntityTagger;
  summarizer: SummaryGenerator | null;
};

export type RankerRegistry = ModelRegistry<RankerModels>;

export function createModelRegistry(config: AppConfig): RankerRegistry {
  const slot = new SingleSlot();
  return new ModelRegistry<RankerModels>({
    embedder: () =>
      new Embedder(
        new GenkitEmbeddingBackend(getAi(config), config.embedder),
        config.ranking.embeddingBatchSize,
        slot
      ),
    tagger: () => new SerializedTagger(createGenkitEntityTagger(getAi(config)), slot),
    summarizer: () => (config.apiKey ? createGenkitSummaryGenerator(getAi(config)) : null),
  });
}
