import { errorMessage, Logger } from "./logger";

const MAX_INPUT_CHARS = 8000;

export interface EmbeddingModel {
  readonly name: string;
  readonly dimension: number;
  embed(texts: string[]): Promise<number[][]>;
}

export interface EmbeddingTier {
  name: string;
  create(): Promise<EmbeddingModel>;
}

export interface TierFailure {
  tier: string;
  error: string;
}

/** Which tier engaged, and why the ones before it did not. */
export interface EmbeddingSelection {
  model: EmbeddingModel;
  tier: string;
  index: number;
  failures: TierFailure[];
}

export class EmbeddingUnavailableError extends Error {
  constructor(readonly failures: TierFailure[]) {
    super(`No embedding tier could be initialized: ${failures.map((failure) => `${failure.tier} (${failure.error})`).join(", ")}`);
    this.name = "EmbeddingUnavailableError";
  }
}

/** Structural subset of the OpenAI client used for embeddings. */
export interface EmbeddingsClient {
  embeddings: {
    create(body: { model: string; input: string[]; dimensions?: number }): Promise<{
      data: Array<{ embedding: number[]; index: number }>;
    }>;
  };
}

export class OpenAIEmbeddingModel implements EmbeddingModel {
  constructor(
    private readonly client: EmbeddingsClient,
    readonly name: string,
    readonly dimension: number,
    private readonly batchSize: number
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const safeBatchSize = Math.max(1, this.batchSize);
    const vectors: number[][] = [];

    for (let index = 0; index < texts.length; index += safeBatchSize) {
      const batch = texts.slice(index, index + safeBatchSize).map((text) => text.slice(0, MAX_INPUT_CHARS) || " ");
      const response = await this.client.embeddings.create({
        model: this.name,
        input: batch,
        dimensions: this.dimension
      });
      const ordered = [...response.data].sort((left, right) => left.index - right.index);
      if (ordered.length !== batch.length) {
        throw new Error(`Embedding response has ${ordered.length} vectors for ${batch.length} inputs`);
      }
      for (const item of ordered) {
        if (item.embedding.length !== this.dimension) {
          throw new Error(`Model ${this.name} returned dimension ${item.embedding.length}, expected ${this.dimension}`);
        }
        vectors.push(item.embedding);
      }
    }

    return vectors;
  }
}

function fnv1a(text: string, seed: number): number {
  let hash = (0x811c9dc5 ^ seed) >>> 0;
  for (let index = 0; index < text.length; index += 1) {
    hash ^= text.charCodeAt(index);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

// mulberry32
function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let value = state;
    value = Math.imul(value ^ (value >>> 15), value | 1);
    value ^= value + Math.imul(value ^ (value >>> 7), value | 61);
    return ((value ^ (value >>> 14)) >>> 0) / 4294967296;
  };
}

export function tokenizeWords(text: string): string[] {
  return text.toLowerCase().normalize("NFC").match(/[\p{L}\p{N}]+/gu) ?? [];
}

/**
 * Offline tier: every word maps to a fixed pseudo-random vector, and a text is the
 * L2-normalised mean of its word vectors. Texts sharing words land close together.
 */
export class HashedWordEmbeddingModel implements EmbeddingModel {
  readonly name = "local-hashed-word-mean";
  private readonly cache = new Map<string, Float64Array>();

  constructor(readonly dimension: number) {}

  private wordVector(word: string): Float64Array {
    const cached = this.cache.get(word);
    if (cached) {
      return cached;
    }
    const next = seededRandom(fnv1a(word, this.dimension));
    const vector = new Float64Array(this.dimension);
    for (let index = 0; index < this.dimension; index += 1) {
      vector[index] = next() * 2 - 1;
    }
    if (this.cache.size > 50000) {
      this.cache.clear();
    }
    this.cache.set(word, vector);
    return vector;
  }

  embedOne(text: string): number[] {
    const words = tokenizeWords(text.slice(0, MAX_INPUT_CHARS));
    const pooled = new Array<number>(this.dimension).fill(0);
    if (words.length === 0) {
      return pooled;
    }
    for (const word of words) {
      const vector = this.wordVector(word);
      for (let index = 0; index < this.dimension; index += 1) {
        pooled[index] = (pooled[index] ?? 0) + (vector[index] ?? 0) / words.length;
      }
    }
    const norm = Math.sqrt(pooled.reduce((sum, value) => sum + value * value, 0));
    return norm === 0 ? pooled : pooled.map((value) => value / norm);
  }

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embedOne(text));
  }
}

/**
 * Tries each tier in order and keeps the first that constructs and answers a probe.
 * The chosen tier is used for the life of the process.
 */
export async function selectEmbeddingModel(tiers: EmbeddingTier[], logger: Logger): Promise<EmbeddingSelection> {
  const failures: TierFailure[] = [];

  for (const [index, tier] of tiers.entries()) {
    try {
      const model = await tier.create();
      const [probe] = await model.embed(["điện thoại"]);
      if (!probe || probe.length !== model.dimension) {
        throw new Error(`probe returned dimension ${probe?.length ?? 0}, expected ${model.dimension}`);
      }
      if (failures.length > 0) {
        logger.warn("embedding_fallback_engaged", { tier: tier.name, index, failures });
      } else {
        logger.info("embedding_ready", { tier: tier.name, model: model.name, dimension: model.dimension });
      }
      return { model, tier: tier.name, index, failures };
    } catch (error) {
      failures.push({ tier: tier.name, error: errorMessage(error) });
      logger.warn("embedding_tier_failed", { tier: tier.name, index, error: errorMessage(error) });
    }
  }

  throw new EmbeddingUnavailableError(failures);
}

export interface EmbeddingTierConfig {
  client: EmbeddingsClient | null;
  primaryModel: string;
  fallbackModels: string[];
  localFallback: boolean;
  dimension: number;
  batchSize: number;
}

export function buildEmbeddingTiers(config: EmbeddingTierConfig): EmbeddingTier[] {
  const remote = (model: string): EmbeddingTier => ({
    name: `openai:${model}`,
    async create() {
      if (!config.client) {
        throw new Error("OPENAI_API_KEY is not set");
      }
      return new OpenAIEmbeddingModel(config.client, model, config.dimension, config.batchSize);
    }
  });

  const tiers = [config.primaryModel, ...config.fallbackModels.filter((model) => model !== config.primaryModel)].map(
    remote
  );
  if (config.localFallback) {
    tiers.push({
      name: "local:hashed-word-mean",
      async create() {
        return new HashedWordEmbeddingModel(config.dimension);
      }
    });
  }
  return tiers;
}

export class Embedder {
  constructor(private readonly selection: EmbeddingSelection) {}

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.selection.model.embed([text]);
    if (!vector) {
      throw new Error("Embedding model returned no vector");
    }
    return vector;
  }

  embedMany(texts: string[]): Promise<number[][]> {
    return this.selection.model.embed(texts);
  }
}
