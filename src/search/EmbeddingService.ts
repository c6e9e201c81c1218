/**
 * Embedding Service for repochat
 *
 * Batches chunk texts, requests embeddings from a pluggable provider and
 * retries transient API failures with backoff. Results come back in input
 * order.
 *
 * @module search/EmbeddingService
 */

import OpenAI from "openai";
import { RepoChatError, toError } from "../types/index.js";
import { withRetry, type RetryOptions } from "../util/retry.js";

// ============================================================================
// Error Classes
// ============================================================================

/**
 * Base error class for embedding service errors
 */
export class EmbeddingServiceError extends RepoChatError {
  constructor(message: string, code: string, cause?: Error, context?: Record<string, unknown>) {
    super(message, code, context, cause);
    this.name = "EmbeddingServiceError";
  }
}

/**
 * Error thrown when the provider returns unusable output
 */
export class EmbeddingGenerationError extends EmbeddingServiceError {
  constructor(message: string, code: string, cause?: Error) {
    super(message, code, cause);
    this.name = "EmbeddingGenerationError";
  }
}

/**
 * Error thrown when provider configuration is invalid
 */
export class EmbeddingConfigurationError extends EmbeddingServiceError {
  constructor(message: string, code: string) {
    super(message, code);
    this.name = "EmbeddingConfigurationError";
  }
}

/**
 * A batch could not be embedded after all retries. Batches before
 * `batchIndex` completed successfully.
 */
export class EmbeddingBatchError extends EmbeddingServiceError {
  constructor(
    public readonly batchIndex: number,
    public readonly totalBatches: number,
    cause: Error
  ) {
    super(
      `Embedding batch ${batchIndex + 1}/${totalBatches} failed: ${cause.message}`,
      "BATCH_FAILED",
      cause,
      { batchIndex, totalBatches }
    );
    this.name = "EmbeddingBatchError";
  }
}

// ============================================================================
// Provider Interface
// ============================================================================

/**
 * Interface for embedding providers
 */
export interface EmbeddingProvider {
  /**
   * Embed a batch of texts; must return one vector per input, in order
   */
  embed(texts: string[]): Promise<Float32Array[]>;
  readonly dimensions: number;
  readonly name: string;
}

// ============================================================================
// Configuration Types
// ============================================================================

export type EmbeddingProviderType = "openai" | "custom";

export interface EmbeddingServiceConfig {
  provider: EmbeddingProviderType;
  /** Required for OpenAI */
  apiKey?: string;
  model?: string;
  dimensions?: number;
  /** Texts per provider call (default: 96) */
  batchSize?: number;
  retry?: RetryOptions;
  /** Custom provider instance (when provider is 'custom') */
  customProvider?: EmbeddingProvider;
  /** OpenAI base URL override (for proxies/alternative endpoints) */
  baseUrl?: string;
}

const DEFAULT_CONFIG = {
  model: "text-embedding-3-small",
  dimensions: 768,
  batchSize: 96,
};

/**
 * Progress callback invoked after each successful batch
 */
export type BatchProgress = (batchIndex: number, totalBatches: number, embedded: number) => void;

// ============================================================================
// OpenAI Embedding Provider
// ============================================================================

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private readonly client: OpenAI;
  private readonly model: string;
  public readonly dimensions: number;
  public readonly name = "openai";

  constructor(apiKey: string, options?: { model?: string; dimensions?: number; baseUrl?: string }) {
    if (!apiKey) {
      throw new EmbeddingConfigurationError("OpenAI API key is required", "MISSING_API_KEY");
    }

    this.client = new OpenAI({
      apiKey,
      baseURL: options?.baseUrl,
      // Retries are handled by EmbeddingService
      maxRetries: 0,
    });
    this.model = options?.model ?? DEFAULT_CONFIG.model;
    this.dimensions = options?.dimensions ?? DEFAULT_CONFIG.dimensions;
  }

  async embed(texts: string[]): Promise<Float32Array[]> {
    const response = await this.client.embeddings.create({
      model: this.model,
      input: texts,
      dimensions: this.dimensions,
    });

    const ordered = [...response.data].sort((a, b) => a.index - b.index);
    return ordered.map((item) => new Float32Array(item.embedding));
  }
}

// ============================================================================
// Embedding Service Implementation
// ============================================================================

/**
 * @example
 * ```typescript
 * const service = createOpenAIEmbeddingService(apiKey, { batchSize: 64 });
 * const vectors = await service.embedDocuments(chunks.map((c) => c.text));
 * ```
 */
export class EmbeddingService {
  private readonly provider: EmbeddingProvider;
  private readonly batchSize: number;
  private readonly retry: RetryOptions;
  private calls = 0;

  constructor(config: EmbeddingServiceConfig) {
    if (config.provider === "custom") {
      if (!config.customProvider) {
        throw new EmbeddingConfigurationError(
          "Custom provider instance is required when provider type is 'custom'",
          "MISSING_CUSTOM_PROVIDER"
        );
      }
      this.provider = config.customProvider;
    } else if (config.provider === "openai") {
      if (!config.apiKey) {
        throw new EmbeddingConfigurationError(
          "API key is required for OpenAI provider",
          "MISSING_API_KEY"
        );
      }
      const openaiOptions: { model?: string; dimensions?: number; baseUrl?: string } = {};
      if (config.model !== undefined) openaiOptions.model = config.model;
      if (config.dimensions !== undefined) openaiOptions.dimensions = config.dimensions;
      if (config.baseUrl !== undefined) openaiOptions.baseUrl = config.baseUrl;

      this.provider = new OpenAIEmbeddingProvider(config.apiKey, openaiOptions);
    } else {
      throw new EmbeddingConfigurationError(
        `Unknown provider type: ${String(config.provider)}`,
        "UNKNOWN_PROVIDER"
      );
    }

    const batchSize = config.batchSize ?? DEFAULT_CONFIG.batchSize;
    if (!Number.isInteger(batchSize) || batchSize <= 0) {
      throw new EmbeddingConfigurationError(
        `Batch size must be a positive integer, got ${batchSize}`,
        "INVALID_BATCH_SIZE"
      );
    }
    this.batchSize = batchSize;
    this.retry = config.retry ?? {};
  }

  /**
   * Embed chunk texts in sequential batches. Throws EmbeddingBatchError on
   * the first batch that cannot be embedded; `onBatch` has been called for
   * every batch before it.
   */
  async embedDocuments(texts: string[], onBatch?: BatchProgress): Promise<Float32Array[]> {
    const results: Float32Array[] = [];
    const totalBatches = Math.ceil(texts.length / this.batchSize);

    for (let batchIndex = 0; batchIndex < totalBatches; batchIndex++) {
      const start = batchIndex * this.batchSize;
      const batch = texts.slice(start, start + this.batchSize);
      try {
        const vectors = await this.callProvider(batch);
        results.push(...vectors);
      } catch (error) {
        throw new EmbeddingBatchError(batchIndex, totalBatches, toError(error));
      }
      onBatch?.(batchIndex, totalBatches, results.length);
    }

    return results;
  }

  /**
   * Embed a single retrieval query
   */
  async embedQuery(text: string): Promise<Float32Array> {
    if (!text.trim()) {
      throw new EmbeddingGenerationError("Cannot embed empty text", "EMPTY_TEXT");
    }
    try {
      const [vector] = await this.callProvider([text]);
      if (!vector) {
        throw new EmbeddingGenerationError("No embedding returned", "NO_EMBEDDING");
      }
      return vector;
    } catch (error) {
      if (error instanceof EmbeddingServiceError) {
        throw error;
      }
      const cause = toError(error);
      throw new EmbeddingGenerationError(
        `Failed to embed query: ${cause.message}`,
        "GENERATION_FAILED",
        cause
      );
    }
  }

  private async callProvider(texts: string[]): Promise<Float32Array[]> {
    const vectors = await withRetry(() => {
      this.calls++;
      return this.provider.embed(texts);
    }, this.retry);

    if (vectors.length !== texts.length) {
      throw new EmbeddingGenerationError(
        `Provider returned ${vectors.length} embeddings for ${texts.length} texts`,
        "COUNT_MISMATCH"
      );
    }
    return vectors;
  }

  get dimensions(): number {
    return this.provider.dimensions;
  }

  get providerName(): string {
    return this.provider.name;
  }

  /**
   * Number of provider requests made so far, retries included
   */
  get callCount(): number {
    return this.calls;
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createEmbeddingService(config: EmbeddingServiceConfig): EmbeddingService {
  return new EmbeddingService(config);
}

export function createOpenAIEmbeddingService(
  apiKey: string,
  options?: {
    model?: string;
    dimensions?: number;
    baseUrl?: string;
    batchSize?: number;
    retry?: RetryOptions;
  }
): EmbeddingService {
  return new EmbeddingService({ provider: "openai", apiKey, ...options });
}
