/**
 * Runtime configuration loader.
 *
 * Reads the process environment (after dotenv has populated it), validates
 * it and wires the stores and service clients used by the CLI commands.
 * The local sqlite-vec index is the default vector store; when QDRANT_URL is
 * present a Qdrant collection is used instead.
 */

import * as path from "path";
import { EnvConfigSchema, formatIssues } from "../validation/config-schemas.js";
import { ConfigurationError } from "../types/index.js";
import { logRetries, type RetryOptions } from "../util/retry.js";
import { createOpenAIEmbeddingService, type EmbeddingService } from "../search/EmbeddingService.js";
import { createVectorIndex } from "../search/VectorIndex.js";
import { QdrantVectorStore } from "../search/QdrantVectorStore.js";
import type { VectorStore } from "../search/VectorStore.js";
import { OpenAIChatModel, type ChatModel } from "../chat/ChatModel.js";
import { ManifestStore } from "../ingest/ManifestStore.js";
import { SessionStore } from "../session/SessionStore.js";
import { QueryLog } from "../session/QueryLog.js";

export interface RuntimeConfig {
  openai: {
    apiKey: string | undefined;
    baseUrl?: string;
    embeddingModel: string;
    embeddingDimensions: number;
    chatModel: string;
    temperature: number;
  };
  qdrant?: {
    url: string;
    collectionName: string;
    apiKey?: string;
  };
  ingest: {
    chunkSize: number;
    chunkOverlap: number;
    batchSize: number;
    maxFileBytes: number;
  };
  chat: {
    topK: number;
    historyTurns: number;
  };
  retry: RetryOptions;
  repochat: {
    dataDir: string;
    verbose: boolean;
  };
}

export interface LoadConfigOptions {
  /** Fail when OPENAI_API_KEY is absent (ingest and chat) */
  requireApiKey?: boolean;
}

/**
 * File layout under the data directory
 */
export interface DataPaths {
  hashFile: string;
  sessionsDir: string;
  queryLogFile: string;
  vectorDbFile: string;
  lockFile: string;
}

function parseVerbose(raw: string | undefined): boolean {
  const v = (raw ?? "").trim().toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "on";
}

export function loadRuntimeConfig(
  env: NodeJS.ProcessEnv = process.env,
  options: LoadConfigOptions = {}
): RuntimeConfig {
  const parsed = EnvConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid configuration:\n  ${issues.join("\n  ")}`, {
      issues,
    });
  }
  const cfg = parsed.data;

  if (options.requireApiKey && !cfg.OPENAI_API_KEY) {
    throw new ConfigurationError(
      "OPENAI_API_KEY not found in environment variables. Create a .env file (see .env.example) or export it."
    );
  }

  let qdrant: RuntimeConfig["qdrant"];
  if (cfg.QDRANT_URL) {
    qdrant = {
      url: cfg.QDRANT_URL,
      collectionName: cfg.QDRANT_COLLECTION_NAME,
      ...(cfg.QDRANT_API_KEY && { apiKey: cfg.QDRANT_API_KEY }),
    };
  }

  return {
    openai: {
      apiKey: cfg.OPENAI_API_KEY,
      ...(cfg.OPENAI_BASE_URL && { baseUrl: cfg.OPENAI_BASE_URL }),
      embeddingModel: cfg.EMBEDDING_MODEL,
      embeddingDimensions: cfg.EMBEDDING_DIMENSIONS,
      chatModel: cfg.CHAT_MODEL,
      temperature: cfg.CHAT_TEMPERATURE,
    },
    ...(qdrant && { qdrant }),
    ingest: {
      chunkSize: cfg.CHUNK_SIZE,
      chunkOverlap: cfg.CHUNK_OVERLAP,
      batchSize: cfg.EMBED_BATCH_SIZE,
      maxFileBytes: cfg.MAX_FILE_BYTES,
    },
    chat: {
      topK: cfg.TOP_K,
      historyTurns: cfg.HISTORY_TURNS,
    },
    retry: {
      maxAttempts: cfg.RETRY_MAX_ATTEMPTS,
      initialDelayMs: cfg.RETRY_INITIAL_DELAY_MS,
    },
    repochat: {
      dataDir: path.resolve(cfg.REPOCHAT_DATA_DIR),
      verbose: parseVerbose(cfg.REPOCHAT_VERBOSE),
    },
  };
}

export function resolveDataPaths(config: RuntimeConfig): DataPaths {
  const dir = config.repochat.dataDir;
  return {
    hashFile: path.join(dir, "file-hashes.json"),
    sessionsDir: path.join(dir, "sessions"),
    queryLogFile: path.join(dir, "queries.json"),
    vectorDbFile: path.join(dir, "vectors.db"),
    lockFile: path.join(dir, "ingest.lock"),
  };
}

/**
 * Services that need no network access: local history and hash state
 */
export interface LocalServices {
  paths: DataPaths;
  manifestStore: ManifestStore;
  sessionStore: SessionStore;
  queryLog: QueryLog;
}

export interface RuntimeServices extends LocalServices {
  embeddingService: EmbeddingService;
  vectorStore: VectorStore;
  chatModel: ChatModel;
}

export function createLocalServices(config: RuntimeConfig): LocalServices {
  const paths = resolveDataPaths(config);
  return {
    paths,
    manifestStore: new ManifestStore(paths.hashFile),
    sessionStore: new SessionStore(paths.sessionsDir),
    queryLog: new QueryLog(paths.queryLogFile),
  };
}

/**
 * Open the vector store selected by the configuration
 */
export async function openVectorStore(config: RuntimeConfig): Promise<VectorStore> {
  if (config.qdrant) {
    const store = new QdrantVectorStore({
      url: config.qdrant.url,
      collectionName: config.qdrant.collectionName,
      vectorDimensions: config.openai.embeddingDimensions,
      ...(config.qdrant.apiKey && { apiKey: config.qdrant.apiKey }),
    });
    await store.connect();
    console.log(`[Runtime] Qdrant connected (${config.qdrant.collectionName})`);
    return store;
  }

  const paths = resolveDataPaths(config);
  const index = createVectorIndex({
    dbPath: paths.vectorDbFile,
    vectorDimensions: config.openai.embeddingDimensions,
  });
  if (config.repochat.verbose) {
    console.log(`[Runtime] Local vector index at ${paths.vectorDbFile}`);
  }
  return index;
}

export async function createRuntimeServices(config: RuntimeConfig): Promise<RuntimeServices> {
  const apiKey = config.openai.apiKey;
  if (!apiKey) {
    throw new ConfigurationError("OPENAI_API_KEY is required for this command");
  }

  const local = createLocalServices(config);

  const embeddingService = createOpenAIEmbeddingService(apiKey, {
    model: config.openai.embeddingModel,
    dimensions: config.openai.embeddingDimensions,
    batchSize: config.ingest.batchSize,
    retry: { ...config.retry, onRetry: logRetries("Embedding") },
    ...(config.openai.baseUrl && { baseUrl: config.openai.baseUrl }),
  });

  const chatModel = new OpenAIChatModel(apiKey, {
    model: config.openai.chatModel,
    temperature: config.openai.temperature,
    retry: { ...config.retry, onRetry: logRetries("Chat") },
    ...(config.openai.baseUrl && { baseUrl: config.openai.baseUrl }),
  });

  const vectorStore = await openVectorStore(config);

  return { ...local, embeddingService, vectorStore, chatModel };
}
