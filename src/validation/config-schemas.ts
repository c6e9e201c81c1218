/**
 * Zod validation schemas for runtime configuration
 */

import { z } from "zod";

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().optional().default(fallback);

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

/**
 * Environment variables read by repochat. Every key is optional at this
 * level; whether the API key is required depends on the command.
 */
export const EnvConfigSchema = z
  .object({
    OPENAI_API_KEY: optionalString,
    OPENAI_BASE_URL: optionalString.pipe(z.string().url().optional()),
    EMBEDDING_MODEL: z.string().trim().min(1).optional().default("text-embedding-3-small"),
    EMBEDDING_DIMENSIONS: positiveInt(768),
    CHAT_MODEL: z.string().trim().min(1).optional().default("gpt-4o-mini"),
    CHAT_TEMPERATURE: z.coerce.number().min(0).max(2).optional().default(0.3),
    TOP_K: positiveInt(5).pipe(z.number().max(100)),
    CHUNK_SIZE: positiveInt(500),
    CHUNK_OVERLAP: z.coerce.number().int().min(0).optional().default(50),
    EMBED_BATCH_SIZE: positiveInt(96).pipe(z.number().max(2048)),
    HISTORY_TURNS: z.coerce.number().int().min(0).optional().default(5),
    MAX_FILE_BYTES: positiveInt(10 * 1024 * 1024),
    RETRY_MAX_ATTEMPTS: positiveInt(4).pipe(z.number().max(10)),
    RETRY_INITIAL_DELAY_MS: z.coerce.number().int().min(0).optional().default(1000),
    REPOCHAT_DATA_DIR: z.string().trim().min(1).optional().default("./.repochat"),
    REPOCHAT_VERBOSE: optionalString,
    QDRANT_URL: optionalString.pipe(z.string().url().optional()),
    QDRANT_API_KEY: optionalString,
    QDRANT_COLLECTION_NAME: z.string().trim().min(1).optional().default("codebase_chunks"),
  })
  .refine((cfg) => cfg.CHUNK_OVERLAP < cfg.CHUNK_SIZE, {
    message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
    path: ["CHUNK_OVERLAP"],
  });

export type EnvConfig = z.infer<typeof EnvConfigSchema>;

/**
 * Schema for the persisted path → digest map
 */
export const FileHashRecordSchema = z.object({
  version: z.literal(1),
  updatedAt: z.string(),
  files: z.record(z.string(), z.string().regex(/^[0-9a-f]{64}$/)),
});

export type FileHashDocument = z.infer<typeof FileHashRecordSchema>;

const MessageSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  timestamp: z.string(),
  sources: z.array(z.string()).optional(),
});

export const SessionSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  createdAt: z.string(),
  status: z.enum(["active", "ended"]),
  endedAt: z.string().optional(),
  messages: z.array(MessageSchema),
});

export const SessionIndexSchema = z.object({
  sessions: z.array(
    z.object({
      id: z.string().min(1),
      name: z.string(),
      createdAt: z.string(),
    })
  ),
});

export const QueryLogSchema = z.object({
  queries: z.array(
    z.object({
      query: z.string(),
      responsePreview: z.string(),
      sources: z.array(z.string()),
      timestamp: z.string(),
    })
  ),
});

/**
 * Flatten zod issues into "KEY: message" lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const key = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${key}: ${issue.message}`;
  });
}
