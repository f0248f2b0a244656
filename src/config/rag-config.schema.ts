import { z } from 'zod';
import { EMBEDDING_PROVIDERS } from '../embedding/types';

export const DEFAULT_SEPARATORS = ['\n\n', '\n', '. ', '! ', '? ', ' ', ''];

const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false'])])
  .transform((value) => value === true || value === 'true');

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

const separatorList = z.union([
  z.array(z.string()),
  z
    .string()
    .transform((raw, ctx): unknown => {
      try {
        return JSON.parse(raw);
      } catch {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: 'must be a JSON array of strings',
        });
        return z.NEVER;
      }
    })
    .pipe(z.array(z.string())),
]);

export const ragEnvSchema = z
  .object({
    CHUNK_SIZE: positiveInt.default(1000),
    CHUNK_OVERLAP: nonNegativeInt.default(200),
    MIN_CHUNK_SIZE: nonNegativeInt.default(100),
    MAX_CHUNK_SIZE: positiveInt.default(2000),
    CHUNK_SEPARATORS: separatorList.default(DEFAULT_SEPARATORS),
    CHUNK_KEEP_SEPARATOR: booleanFlag.default(true),

    QDRANT_URL: z.string().url().default('http://localhost:6333'),
    QDRANT_API_KEY: z.string().optional(),
    COLLECTION_NAME: z.string().min(1).default('rag_tutor_collection'),
    EMBEDDING_DIMENSIONS: positiveInt.optional(),
    SIMILARITY_METRIC: z.enum(['cosine', 'dot', 'euclid']).default('cosine'),
    UPSERT_BATCH_SIZE: positiveInt.default(100),

    EMBEDDING_PROVIDER: z.enum(EMBEDDING_PROVIDERS).default('ollama'),
    EMBEDDING_MODEL_OLLAMA: z.string().min(1).optional(),
    EMBEDDING_MODEL_OPENAI: z.string().min(1).optional(),
    EMBEDDING_MODEL_GOOGLE: z.string().min(1).optional(),
    EMBEDDING_BATCH_SIZE: positiveInt.default(32),

    RETRIEVAL_TOP_K: positiveInt.default(5),
    RERANK_ENABLED: booleanFlag.default(true),
    RERANK_CONTENT_PREFIX: positiveInt.default(500),
    QUERY_EXPANSION_ENABLED: booleanFlag.default(true),
    MAX_SEARCH_QUERIES: positiveInt.default(5),
    ANSWER_CONTEXT_DOCS: positiveInt.default(5),
    ANSWER_CONTEXT_CHARS: positiveInt.default(800),

    EMBEDDING_TIMEOUT_MS: positiveInt.default(30000),
    STORE_TIMEOUT_MS: positiveInt.default(10000),
    RERANK_TIMEOUT_MS: positiveInt.default(20000),
    LLM_TIMEOUT_MS: positiveInt.default(30000),
  })
  .superRefine((env, ctx) => {
    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CHUNK_OVERLAP'],
        message: 'must be smaller than CHUNK_SIZE',
      });
    }
    if (env.MIN_CHUNK_SIZE > env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MIN_CHUNK_SIZE'],
        message: 'must not exceed CHUNK_SIZE',
      });
    }
    if (env.CHUNK_SIZE > env.MAX_CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MAX_CHUNK_SIZE'],
        message: 'must be at least CHUNK_SIZE',
      });
    }
  });

export type RagEnv = z.infer<typeof ragEnvSchema>;

export const RAG_ENV_KEYS = Object.keys(ragEnvSchema.innerType().shape);
