import { registerAs } from '@nestjs/config';
import { z } from 'zod';

export const ragEnvSchema = z
  .object({
    RAG_CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
    RAG_CHUNK_OVERLAP: z.coerce.number().int().nonnegative().default(200),
    RAG_TOP_K: z.coerce.number().int().positive().default(4),
    RAG_HYBRID_CANDIDATES: z.coerce.number().int().positive().default(4),
    RAG_MAX_CONTEXT_LENGTH: z.coerce.number().int().positive().default(4000),
    RAG_EMBEDDING_BATCH_SIZE: z.coerce.number().int().positive().default(64),
    RAG_INGEST_CONCURRENCY: z.coerce.number().int().positive().default(2),
    RAG_DOWNLOAD_TIMEOUT: z.coerce.number().int().positive().default(30000),
  })
  .refine((env) => env.RAG_CHUNK_OVERLAP < env.RAG_CHUNK_SIZE, {
    message: 'RAG_CHUNK_OVERLAP must be smaller than RAG_CHUNK_SIZE',
    path: ['RAG_CHUNK_OVERLAP'],
  });

export default registerAs('rag', () => {
  const env = ragEnvSchema.parse(process.env);
  return {
    chunkSize: env.RAG_CHUNK_SIZE,
    chunkOverlap: env.RAG_CHUNK_OVERLAP,
    topK: env.RAG_TOP_K,
    hybridCandidates: env.RAG_HYBRID_CANDIDATES,
    maxContextLength: env.RAG_MAX_CONTEXT_LENGTH,
    embeddingBatchSize: env.RAG_EMBEDDING_BATCH_SIZE,
    ingestConcurrency: env.RAG_INGEST_CONCURRENCY,
    downloadTimeout: env.RAG_DOWNLOAD_TIMEOUT,
  };
});
