import { registerAs } from '@nestjs/config';
import { z } from 'zod';

// Any service exposing a Cohere/Jina style `POST /rerank` endpoint.
export const rerankerEnvSchema = z.object({
  RERANKER_BASE_URL: z.string().url().default('https://api.cohere.com/v2'),
  RERANKER_API_KEY: z.string().min(1),
  RERANKER_MODEL: z.string().default('rerank-english-v3.0'),
  RERANKER_TIMEOUT: z.coerce.number().int().positive().default(30000),
});

export default registerAs('reranker', () => {
  const env = rerankerEnvSchema.parse(process.env);
  return {
    baseUrl: env.RERANKER_BASE_URL.replace(/\/+$/, ''),
    apiKey: env.RERANKER_API_KEY,
    model: env.RERANKER_MODEL,
    timeout: env.RERANKER_TIMEOUT,
  };
});
