import { registerAs } from '@nestjs/config';
import { z } from 'zod';

/**
 * Milvus / Zilliz Cloud connection and collection settings.
 *
 * Zilliz Cloud takes its cluster URI as `MILVUS_ENDPOINT` and an API key as
 * `MILVUS_TOKEN`; a self-hosted Milvus takes `user:password` as the token.
 */
export const milvusEnvSchema = z.object({
  MILVUS_ENDPOINT: z.string().url().default('http://localhost:19530'),
  MILVUS_TOKEN: z.string().default(''),
  MILVUS_DB_NAME: z.string().min(1).default('default'),
  MILVUS_TIMEOUT: z.coerce.number().int().positive().default(60000),
  MILVUS_METRIC_TYPE: z.enum(['COSINE', 'IP', 'L2']).default('COSINE'),
  MILVUS_INSERT_BATCH_SIZE: z.coerce.number().int().positive().default(100),
});

export type MilvusMetric = z.infer<typeof milvusEnvSchema>['MILVUS_METRIC_TYPE'];

export default registerAs('milvus', () => {
  const env = milvusEnvSchema.parse(process.env);
  return {
    address: env.MILVUS_ENDPOINT,
    token: env.MILVUS_TOKEN,
    database: env.MILVUS_DB_NAME,
    timeout: env.MILVUS_TIMEOUT,
    metricType: env.MILVUS_METRIC_TYPE,
    insertBatchSize: env.MILVUS_INSERT_BATCH_SIZE,
  };
});
