import { registerAs } from '@nestjs/config';
import { z } from 'zod';

export const unstructuredEnvSchema = z.object({
  UNSTRUCTURED_API_URL: z.string().url().default('https://api.unstructuredapp.io/general/v0/general'),
  UNSTRUCTURED_API_KEY: z.string().default(''),
  UNSTRUCTURED_STRATEGY: z.enum(['auto', 'fast', 'hi_res', 'ocr_only']).default('auto'),
  UNSTRUCTURED_CHUNKING_STRATEGY: z.enum(['basic', 'by_title']).default('by_title'),
  UNSTRUCTURED_MAX_CHARACTERS: z.coerce.number().int().positive().default(1000),
  UNSTRUCTURED_OVERLAP: z.coerce.number().int().nonnegative().default(100),
  UNSTRUCTURED_TIMEOUT: z.coerce.number().int().positive().default(120000),
});

export type PartitionStrategy = z.infer<typeof unstructuredEnvSchema>['UNSTRUCTURED_STRATEGY'];
export type ChunkingStrategy = z.infer<typeof unstructuredEnvSchema>['UNSTRUCTURED_CHUNKING_STRATEGY'];

export default registerAs('unstructured', () => {
  const env = unstructuredEnvSchema.parse(process.env);
  return {
    apiUrl: env.UNSTRUCTURED_API_URL,
    apiKey: env.UNSTRUCTURED_API_KEY,
    strategy: env.UNSTRUCTURED_STRATEGY,
    chunkingStrategy: env.UNSTRUCTURED_CHUNKING_STRATEGY,
    maxCharacters: env.UNSTRUCTURED_MAX_CHARACTERS,
    overlap: env.UNSTRUCTURED_OVERLAP,
    timeout: env.UNSTRUCTURED_TIMEOUT,
  };
});
