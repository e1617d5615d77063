import { appEnvSchema } from './app.config';
import { milvusEnvSchema } from './milvus.config';
import { openaiEnvSchema } from './openai.config';
import { rerankerEnvSchema } from './reranker.config';
import { unstructuredEnvSchema } from './unstructured.config';
import { ragEnvSchema } from './rag.config';
import { evaluationEnvSchema } from './evaluation.config';

const schemas = [
  appEnvSchema,
  milvusEnvSchema,
  openaiEnvSchema,
  rerankerEnvSchema,
  unstructuredEnvSchema,
  ragEnvSchema,
  evaluationEnvSchema,
];

export type EnvValidationResult =
  | { success: true; data: Record<string, unknown> }
  | { success: false; error: string };

/**
 * Validates every capability's variables at once so startup reports all
 * problems together. Returns the raw environment merged with parsed defaults.
 */
export function validateEnv(config: Record<string, unknown>): EnvValidationResult {
  const issues: string[] = [];
  let data: Record<string, unknown> = { ...config };

  for (const schema of schemas) {
    const result = schema.safeParse(config);
    if (result.success) {
      data = { ...data, ...result.data };
    } else {
      issues.push(
        ...result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      );
    }
  }

  if (issues.length > 0) {
    return { success: false, error: issues.join('; ') };
  }
  return { success: true, data };
}
