import { registerAs } from '@nestjs/config';
import { z } from 'zod';

export const EVALUATION_METRICS = [
  'faithfulness',
  'answer_relevancy',
  'context_precision',
  'context_recall',
] as const;

export type EvaluationMetric = (typeof EVALUATION_METRICS)[number];

export const evaluationEnvSchema = z.object({
  EVALUATION_MODEL: z.string().default('gpt-4o-mini'),
  EVALUATION_METRICS: z
    .string()
    .default(EVALUATION_METRICS.join(','))
    .transform((value) => value.split(',').map((metric) => metric.trim()).filter(Boolean))
    .pipe(z.array(z.enum(EVALUATION_METRICS)).nonempty()),
});

export default registerAs('evaluation', () => {
  const env = evaluationEnvSchema.parse(process.env);
  return {
    model: env.EVALUATION_MODEL,
    metrics: env.EVALUATION_METRICS,
  };
});
