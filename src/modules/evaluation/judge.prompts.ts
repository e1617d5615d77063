import { EvaluationMetric } from '../../config/evaluation.config';
import { CONTEXT_SEPARATOR } from '../llm/prompts';
import { EvaluationRecord } from './evaluation.types';

export const JUDGE_SYSTEM_PROMPT = `You are a strict evaluator of retrieval-augmented answers.
Score the requested property on a scale from 0 to 1, where 1 is best.
Respond with a JSON object: {"score": <number between 0 and 1>, "reason": "<one sentence>"}.`;

const METRIC_INSTRUCTIONS: Record<EvaluationMetric, string> = {
    faithfulness:
        'Faithfulness: the fraction of claims in the answer that can be inferred from the contexts. Claims not supported by the contexts lower the score.',
    answer_relevancy:
        'Answer relevancy: how directly and completely the answer addresses the question. Off-topic, evasive or redundant content lowers the score.',
    context_precision:
        'Context precision: the fraction of the contexts that are useful for arriving at the ground truth, weighted towards the contexts listed first.',
    context_recall:
        'Context recall: the fraction of statements in the ground truth that can be attributed to the contexts.',
};

export function buildJudgePrompt(metric: EvaluationMetric, record: EvaluationRecord): string {
    return `${METRIC_INSTRUCTIONS[metric]}

Question: ${record.question}

Contexts:
${record.contexts.join(CONTEXT_SEPARATOR)}

Answer: ${record.answer}

Ground truth: ${record.groundTruth}`;
}
