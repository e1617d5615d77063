import { EvaluationMetric } from '../../config/evaluation.config';

/**
 * Parallel arrays, one entry per evaluated question
 */
export interface EvaluationDataset {
    questions: string[];
    contexts: string[][];
    answers: string[];
    groundTruths: string[];
}

export interface EvaluationRecord {
    question: string;
    contexts: string[];
    answer: string;
    groundTruth: string;
}

export type MetricScores = Partial<Record<EvaluationMetric, number>>;

export interface EvaluationReport {
    /** Mean of each metric across records, in [0, 1]. */
    scores: MetricScores;
    records: Array<EvaluationRecord & { scores: MetricScores }>;
}
