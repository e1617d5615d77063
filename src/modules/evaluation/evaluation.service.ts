import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import evaluationConfig, { EvaluationMetric } from '../../config/evaluation.config';
import { EvaluationInputError } from '../../common/errors';
import { EvaluationDataset, EvaluationRecord, EvaluationReport, MetricScores } from './evaluation.types';
import { JudgeService } from './judge.service';

/**
 * Checks that the parallel arrays line up and turns them into records
 */
export function validateDataset(dataset: EvaluationDataset): EvaluationRecord[] {
    const lengths = {
        questions: dataset.questions.length,
        contexts: dataset.contexts.length,
        answers: dataset.answers.length,
        groundTruths: dataset.groundTruths.length,
    };

    if (lengths.questions === 0) {
        throw new EvaluationInputError('Evaluation dataset is empty');
    }
    if (Object.values(lengths).some((length) => length !== lengths.questions)) {
        throw new EvaluationInputError(
            `Evaluation arrays differ in length: ${Object.entries(lengths)
                .map(([name, length]) => `${name}=${length}`)
                .join(', ')}`,
        );
    }

    return dataset.questions.map((question, index) => ({
        question,
        contexts: dataset.contexts[index],
        answer: dataset.answers[index],
        groundTruth: dataset.groundTruths[index],
    }));
}

@Injectable()
export class EvaluationService {
    private readonly logger = new Logger(EvaluationService.name);

    constructor(
        private readonly judgeService: JudgeService,
        @Inject(evaluationConfig.KEY) private readonly config: ConfigType<typeof evaluationConfig>,
    ) { }

    async evaluate(dataset: EvaluationDataset, metrics: EvaluationMetric[] = this.config.metrics): Promise<EvaluationReport> {
        const startTime = Date.now();
        const records = validateDataset(dataset);
        const selected = [...new Set(metrics)];
        if (selected.length === 0) {
            throw new EvaluationInputError('At least one metric is required');
        }

        this.logger.log(`📏 Evaluating ${records.length} records on ${selected.join(', ')}`);

        const scored: EvaluationReport['records'] = [];
        for (const record of records) {
            const scores: MetricScores = {};
            for (const metric of selected) {
                scores[metric] = await this.judgeService.score(metric, record);
            }
            scored.push({ ...record, scores });
        }

        const means: MetricScores = {};
        for (const metric of selected) {
            const total = scored.reduce((sum, record) => sum + (record.scores[metric] ?? 0), 0);
            means[metric] = total / scored.length;
        }

        this.logger.log(`✅ Evaluation finished in ${Date.now() - startTime}ms: ${JSON.stringify(means)}`);
        return { scores: means, records: scored };
    }
}
