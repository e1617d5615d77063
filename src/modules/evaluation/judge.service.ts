import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { z } from 'zod';
import evaluationConfig, { EvaluationMetric } from '../../config/evaluation.config';
import { JudgeResponseError } from '../../common/errors';
import { GeneratorService } from '../llm/generator.service';
import { EvaluationRecord } from './evaluation.types';
import { JUDGE_SYSTEM_PROMPT, buildJudgePrompt } from './judge.prompts';

const judgeResponseSchema = z.object({
    score: z.number().min(0).max(1),
    reason: z.string().optional(),
});

/**
 * Judge Service - one LLM call per (metric, record)
 */
@Injectable()
export class JudgeService {
    private readonly logger = new Logger(JudgeService.name);

    constructor(
        private readonly generatorService: GeneratorService,
        @Inject(evaluationConfig.KEY) private readonly config: ConfigType<typeof evaluationConfig>,
    ) { }

    async score(metric: EvaluationMetric, record: EvaluationRecord): Promise<number> {
        const content = await this.generatorService.complete(
            [
                { role: 'system', content: JUDGE_SYSTEM_PROMPT },
                { role: 'user', content: buildJudgePrompt(metric, record) },
            ],
            { model: this.config.model, temperature: 0, json: true },
        );

        let payload: unknown;
        try {
            payload = JSON.parse(content);
        } catch (error) {
            throw new JudgeResponseError(`${metric}: response is not JSON`, error);
        }

        const parsed = judgeResponseSchema.safeParse(payload);
        if (!parsed.success) {
            throw new JudgeResponseError(
                `${metric}: ${parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`,
            );
        }

        this.logger.debug(`⚖️ ${metric} = ${parsed.data.score}${parsed.data.reason ? ` (${parsed.data.reason})` : ''}`);
        return parsed.data.score;
    }
}
