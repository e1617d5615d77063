import { Module } from '@nestjs/common';
import { LlmModule } from '../llm/llm.module';
import { EvaluationService } from './evaluation.service';
import { JudgeService } from './judge.service';

/**
 * Evaluation Module - LLM-judged answer quality metrics
 */
@Module({
    imports: [LlmModule],
    providers: [JudgeService, EvaluationService],
    exports: [EvaluationService],
})
export class EvaluationModule { }
