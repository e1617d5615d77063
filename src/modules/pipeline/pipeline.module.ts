import { Module } from '@nestjs/common';
import { EvaluationModule } from '../evaluation/evaluation.module';
import { LlmModule } from '../llm/llm.module';
import { RetrievalModule } from '../retrieval/retrieval.module';
import { RagPipelineService } from './rag-pipeline.service';

@Module({
    imports: [RetrievalModule, LlmModule, EvaluationModule],
    providers: [RagPipelineService],
    exports: [RagPipelineService],
})
export class PipelineModule { }
