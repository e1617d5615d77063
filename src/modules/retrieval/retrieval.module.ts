import { Module } from '@nestjs/common';
import { LlmModule } from '../llm/llm.module';
import { MilvusModule } from '../milvus/milvus.module';
import { KeywordIndexService } from './keyword-index.service';
import { RerankerService } from './reranker.service';
import { RetrievalService } from './retrieval.service';

/**
 * Retrieval Module - dense, keyword, HyDE and hybrid retrievers
 */
@Module({
    imports: [MilvusModule, LlmModule],
    providers: [KeywordIndexService, RerankerService, RetrievalService],
    exports: [KeywordIndexService, RerankerService, RetrievalService],
})
export class RetrievalModule { }
