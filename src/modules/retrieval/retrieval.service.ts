import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import ragConfig from '../../config/rag.config';
import { EmbeddingService } from '../llm/embedding.service';
import { GeneratorService } from '../llm/generator.service';
import { MilvusService } from '../milvus/milvus.service';
import { KeywordIndexService } from './keyword-index.service';
import { RerankerService } from './reranker.service';
import { RetrievalMode, RetrievalRequest, RetrievedChunk } from './retrieval.types';
import { collect } from './retrieval.utils';
import { DenseRetriever } from './retrievers/dense.retriever';
import { HybridRetriever } from './retrievers/hybrid.retriever';
import { HydeRetriever } from './retrievers/hyde.retriever';
import { KeywordRetriever } from './retrievers/keyword.retriever';

export interface RetrieverSet {
    dense: DenseRetriever;
    keyword: KeywordRetriever;
    hyde: HydeRetriever;
    hybrid: HybridRetriever;
}

/**
 * Builds the retrievers of a collection from the shared clients.
 */
@Injectable()
export class RetrievalService {
    private readonly logger = new Logger(RetrievalService.name);

    constructor(
        private readonly milvusService: MilvusService,
        private readonly embeddingService: EmbeddingService,
        private readonly generatorService: GeneratorService,
        private readonly keywordIndex: KeywordIndexService,
        private readonly rerankerService: RerankerService,
        @Inject(ragConfig.KEY) private readonly config: ConfigType<typeof ragConfig>,
    ) { }

    forCollection(collectionName: string): RetrieverSet {
        const dense = new DenseRetriever(collectionName, this.milvusService, this.embeddingService);
        const keyword = new KeywordRetriever(collectionName, this.keywordIndex);
        return {
            dense,
            keyword,
            hyde: new HydeRetriever(dense, this.generatorService),
            hybrid: new HybridRetriever(dense, keyword, this.rerankerService, this.config.hybridCandidates),
        };
    }

    async retrieve(
        mode: RetrievalMode,
        collectionName: string,
        request: Omit<RetrievalRequest, 'topK'> & { topK?: number },
    ): Promise<RetrievedChunk[]> {
        const startTime = Date.now();
        const retriever = this.forCollection(collectionName)[mode];
        const results = await collect(retriever.retrieve({ ...request, topK: request.topK ?? this.config.topK }));

        this.logger.log(
            `✅ Retrieved ${results.length} chunks from ${collectionName} (${mode}) in ${Date.now() - startTime}ms`,
        );
        return results;
    }
}
