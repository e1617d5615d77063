import { Logger } from '@nestjs/common';
import { RerankerService } from '../reranker.service';
import { RetrievalRequest, RetrievedChunk, Retriever } from '../retrieval.types';
import { assertTopK, collect, dedupeById } from '../retrieval.utils';

/**
 * Dense and keyword candidates, concatenated and deduplicated by chunk id,
 * then ordered by the hosted reranker.
 */
export class HybridRetriever implements Retriever {
    readonly name = 'hybrid';
    private readonly logger = new Logger(HybridRetriever.name);

    constructor(
        private readonly dense: Retriever,
        private readonly keyword: Retriever,
        private readonly reranker: RerankerService,
        private readonly candidatesPerRetriever: number,
    ) { }

    async collectCandidates(request: RetrievalRequest): Promise<RetrievedChunk[]> {
        const candidateRequest = { ...request, topK: this.candidatesPerRetriever };
        const [denseResults, keywordResults] = await Promise.all([
            collect(this.dense.retrieve(candidateRequest)),
            collect(this.keyword.retrieve(candidateRequest)),
        ]);

        const candidates = dedupeById(denseResults, keywordResults);
        this.logger.debug(
            `🔀 ${denseResults.length} dense + ${keywordResults.length} keyword → ${candidates.length} unique candidates`,
        );
        return candidates;
    }

    async *retrieve(request: RetrievalRequest): AsyncGenerator<RetrievedChunk> {
        assertTopK(request.topK);
        const candidates = await this.collectCandidates(request);
        yield* await this.reranker.rerank(request.query, candidates, request.topK);
    }
}
