import { EmbeddingService } from '../../llm/embedding.service';
import { MilvusService } from '../../milvus/milvus.service';
import { RetrievalRequest, RetrievedChunk, Retriever } from '../retrieval.types';
import { assertTopK, takeAccepted } from '../retrieval.utils';

/**
 * Embeds the query and runs a similarity search against the collection.
 */
export class DenseRetriever implements Retriever {
    readonly name = 'dense';

    constructor(
        private readonly collectionName: string,
        private readonly milvusService: MilvusService,
        private readonly embeddingService: EmbeddingService,
    ) { }

    async *retrieve(request: RetrievalRequest): AsyncGenerator<RetrievedChunk> {
        assertTopK(request.topK);
        const vector = await this.embeddingService.embed(request.query);

        const hits = await this.milvusService.search(this.collectionName, vector, {
            topK: request.topK,
            filter: request.filter,
        });

        yield* takeAccepted(
            hits.map(({ id, text, score, metadata }) => ({ id, text, score, metadata })),
            request,
        );
    }
}
