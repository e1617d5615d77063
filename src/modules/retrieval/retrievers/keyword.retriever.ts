import { RetrievalRequest, RetrievedChunk, Retriever } from '../retrieval.types';
import { assertTopK, takeAccepted } from '../retrieval.utils';
import { KeywordIndexService } from '../keyword-index.service';

/**
 * BM25 ranking over the collection's chunks, held in process.
 */
export class KeywordRetriever implements Retriever {
    readonly name = 'keyword';

    constructor(
        private readonly collectionName: string,
        private readonly keywordIndex: KeywordIndexService,
    ) { }

    async *retrieve(request: RetrievalRequest): AsyncGenerator<RetrievedChunk> {
        assertTopK(request.topK);
        const index = await this.keywordIndex.getIndex(this.collectionName);

        // Filters apply after ranking, so rank the whole corpus.
        const matches = index.search(request.query);

        yield* takeAccepted(
            matches.map(({ document, score }) => ({
                id: document.id,
                text: document.text,
                metadata: document.metadata,
                score,
            })),
            request,
        );
    }
}
