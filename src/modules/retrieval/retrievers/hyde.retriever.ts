import { GeneratorService } from '../../llm/generator.service';
import { RetrievalRequest, RetrievedChunk, Retriever } from '../retrieval.types';
import { assertTopK } from '../retrieval.utils';

/**
 * Hypothetical document expansion: the LLM drafts an answer and the dense
 * retriever searches with that draft instead of the question.
 */
export class HydeRetriever implements Retriever {
    readonly name = 'hyde';

    constructor(
        private readonly dense: Retriever,
        private readonly generator: GeneratorService,
    ) { }

    async *retrieve(request: RetrievalRequest): AsyncGenerator<RetrievedChunk> {
        assertTopK(request.topK);
        const hypothetical = await this.generator.generateHypotheticalDocument(request.query);
        yield* this.dense.retrieve({ ...request, query: hypothetical });
    }
}
