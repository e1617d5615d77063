import { ChunkMetadata, MetadataFilter } from '../milvus/types/milvus.types';

export const RETRIEVAL_MODES = ['dense', 'keyword', 'hyde', 'hybrid'] as const;

export type RetrievalMode = (typeof RETRIEVAL_MODES)[number];

/**
 * Retrieved chunk with relevance score
 */
export interface RetrievedChunk {
    id: string;
    text: string;
    score: number;
    metadata: ChunkMetadata;
}

export type MetadataPredicate = (metadata: ChunkMetadata) => boolean;

export interface RetrievalRequest {
    query: string;
    /** Upper bound on the number of chunks yielded. */
    topK: number;
    /** Equality filter on metadata tags, pushed down to the store where possible. */
    filter?: MetadataFilter;
    /** Arbitrary post-filter applied to each candidate before it is yielded. */
    predicate?: MetadataPredicate;
}

/**
 * A retriever yields chunks best first and never more than `topK` of them.
 * Each call returns a fresh single-use iterator; iterate it once.
 */
export interface Retriever {
    readonly name: RetrievalMode;
    retrieve(request: RetrievalRequest): AsyncIterable<RetrievedChunk>;
}
