/**
 * Milvus Vector Database Types
 */

export type MetadataValue = string | number | boolean;

/**
 * Chunk metadata as stored in the JSON field. Tags such as `version` live here
 * and are what equality filters match against.
 */
export type ChunkMetadata = Record<string, MetadataValue | MetadataValue[] | null>;

/**
 * Equality filter over metadata keys, e.g. `{ version: '2.2' }`.
 */
export type MetadataFilter = Record<string, MetadataValue>;

export interface ChunkRecord {
    id: string;
    text: string;
    embedding: number[];
    metadata: ChunkMetadata;
}

export interface StoredChunk {
    id: string;
    text: string;
    metadata: ChunkMetadata;
}

export interface SearchHit extends StoredChunk {
    /** Higher is more similar, whatever the collection's metric. */
    score: number;
    /** Raw value returned by Milvus (distance for L2, similarity otherwise). */
    distance: number;
}

export interface SearchOptions {
    topK: number;
    filter?: MetadataFilter;
}

export interface FetchOptions {
    filter?: MetadataFilter;
    limit?: number;
}

export interface CreateCollectionOptions {
    dim?: number;
    description?: string;
}

export interface InsertResult {
    insertCount: number;
    ids: string[];
}

export interface CollectionStats {
    name: string;
    rowCount: number;
    vectorDim: number;
    metricType: string;
}
