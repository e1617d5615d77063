import { ChunkMetadata } from '../milvus/types/milvus.types';

/**
 * Chunk produced by the local chunker or the partitioning service, before it
 * is embedded and stored.
 */
export interface TextChunk {
    text: string;
    startIndex?: number;
    endIndex?: number;
    metadata: ChunkMetadata;
}

export interface ChunkingOptions {
    chunkSize: number;
    overlap: number;
    separator?: string;
}

export interface PartitionedElement {
    type: string;
    elementId: string;
    text: string;
    metadata: ChunkMetadata;
}

export interface IngestTextInput {
    sourceId: string;
    text: string;
    metadata?: ChunkMetadata;
    chunking?: Partial<ChunkingOptions>;
}

export interface IngestFileInput {
    filename: string;
    content: Buffer;
    mimeType?: string;
    /** Defaults to the filename. */
    sourceId?: string;
    metadata?: ChunkMetadata;
}

export interface IngestionResult {
    collection: string;
    sourceId: string;
    chunkCount: number;
    storedCount: number;
}
