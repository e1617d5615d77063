import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { basename } from 'path';
import ragConfig from '../../config/rag.config';
import { UpstreamServiceError, errorMessage } from '../../common/errors';
import { createChunkId } from '../../common/utils/hash.util';
import { mapWithConcurrency } from '../../common/utils/worker-pool';
import { EmbeddingService } from '../llm/embedding.service';
import { MilvusService } from '../milvus/milvus.service';
import { batchArray } from '../milvus/milvus.utils';
import { ChunkMetadata, ChunkRecord } from '../milvus/types/milvus.types';
import { KeywordIndexService } from '../retrieval/keyword-index.service';
import { ChunkerService } from './chunker.service';
import { IngestFileInput, IngestTextInput, IngestionResult, TextChunk } from './ingestion.types';
import { PartitionService } from './partition.service';

/**
 * Ingestion Service - chunk, embed and store documents
 */
@Injectable()
export class IngestionService {
    private readonly logger = new Logger(IngestionService.name);

    constructor(
        private readonly chunkerService: ChunkerService,
        private readonly partitionService: PartitionService,
        private readonly embeddingService: EmbeddingService,
        private readonly milvusService: MilvusService,
        private readonly keywordIndex: KeywordIndexService,
        @Inject(ragConfig.KEY) private readonly config: ConfigType<typeof ragConfig>,
    ) { }

    /**
     * Plain text or markdown, split locally on paragraphs
     */
    async ingestText(collectionName: string, input: IngestTextInput): Promise<IngestionResult> {
        const chunks = this.chunkerService.chunkText(input.text, input.chunking);
        return this.store(collectionName, input.sourceId, chunks, input.metadata);
    }

    /**
     * Any file type the partitioning service understands
     */
    async ingestFile(collectionName: string, input: IngestFileInput): Promise<IngestionResult> {
        const elements = await this.partitionService.partition({
            filename: input.filename,
            content: input.content,
            mimeType: input.mimeType,
        });

        const chunks: TextChunk[] = elements.map((element) => ({
            text: element.text,
            metadata: { ...element.metadata, elementType: element.type, elementId: element.elementId },
        }));
        return this.store(collectionName, input.sourceId ?? input.filename, chunks, input.metadata);
    }

    /**
     * Download a document and hand it to the partitioning service. The URL is
     * the source id.
     */
    async ingestUrl(collectionName: string, url: string, metadata: ChunkMetadata = {}): Promise<IngestionResult> {
        this.logger.log(`🌐 Downloading ${url}`);

        let response: Response;
        try {
            response = await fetch(url, { signal: AbortSignal.timeout(this.config.downloadTimeout) });
        } catch (error) {
            throw new UpstreamServiceError('download', `${url}: ${errorMessage(error)}`, error);
        }
        if (!response.ok) {
            throw new UpstreamServiceError('download', `${url}: HTTP ${response.status} ${response.statusText}`);
        }

        const content = Buffer.from(await response.arrayBuffer());
        const mimeType = response.headers.get('content-type')?.split(';')[0].trim() || undefined;

        return this.ingestFile(collectionName, {
            filename: basename(new URL(url).pathname) || 'document',
            content,
            mimeType,
            sourceId: url,
            metadata: { ...metadata, url },
        });
    }

    /**
     * Embed chunk batches on a bounded worker pool, then insert everything in
     * one call. Ids are derived from (sourceId, chunkIndex), so storing the
     * same source twice is rejected by the store. Caller metadata takes
     * precedence over what the chunker or partitioner attached.
     */
    async store(
        collectionName: string,
        sourceId: string,
        chunks: TextChunk[],
        metadata: ChunkMetadata = {},
    ): Promise<IngestionResult> {
        const startTime = Date.now();
        if (chunks.length === 0) {
            this.logger.warn(`⚠️ No chunks to store for ${sourceId}`);
            return { collection: collectionName, sourceId, chunkCount: 0, storedCount: 0 };
        }

        await this.milvusService.ensureCollection(collectionName, { dim: this.embeddingService.dimension });

        const batches = batchArray(chunks, this.config.embeddingBatchSize);
        this.logger.debug(
            `🧮 Embedding ${chunks.length} chunks in ${batches.length} batches (concurrency ${this.config.ingestConcurrency})`,
        );
        const embeddings = (
            await mapWithConcurrency(batches, this.config.ingestConcurrency, (batch) =>
                this.embeddingService.embedMany(batch.map((chunk) => chunk.text)),
            )
        ).flat();

        const records: ChunkRecord[] = chunks.map((chunk, chunkIndex) => ({
            id: createChunkId(sourceId, chunkIndex),
            text: chunk.text,
            embedding: embeddings[chunkIndex],
            metadata: { ...chunk.metadata, ...metadata, sourceId, chunkIndex },
        }));

        const result = await this.milvusService.insertChunks(collectionName, records);
        this.keywordIndex.addChunks(
            collectionName,
            records.map(({ id, text, metadata: chunkMetadata }) => ({ id, text, metadata: chunkMetadata })),
        );

        this.logger.log(
            `✅ Stored ${result.insertCount}/${chunks.length} chunks of ${sourceId} in ${collectionName} (${Date.now() - startTime}ms)`,
        );
        return { collection: collectionName, sourceId, chunkCount: chunks.length, storedCount: result.insertCount };
    }
}
