import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { ConsistencyLevelEnum, DataType, IndexType, MetricType, MilvusClient } from '@zilliz/milvus2-sdk-node';
import { z } from 'zod';
import milvusConfig from '../../config/milvus.config';
import openaiConfig from '../../config/openai.config';
import {
    CollectionExistsError,
    CollectionNotFoundError,
    DuplicateChunkError,
    errorMessage,
} from '../../common/errors';
import {
    FIELD_EMBEDDING,
    FIELD_ID,
    FIELD_METADATA,
    FIELD_TEXT,
    ID_MAX_LENGTH,
    MILVUS_CLIENT,
    QUERY_PAGE_SIZE,
    TEXT_MAX_LENGTH,
} from './milvus.constants';
import {
    assertStatusOk,
    batchArray,
    buildFilterExpression,
    buildIdInExpression,
    normalizeSearchRows,
    parseSearchHit,
    parseStoredChunk,
    quoteLiteral,
    validateCollectionName,
} from './milvus.utils';
import {
    ChunkRecord,
    CollectionStats,
    CreateCollectionOptions,
    FetchOptions,
    InsertResult,
    SearchHit,
    SearchOptions,
    StoredChunk,
} from './types/milvus.types';

const OUTPUT_FIELDS = [FIELD_ID, FIELD_TEXT, FIELD_METADATA];

const collectionSchemaShape = z.object({
    fields: z.array(
        z.object({
            name: z.string(),
            type_params: z
                .array(z.object({ key: z.string(), value: z.union([z.string(), z.number()]) }))
                .default([]),
        }),
    ),
});

/**
 * Owns every call to the Milvus / Zilliz Cloud collection API. The client is
 * injected; this service opens nothing itself and closes the client on
 * shutdown.
 */
@Injectable()
export class MilvusService implements OnModuleInit, OnModuleDestroy {
    private readonly logger = new Logger(MilvusService.name);

    constructor(
        @Inject(MILVUS_CLIENT) private readonly client: MilvusClient,
        @Inject(milvusConfig.KEY) private readonly config: ConfigType<typeof milvusConfig>,
        @Inject(openaiConfig.KEY) private readonly openai: ConfigType<typeof openaiConfig>,
    ) { }

    async onModuleInit() {
        this.logger.log(`🔗 Connecting to Milvus at ${this.config.address} (db: ${this.config.database})...`);
        const health = await this.client.checkHealth();
        if (!health.isHealthy) {
            throw new Error(`Milvus is not healthy: ${health.reasons.join(', ')}`);
        }
        this.logger.log('✅ Milvus connection successful');
    }

    async onModuleDestroy() {
        try {
            await this.client.closeConnection();
            this.logger.log('✅ Milvus connection closed');
        } catch (error) {
            this.logger.error(`Error disconnecting from Milvus: ${errorMessage(error)}`);
        }
    }

    async checkHealth(): Promise<{ isHealthy: boolean; reasons: string[] }> {
        const health = await this.client.checkHealth();
        return { isHealthy: health.isHealthy, reasons: health.reasons };
    }

    /**
     * Check if collection exists
     */
    async collectionExists(collectionName: string): Promise<boolean> {
        const response = await this.client.hasCollection({ collection_name: collectionName });
        assertStatusOk(response.status, `Check collection ${collectionName}`);
        return response.value === true;
    }

    /**
     * Create a collection with the chunk schema, index it and load it.
     * Creating a collection that already exists is a conflict.
     */
    async createCollection(collectionName: string, options: CreateCollectionOptions = {}): Promise<void> {
        validateCollectionName(collectionName);

        if (await this.collectionExists(collectionName)) {
            throw new CollectionExistsError(collectionName);
        }

        const dim = options.dim ?? this.openai.embeddingDim;
        this.logger.log(`📦 Creating collection: ${collectionName} (dim=${dim}, metric=${this.config.metricType})`);

        const created = await this.client.createCollection({
            collection_name: collectionName,
            description: options.description ?? `Collection: ${collectionName}`,
            fields: [
                {
                    name: FIELD_ID,
                    data_type: DataType.VarChar,
                    is_primary_key: true,
                    autoID: false,
                    max_length: ID_MAX_LENGTH,
                },
                {
                    name: FIELD_EMBEDDING,
                    data_type: DataType.FloatVector,
                    dim,
                },
                {
                    name: FIELD_TEXT,
                    data_type: DataType.VarChar,
                    max_length: TEXT_MAX_LENGTH,
                },
                {
                    name: FIELD_METADATA,
                    data_type: DataType.JSON,
                },
            ],
        });
        assertStatusOk(created, `Create collection ${collectionName}`);

        const indexed = await this.client.createIndex({
            collection_name: collectionName,
            field_name: FIELD_EMBEDDING,
            index_type: IndexType.AUTOINDEX,
            metric_type: MetricType[this.config.metricType],
        });
        assertStatusOk(indexed, `Create index on ${collectionName}.${FIELD_EMBEDDING}`);

        await this.loadCollection(collectionName);
        this.logger.log(`✅ Collection ${collectionName} created with index`);
    }

    /**
     * Create the collection unless it already exists.
     */
    async ensureCollection(collectionName: string, options: CreateCollectionOptions = {}): Promise<void> {
        if (await this.collectionExists(collectionName)) {
            this.logger.verbose(`✓ Collection already exists: ${collectionName}`);
            return;
        }
        await this.createCollection(collectionName, options);
    }

    async loadCollection(collectionName: string): Promise<void> {
        this.logger.debug(`📥 Loading collection: ${collectionName}`);
        const status = await this.client.loadCollectionSync({ collection_name: collectionName });
        assertStatusOk(status, `Load collection ${collectionName}`);
    }

    /**
     * Insert chunk rows. Primary keys must be new: a key repeated in the batch
     * or already stored in the collection raises DuplicateChunkError and
     * nothing is written.
     */
    async insertChunks(collectionName: string, chunks: ChunkRecord[]): Promise<InsertResult> {
        if (chunks.length === 0) {
            return { insertCount: 0, ids: [] };
        }

        await this.requireCollection(collectionName);

        const ids = chunks.map((chunk) => chunk.id);
        const repeated = ids.filter((id, index) => ids.indexOf(id) !== index);
        if (repeated.length > 0) {
            throw new DuplicateChunkError(collectionName, [...new Set(repeated)]);
        }

        const existing = await this.findExistingIds(collectionName, ids);
        if (existing.length > 0) {
            throw new DuplicateChunkError(collectionName, existing);
        }

        let insertCount = 0;
        for (const batch of batchArray(chunks, this.config.insertBatchSize)) {
            const response = await this.client.insert({
                collection_name: collectionName,
                data: batch.map((chunk) => ({
                    [FIELD_ID]: chunk.id,
                    [FIELD_EMBEDDING]: chunk.embedding,
                    [FIELD_TEXT]: chunk.text,
                    [FIELD_METADATA]: chunk.metadata,
                })),
            });
            assertStatusOk(response.status, `Insert into ${collectionName}`);
            insertCount += Number(response.insert_cnt);
        }

        this.logger.log(`✅ Inserted ${insertCount} chunks into ${collectionName}`);
        return { insertCount, ids };
    }

    /**
     * Nearest-neighbour search with an optional equality filter on metadata.
     * Results come back best first with `score` oriented so higher is better.
     */
    async search(collectionName: string, vector: number[], options: SearchOptions): Promise<SearchHit[]> {
        await this.requireCollection(collectionName);
        const filter = buildFilterExpression(options.filter);

        const response = await this.client.search({
            collection_name: collectionName,
            data: vector,
            limit: options.topK,
            filter,
            output_fields: OUTPUT_FIELDS,
        });
        assertStatusOk(response.status, `Search ${collectionName}`);

        const hits = normalizeSearchRows(response.results)
            .map((row) => parseSearchHit(row, this.config.metricType))
            .sort((a, b) => b.score - a.score)
            .slice(0, options.topK);

        this.logger.debug(
            `🔍 Search completed: ${hits.length} results in ${collectionName}${filter ? ` where ${filter}` : ''}`,
        );
        return hits;
    }

    /**
     * Scalar query returning stored chunks without vectors. Pages through the
     * collection in primary key order at Strong consistency, so rows inserted
     * just before the call are included. `limit` caps the total.
     */
    async fetchChunks(collectionName: string, options: FetchOptions = {}): Promise<StoredChunk[]> {
        await this.requireCollection(collectionName);

        const filter = buildFilterExpression(options.filter);
        const limit = options.limit ?? Number.POSITIVE_INFINITY;
        const chunks: StoredChunk[] = [];
        let lastId: string | undefined;

        while (chunks.length < limit) {
            const pageSize = Math.min(QUERY_PAGE_SIZE, limit - chunks.length);
            const clauses = [filter, lastId === undefined ? `${FIELD_ID} != ""` : `${FIELD_ID} > ${quoteLiteral(lastId)}`];
            const response = await this.client.query({
                collection_name: collectionName,
                filter: clauses.filter((clause) => clause !== undefined).join(' and '),
                output_fields: OUTPUT_FIELDS,
                limit: pageSize,
                consistency_level: ConsistencyLevelEnum.Strong,
            });
            assertStatusOk(response.status, `Query ${collectionName}`);

            const page = response.data.map((row) => parseStoredChunk(row));
            chunks.push(...page);
            if (page.length < pageSize) {
                break;
            }
            lastId = page.reduce((max, chunk) => (chunk.id > max ? chunk.id : max), page[0].id);
        }

        this.logger.debug(`📄 Fetched ${chunks.length} chunks from ${collectionName}`);
        return chunks;
    }

    /**
     * List all collections
     */
    async listCollections(): Promise<string[]> {
        const response = await this.client.showCollections();
        assertStatusOk(response.status, 'List collections');
        return response.data.map((collection) => collection.name);
    }

    async dropCollection(collectionName: string): Promise<void> {
        await this.requireCollection(collectionName);
        const status = await this.client.dropCollection({ collection_name: collectionName });
        assertStatusOk(status, `Drop collection ${collectionName}`);
        this.logger.log(`🗑️ Collection ${collectionName} dropped`);
    }

    /**
     * Get collection statistics
     */
    async getCollectionStats(collectionName: string): Promise<CollectionStats> {
        await this.requireCollection(collectionName);

        const description = await this.client.describeCollection({ collection_name: collectionName });
        assertStatusOk(description.status, `Describe collection ${collectionName}`);
        const statistics = await this.client.getCollectionStatistics({ collection_name: collectionName });
        assertStatusOk(statistics.status, `Statistics of ${collectionName}`);

        const schema = collectionSchemaShape.parse(description.schema);
        const embeddingField = schema.fields.find((field) => field.name === FIELD_EMBEDDING);
        const dimParam = embeddingField?.type_params.find((param) => param.key === 'dim');

        return {
            name: collectionName,
            rowCount: Number(statistics.data.row_count ?? 0),
            vectorDim: dimParam ? Number(dimParam.value) : 0,
            metricType: this.config.metricType,
        };
    }

    private async requireCollection(collectionName: string): Promise<void> {
        if (!(await this.collectionExists(collectionName))) {
            throw new CollectionNotFoundError(collectionName);
        }
    }

    private async findExistingIds(collectionName: string, ids: string[]): Promise<string[]> {
        const existing: string[] = [];
        for (const batch of batchArray(ids, this.config.insertBatchSize)) {
            const response = await this.client.query({
                collection_name: collectionName,
                filter: buildIdInExpression(batch),
                output_fields: [FIELD_ID],
            });
            assertStatusOk(response.status, `Query ${collectionName}`);
            for (const row of response.data) {
                existing.push(String(row[FIELD_ID]));
            }
        }
        return existing;
    }
}
