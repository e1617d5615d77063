import { Test } from '@nestjs/testing';
import { ConfigType } from '@nestjs/config';
import { ConsistencyLevelEnum, DataType, ErrorCode, IndexType, MetricType } from '@zilliz/milvus2-sdk-node';
import milvusConfig, { MilvusMetric } from '../../config/milvus.config';
import openaiConfig from '../../config/openai.config';
import { CollectionExistsError, CollectionNotFoundError, DuplicateChunkError } from '../../common/errors';
import { MILVUS_CLIENT } from './milvus.constants';
import { MilvusService } from './milvus.service';
import { ChunkRecord } from './types/milvus.types';

const ok = { error_code: ErrorCode.SUCCESS, reason: '' };

function createClient() {
    return {
        hasCollection: jest.fn().mockResolvedValue({ status: ok, value: true }),
        createCollection: jest.fn().mockResolvedValue(ok),
        createIndex: jest.fn().mockResolvedValue(ok),
        loadCollectionSync: jest.fn().mockResolvedValue(ok),
        insert: jest.fn().mockResolvedValue({ status: ok, insert_cnt: '1' }),
        query: jest.fn().mockResolvedValue({ status: ok, data: [] }),
        search: jest.fn().mockResolvedValue({ status: ok, results: [] }),
        dropCollection: jest.fn().mockResolvedValue(ok),
    };
}

function chunk(id: string, version = '2.2'): ChunkRecord {
    return { id, text: `text of ${id}`, embedding: [0.1, 0.2, 0.3], metadata: { version } };
}

describe('MilvusService', () => {
    let client: ReturnType<typeof createClient>;

    async function createService(metricType: MilvusMetric = 'COSINE'): Promise<MilvusService> {
        const config = {
            address: 'http://localhost:19530',
            token: '',
            database: 'default',
            timeout: 1000,
            metricType,
            insertBatchSize: 1,
        } satisfies ConfigType<typeof milvusConfig>;

        const moduleRef = await Test.createTestingModule({
            providers: [
                MilvusService,
                { provide: MILVUS_CLIENT, useValue: client },
                { provide: milvusConfig.KEY, useValue: config },
                { provide: openaiConfig.KEY, useValue: { embeddingDim: 3 } },
            ],
        }).compile();

        return moduleRef.get(MilvusService);
    }

    beforeEach(() => {
        client = createClient();
    });

    describe('createCollection', () => {
        it('should refuse to create a collection that already exists', async () => {
            const service = await createService();

            await expect(service.createCollection('docs')).rejects.toBeInstanceOf(CollectionExistsError);
            expect(client.createCollection).not.toHaveBeenCalled();
        });

        it('should create the chunk schema, index it and load it', async () => {
            client.hasCollection.mockResolvedValue({ status: ok, value: false });
            const service = await createService();

            await service.createCollection('docs');

            expect(client.createCollection).toHaveBeenCalledWith(
                expect.objectContaining({
                    collection_name: 'docs',
                    fields: [
                        { name: 'id', data_type: DataType.VarChar, is_primary_key: true, autoID: false, max_length: 64 },
                        { name: 'embedding', data_type: DataType.FloatVector, dim: 3 },
                        { name: 'text', data_type: DataType.VarChar, max_length: 65535 },
                        { name: 'metadata', data_type: DataType.JSON },
                    ],
                }),
            );
            expect(client.createIndex).toHaveBeenCalledWith({
                collection_name: 'docs',
                field_name: 'embedding',
                index_type: IndexType.AUTOINDEX,
                metric_type: MetricType.COSINE,
            });
            expect(client.loadCollectionSync).toHaveBeenCalledWith({ collection_name: 'docs' });
        });

        it('should surface a failed server status', async () => {
            client.hasCollection.mockResolvedValue({ status: ok, value: false });
            client.createCollection.mockResolvedValue({ error_code: 'UnexpectedError', reason: 'quota exceeded' });
            const service = await createService();

            await expect(service.createCollection('docs')).rejects.toThrow('Create collection docs failed: quota exceeded');
        });
    });

    describe('insertChunks', () => {
        it('should reject ids repeated within the batch', async () => {
            const service = await createService();

            await expect(service.insertChunks('docs', [chunk('a'), chunk('b'), chunk('a')])).rejects.toBeInstanceOf(
                DuplicateChunkError,
            );
            expect(client.insert).not.toHaveBeenCalled();
        });

        it('should reject ids that are already stored', async () => {
            client.query.mockResolvedValueOnce({ status: ok, data: [{ id: 'b' }] });
            const service = await createService();

            const insert = service.insertChunks('docs', [chunk('a'), chunk('b')]);

            await expect(insert).rejects.toMatchObject({ duplicateIds: ['b'] });
            expect(client.query).toHaveBeenCalledWith({
                collection_name: 'docs',
                filter: 'id in ["a"]',
                output_fields: ['id'],
            });
            expect(client.insert).not.toHaveBeenCalled();
        });

        it('should insert in batches and sum the insert counts', async () => {
            const service = await createService();

            const result = await service.insertChunks('docs', [chunk('a'), chunk('b')]);

            expect(result).toEqual({ insertCount: 2, ids: ['a', 'b'] });
            expect(client.insert).toHaveBeenCalledTimes(2);
            expect(client.insert).toHaveBeenNthCalledWith(1, {
                collection_name: 'docs',
                data: [{ id: 'a', embedding: [0.1, 0.2, 0.3], text: 'text of a', metadata: { version: '2.2' } }],
            });
        });

        it('should require the collection to exist', async () => {
            client.hasCollection.mockResolvedValue({ status: ok, value: false });
            const service = await createService();

            await expect(service.insertChunks('missing', [chunk('a')])).rejects.toBeInstanceOf(CollectionNotFoundError);
        });
    });

    describe('search', () => {
        it('should push the metadata filter down and order hits best first', async () => {
            client.search.mockResolvedValue({
                status: ok,
                results: [
                    { id: 'a', text: 'A', metadata: { version: '2.2' }, score: 0.4 },
                    { id: 'b', text: 'B', metadata: { version: '2.2' }, score: 0.9 },
                ],
            });
            const service = await createService();

            const hits = await service.search('docs', [0.1, 0.2, 0.3], { topK: 2, filter: { version: '2.2' } });

            expect(client.search).toHaveBeenCalledWith({
                collection_name: 'docs',
                data: [0.1, 0.2, 0.3],
                limit: 2,
                filter: 'metadata["version"] == "2.2"',
                output_fields: ['id', 'text', 'metadata'],
            });
            expect(hits.map((hit) => [hit.id, hit.score])).toEqual([
                ['b', 0.9],
                ['a', 0.4],
            ]);
        });

        it('should rank L2 hits by ascending distance', async () => {
            client.search.mockResolvedValue({
                status: ok,
                results: [
                    { id: 'far', text: 'far', metadata: {}, score: 4 },
                    { id: 'near', text: 'near', metadata: {}, score: 1 },
                ],
            });
            const service = await createService('L2');

            const hits = await service.search('docs', [0, 0, 1], { topK: 5 });

            expect(hits.map((hit) => [hit.id, hit.score, hit.distance])).toEqual([
                ['near', 0.5, 1],
                ['far', 0.2, 4],
            ]);
        });
    });

    describe('fetchChunks', () => {
        function rows(from: number, count: number) {
            return Array.from({ length: count }, (_, offset) => ({
                id: `row-${String(from + offset).padStart(4, '0')}`,
                text: `chunk ${from + offset}`,
                metadata: { version: '2.2' },
            }));
        }

        it('should page through the whole collection in key order', async () => {
            client.query
                .mockResolvedValueOnce({ status: ok, data: rows(0, 1000) })
                .mockResolvedValueOnce({ status: ok, data: rows(1000, 2) });
            const service = await createService();

            const chunks = await service.fetchChunks('docs');

            expect(chunks).toHaveLength(1002);
            expect(chunks[1001]).toEqual({ id: 'row-1001', text: 'chunk 1001', metadata: { version: '2.2' } });
            expect(client.query).toHaveBeenCalledTimes(2);
            expect(client.query).toHaveBeenNthCalledWith(1, {
                collection_name: 'docs',
                filter: 'id != ""',
                output_fields: ['id', 'text', 'metadata'],
                limit: 1000,
                consistency_level: ConsistencyLevelEnum.Strong,
            });
            expect(client.query).toHaveBeenNthCalledWith(2, {
                collection_name: 'docs',
                filter: 'id > "row-0999"',
                output_fields: ['id', 'text', 'metadata'],
                limit: 1000,
                consistency_level: ConsistencyLevelEnum.Strong,
            });
        });

        it('should combine the metadata filter with the page bound and stop at the limit', async () => {
            client.query.mockResolvedValueOnce({ status: ok, data: rows(0, 5) });
            const service = await createService();

            const chunks = await service.fetchChunks('docs', { filter: { version: '2.2' }, limit: 5 });

            expect(chunks.map((stored) => stored.id)).toEqual(['row-0000', 'row-0001', 'row-0002', 'row-0003', 'row-0004']);
            expect(client.query).toHaveBeenCalledTimes(1);
            expect(client.query).toHaveBeenCalledWith(
                expect.objectContaining({ filter: 'metadata["version"] == "2.2" and id != ""', limit: 5 }),
            );
        });
    });

    describe('missing collections', () => {
        beforeEach(() => {
            client.hasCollection.mockResolvedValue({ status: ok, value: false });
        });

        it('should not search a collection that does not exist', async () => {
            const service = await createService();

            await expect(service.search('missing', [0, 0, 1], { topK: 2 })).rejects.toBeInstanceOf(CollectionNotFoundError);
            expect(client.search).not.toHaveBeenCalled();
        });

        it('should not query a collection that does not exist', async () => {
            const service = await createService();

            await expect(service.fetchChunks('missing')).rejects.toBeInstanceOf(CollectionNotFoundError);
            expect(client.query).not.toHaveBeenCalled();
        });
    });

    it('should not drop a collection that does not exist', async () => {
        client.hasCollection.mockResolvedValue({ status: ok, value: false });
        const service = await createService();

        await expect(service.dropCollection('missing')).rejects.toBeInstanceOf(CollectionNotFoundError);
        expect(client.dropCollection).not.toHaveBeenCalled();
    });
});
