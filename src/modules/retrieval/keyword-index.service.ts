import { Injectable, Logger } from '@nestjs/common';
import { MilvusService } from '../milvus/milvus.service';
import { StoredChunk } from '../milvus/types/milvus.types';
import { Bm25Index } from './bm25';

/**
 * Keeps one BM25 index per collection. An index is built from the collection
 * contents on first use and then extended as chunks are ingested.
 */
@Injectable()
export class KeywordIndexService {
    private readonly logger = new Logger(KeywordIndexService.name);
    private readonly indexes = new Map<string, Bm25Index>();
    private readonly loading = new Map<string, Promise<Bm25Index>>();
    // Chunks ingested while the collection's index is loading.
    private readonly queued = new Map<string, StoredChunk[]>();

    constructor(private readonly milvusService: MilvusService) { }

    async getIndex(collectionName: string): Promise<Bm25Index> {
        const existing = this.indexes.get(collectionName);
        if (existing) {
            return existing;
        }
        return this.loading.get(collectionName) ?? this.startLoad(collectionName);
    }

    /**
     * Extend the collection's index. Chunks arriving during a load are added
     * before the loaded index is published; collections never loaded pick
     * them up from Milvus on first use.
     */
    addChunks(collectionName: string, chunks: StoredChunk[]): void {
        const index = this.indexes.get(collectionName);
        if (index) {
            const added = index.add(chunks);
            this.logger.debug(`📚 Keyword index ${collectionName}: +${added} (${index.size} total)`);
            return;
        }

        if (this.loading.has(collectionName)) {
            this.queued.set(collectionName, [...(this.queued.get(collectionName) ?? []), ...chunks]);
        }
    }

    /**
     * Forget cached and in-flight indexes. A load still running for a reset
     * collection completes for its callers but is never cached.
     */
    reset(collectionName?: string): void {
        if (collectionName) {
            this.indexes.delete(collectionName);
            this.loading.delete(collectionName);
            this.queued.delete(collectionName);
        } else {
            this.indexes.clear();
            this.loading.clear();
            this.queued.clear();
        }
    }

    private startLoad(collectionName: string): Promise<Bm25Index> {
        const pending: Promise<Bm25Index> = this.load(collectionName).then(
            (index) => {
                if (this.loading.get(collectionName) === pending) {
                    index.add(this.queued.get(collectionName) ?? []);
                    this.settle(collectionName);
                    this.indexes.set(collectionName, index);
                    this.logger.log(`📚 Built keyword index for ${collectionName} (${index.size} chunks)`);
                }
                return index;
            },
            (error: unknown) => {
                if (this.loading.get(collectionName) === pending) {
                    this.settle(collectionName);
                }
                throw error;
            },
        );
        this.loading.set(collectionName, pending);
        return pending;
    }

    private settle(collectionName: string): void {
        this.loading.delete(collectionName);
        this.queued.delete(collectionName);
    }

    private async load(collectionName: string): Promise<Bm25Index> {
        const chunks = await this.milvusService.fetchChunks(collectionName);
        const index = new Bm25Index();
        index.add(chunks);
        return index;
    }
}
