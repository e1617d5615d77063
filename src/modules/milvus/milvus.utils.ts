import { BadRequestException } from '@nestjs/common';
import { ErrorCode, ResStatus } from '@zilliz/milvus2-sdk-node';
import { z } from 'zod';
import { FIELD_ID, FIELD_METADATA } from './milvus.constants';
import { ChunkMetadata, MetadataFilter, MetadataValue, SearchHit, StoredChunk } from './types/milvus.types';
import type { MilvusMetric } from '../../config/milvus.config';

const FILTER_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Quote a string literal for a Milvus boolean expression.
 */
export function quoteLiteral(value: string): string {
    return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function formatValue(value: MetadataValue): string {
    if (typeof value === 'string') {
        return quoteLiteral(value);
    }
    if (typeof value === 'number') {
        if (!Number.isFinite(value)) {
            throw new BadRequestException(`Filter value must be a finite number, got ${value}`);
        }
        return String(value);
    }
    return value ? 'true' : 'false';
}

/**
 * Build a Milvus filter expression from an equality filter over the JSON
 * metadata field: `{ version: '2.2' }` becomes `metadata["version"] == "2.2"`.
 * Keys are joined with `and`. Returns undefined for an empty filter.
 */
export function buildFilterExpression(filter?: MetadataFilter): string | undefined {
    if (!filter) {
        return undefined;
    }

    const clauses = Object.entries(filter).map(([key, value]) => {
        if (!FILTER_KEY_PATTERN.test(key)) {
            throw new BadRequestException(`Invalid metadata filter key: ${key}`);
        }
        return `${FIELD_METADATA}[${quoteLiteral(key)}] == ${formatValue(value)}`;
    });

    return clauses.length > 0 ? clauses.join(' and ') : undefined;
}

/**
 * Expression matching rows whose primary key is one of `ids`.
 */
export function buildIdInExpression(ids: readonly string[]): string {
    return `${FIELD_ID} in [${ids.map(quoteLiteral).join(',')}]`;
}

/**
 * In-process counterpart of `buildFilterExpression`, used where results do
 * not come from Milvus (keyword index).
 */
export function matchesFilter(metadata: ChunkMetadata, filter?: MetadataFilter): boolean {
    if (!filter) {
        return true;
    }
    return Object.entries(filter).every(([key, expected]) => metadata[key] === expected);
}

/**
 * Batch array into chunks
 */
export function batchArray<T>(array: readonly T[], batchSize: number): T[][] {
    if (batchSize < 1) {
        throw new Error(`Batch size must be positive, got ${batchSize}`);
    }

    const batches: T[][] = [];

    for (let i = 0; i < array.length; i += batchSize) {
        batches.push(array.slice(i, i + batchSize));
    }

    return batches;
}

/**
 * Throw when a Milvus call reports a non-success status.
 */
export function assertStatusOk(status: ResStatus, operation: string): void {
    if (status.error_code !== ErrorCode.SUCCESS) {
        throw new Error(`${operation} failed: ${status.reason || String(status.error_code)}`);
    }
}

/**
 * Validate collection name
 */
export function validateCollectionName(name: string): void {
    if (!name || name.length === 0) {
        throw new BadRequestException('Collection name cannot be empty');
    }

    if (name.length > 255) {
        throw new BadRequestException('Collection name cannot exceed 255 characters');
    }

    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
        throw new BadRequestException(
            'Collection name must start with a letter or underscore and contain only letters, digits and underscores',
        );
    }
}

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);
const metadataValueSchema = z.union([scalarSchema, z.array(scalarSchema), z.null()]);

/**
 * Coerce the JSON field as returned by Milvus (object or serialized string)
 * into chunk metadata, keeping only scalar and scalar-array values.
 */
export function parseMetadata(raw: unknown): ChunkMetadata {
    let value: unknown = raw;
    if (typeof raw === 'string') {
        try {
            value = JSON.parse(raw);
        } catch {
            return { raw };
        }
    }

    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return {};
    }

    const metadata: ChunkMetadata = {};
    for (const [key, entry] of Object.entries(value)) {
        const parsed = metadataValueSchema.safeParse(entry);
        if (parsed.success) {
            metadata[key] = parsed.data;
        }
    }
    return metadata;
}

const rowSchema = z.object({
    id: z.union([z.string(), z.number()]).transform(String),
    text: z.string().default(''),
    metadata: z.unknown(),
});

const hitSchema = rowSchema.extend({
    score: z.number(),
});

/**
 * Search responses carry one result list per query vector. We always send a
 * single vector, but older SDK releases return the flat list directly.
 */
export function normalizeSearchRows(results: unknown): unknown[] {
    if (!Array.isArray(results)) {
        return [];
    }
    if (results.length > 0 && Array.isArray(results[0])) {
        return results[0];
    }
    return results;
}

export function parseStoredChunk(row: unknown): StoredChunk {
    const parsed = rowSchema.parse(row);
    return { id: parsed.id, text: parsed.text, metadata: parseMetadata(parsed.metadata) };
}

export function parseSearchHit(row: unknown, metric: MilvusMetric): SearchHit {
    const parsed = hitSchema.parse(row);
    return {
        id: parsed.id,
        text: parsed.text,
        metadata: parseMetadata(parsed.metadata),
        distance: parsed.score,
        score: toRelevance(parsed.score, metric),
    };
}

/**
 * Map a raw Milvus score onto "higher is better". COSINE and IP already are;
 * L2 is a distance.
 */
export function toRelevance(raw: number, metric: MilvusMetric): number {
    return metric === 'L2' ? 1 / (1 + raw) : raw;
}
