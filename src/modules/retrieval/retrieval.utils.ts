import { BadRequestException } from '@nestjs/common';
import { matchesFilter } from '../milvus/milvus.utils';
import { RetrievalRequest, RetrievedChunk } from './retrieval.types';

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
    const items: T[] = [];
    for await (const item of iterable) {
        items.push(item);
    }
    return items;
}

export function assertTopK(topK: number): void {
    if (!Number.isInteger(topK) || topK < 1) {
        throw new BadRequestException(`topK must be a positive integer, got ${topK}`);
    }
}

export function acceptsChunk(chunk: RetrievedChunk, request: RetrievalRequest): boolean {
    return matchesFilter(chunk.metadata, request.filter) && (request.predicate?.(chunk.metadata) ?? true);
}

/**
 * Yield the chunks that pass the request's filter and predicate, stopping
 * at `topK`.
 */
export async function* takeAccepted(
    chunks: Iterable<RetrievedChunk>,
    request: RetrievalRequest,
): AsyncGenerator<RetrievedChunk> {
    let yielded = 0;
    for (const chunk of chunks) {
        if (yielded >= request.topK) {
            return;
        }
        if (acceptsChunk(chunk, request)) {
            yielded++;
            yield chunk;
        }
    }
}

/**
 * Concatenate result lists and keep the first occurrence of each chunk id.
 */
export function dedupeById(...lists: RetrievedChunk[][]): RetrievedChunk[] {
    const seen = new Set<string>();
    const unique: RetrievedChunk[] = [];
    for (const chunk of lists.flat()) {
        if (!seen.has(chunk.id)) {
            seen.add(chunk.id);
            unique.push(chunk);
        }
    }
    return unique;
}
