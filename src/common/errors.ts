import {
    BadGatewayException,
    BadRequestException,
    ConflictException,
    NotFoundException,
} from '@nestjs/common';

/**
 * Domain errors raised by the pipeline stages. Each one extends the HTTP
 * exception it should surface as, so controllers simply let them propagate.
 */

export class CollectionExistsError extends ConflictException {
    constructor(public readonly collectionName: string) {
        super(`Collection ${collectionName} already exists`);
        this.name = 'CollectionExistsError';
    }
}

export class CollectionNotFoundError extends NotFoundException {
    constructor(public readonly collectionName: string) {
        super(`Collection ${collectionName} not found`);
        this.name = 'CollectionNotFoundError';
    }
}

export class DuplicateChunkError extends ConflictException {
    constructor(
        public readonly collectionName: string,
        public readonly duplicateIds: string[],
    ) {
        super(
            `${duplicateIds.length} chunk id(s) already present in ${collectionName}: ${duplicateIds.slice(0, 5).join(', ')}${duplicateIds.length > 5 ? ', ...' : ''}`,
        );
        this.name = 'DuplicateChunkError';
    }
}

/**
 * Wraps a failure of a hosted dependency (reranker, partitioner, judge) and
 * keeps the underlying error as the cause.
 */
export class UpstreamServiceError extends BadGatewayException {
    constructor(
        public readonly service: string,
        message: string,
        cause?: unknown,
    ) {
        super(`${service}: ${message}`, { cause });
        this.name = 'UpstreamServiceError';
    }
}

export class RerankerError extends UpstreamServiceError {
    constructor(message: string, cause?: unknown) {
        super('reranker', message, cause);
        this.name = 'RerankerError';
    }
}

export class PartitionError extends UpstreamServiceError {
    constructor(message: string, cause?: unknown) {
        super('partitioner', message, cause);
        this.name = 'PartitionError';
    }
}

export class JudgeResponseError extends UpstreamServiceError {
    constructor(message: string, cause?: unknown) {
        super('judge', message, cause);
        this.name = 'JudgeResponseError';
    }
}

export class EvaluationInputError extends BadRequestException {
    constructor(message: string) {
        super(message);
        this.name = 'EvaluationInputError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
