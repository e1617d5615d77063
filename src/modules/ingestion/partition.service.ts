import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { z } from 'zod';
import unstructuredConfig, { ChunkingStrategy, PartitionStrategy } from '../../config/unstructured.config';
import { PartitionError, errorMessage } from '../../common/errors';
import { parseMetadata } from '../milvus/milvus.utils';
import { PartitionedElement } from './ingestion.types';

const elementSchema = z.object({
    type: z.string(),
    element_id: z.string(),
    text: z.string().default(''),
    metadata: z.unknown().optional(),
});

const partitionResponseSchema = z.array(elementSchema);

export interface PartitionFile {
    filename: string;
    content: Buffer;
    mimeType?: string;
}

export interface PartitionOptions {
    strategy: PartitionStrategy;
    chunkingStrategy: ChunkingStrategy;
    maxCharacters: number;
    overlap: number;
}

/**
 * Partition Service - document parsing through the Unstructured API.
 * Files go up as multipart; the service returns already chunked elements.
 */
@Injectable()
export class PartitionService {
    private readonly logger = new Logger(PartitionService.name);

    constructor(@Inject(unstructuredConfig.KEY) private readonly config: ConfigType<typeof unstructuredConfig>) { }

    async partition(file: PartitionFile, options: Partial<PartitionOptions> = {}): Promise<PartitionedElement[]> {
        const startTime = Date.now();
        const settings: PartitionOptions = {
            strategy: options.strategy ?? this.config.strategy,
            chunkingStrategy: options.chunkingStrategy ?? this.config.chunkingStrategy,
            maxCharacters: options.maxCharacters ?? this.config.maxCharacters,
            overlap: options.overlap ?? this.config.overlap,
        };

        this.logger.debug(
            `📤 Partitioning ${file.filename} (${file.content.length} bytes, strategy=${settings.strategy}, chunking=${settings.chunkingStrategy})`,
        );

        const form = new FormData();
        form.append(
            'files',
            new Blob([file.content], { type: file.mimeType ?? 'application/octet-stream' }),
            file.filename,
        );
        form.append('strategy', settings.strategy);
        form.append('chunking_strategy', settings.chunkingStrategy);
        form.append('max_characters', String(settings.maxCharacters));
        form.append('overlap', String(settings.overlap));

        const payload = await this.request(form);
        const parsed = partitionResponseSchema.safeParse(payload);
        if (!parsed.success) {
            throw new PartitionError(`malformed response: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
        }

        const elements = parsed.data
            .filter((element) => element.text.trim().length > 0)
            .map((element) => ({
                type: element.type,
                elementId: element.element_id,
                text: element.text,
                metadata: parseMetadata(element.metadata ?? {}),
            }));

        this.logger.log(`✅ Partitioned ${file.filename} into ${elements.length} elements in ${Date.now() - startTime}ms`);
        return elements;
    }

    private async request(form: FormData): Promise<unknown> {
        const headers: Record<string, string> = { Accept: 'application/json' };
        if (this.config.apiKey) {
            headers['unstructured-api-key'] = this.config.apiKey;
        }

        let response: Response;
        try {
            response = await fetch(this.config.apiUrl, {
                method: 'POST',
                headers,
                body: form,
                signal: AbortSignal.timeout(this.config.timeout),
            });
        } catch (error) {
            this.logger.error(`❌ Partitioning service unreachable: ${errorMessage(error)}`);
            throw new PartitionError(`request failed: ${errorMessage(error)}`, error);
        }

        if (!response.ok) {
            throw new PartitionError(`HTTP ${response.status} ${response.statusText}`);
        }

        try {
            return await response.json();
        } catch (error) {
            throw new PartitionError('response body is not JSON', error);
        }
    }
}
