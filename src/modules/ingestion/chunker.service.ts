import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import ragConfig from '../../config/rag.config';
import { ChunkingOptions, TextChunk } from './ingestion.types';

/**
 * Text Chunker Service - paragraph splitting for plain text and markdown
 */
@Injectable()
export class ChunkerService {
    private readonly logger = new Logger(ChunkerService.name);

    constructor(@Inject(ragConfig.KEY) private readonly config: ConfigType<typeof ragConfig>) { }

    /**
     * Chunk text on a separator, carrying the tail of each chunk into the next
     */
    chunkText(text: string, options: Partial<ChunkingOptions> = {}): TextChunk[] {
        const chunkSize = options.chunkSize ?? this.config.chunkSize;
        const overlap = options.overlap ?? this.config.chunkOverlap;
        const separator = options.separator ?? '\n\n';
        this.assertOptions(chunkSize, overlap);
        this.logger.debug(`📄 Chunking text (${text.length} chars) with size=${chunkSize}, overlap=${overlap}`);

        const chunks: TextChunk[] = [];
        let currentChunk = '';
        let startIndex = 0;

        for (const part of text.split(separator)) {
            if (currentChunk.length > 0 && currentChunk.length + part.length + separator.length > chunkSize) {
                const chunkText = currentChunk.trim();
                if (chunkText.length > 0) {
                    chunks.push(this.toChunk(chunkText, startIndex, startIndex + currentChunk.length, chunks.length));
                }

                const overlapText = overlap > 0 ? currentChunk.slice(-overlap) : '';
                startIndex += overlapText.length > 0
                    ? currentChunk.length - overlapText.length
                    : currentChunk.length + separator.length;
                currentChunk = overlapText.length > 0 ? overlapText + separator + part : part;
            } else {
                currentChunk = currentChunk.length > 0 ? currentChunk + separator + part : part;
            }
        }

        if (currentChunk.trim().length > 0) {
            chunks.push(this.toChunk(currentChunk.trim(), startIndex, startIndex + currentChunk.length, chunks.length));
        }

        for (const chunk of chunks) {
            chunk.metadata.totalChunks = chunks.length;
        }

        this.logger.log(`✅ Created ${chunks.length} chunks`);
        return chunks;
    }

    /**
     * Fixed-width windows, for text without paragraph structure
     */
    chunkByCharCount(text: string, chunkSize = this.config.chunkSize, overlap = this.config.chunkOverlap): TextChunk[] {
        this.assertOptions(chunkSize, overlap);
        this.logger.debug(`📄 Chunking by character count (${text.length} chars)`);

        const chunks: TextChunk[] = [];
        let startIndex = 0;

        while (startIndex < text.length) {
            const endIndex = Math.min(startIndex + chunkSize, text.length);
            const chunkText = text.substring(startIndex, endIndex).trim();
            if (chunkText.length > 0) {
                chunks.push(this.toChunk(chunkText, startIndex, endIndex, chunks.length));
            }
            if (endIndex === text.length) {
                break;
            }
            startIndex = endIndex - overlap;
        }

        for (const chunk of chunks) {
            chunk.metadata.totalChunks = chunks.length;
        }

        this.logger.log(`✅ Created ${chunks.length} chunks by character count`);
        return chunks;
    }

    private toChunk(text: string, startIndex: number, endIndex: number, chunkIndex: number): TextChunk {
        return { text, startIndex, endIndex, metadata: { chunkIndex } };
    }

    private assertOptions(chunkSize: number, overlap: number): void {
        if (!Number.isInteger(chunkSize) || chunkSize < 1) {
            throw new BadRequestException(`chunkSize must be a positive integer, got ${chunkSize}`);
        }
        if (!Number.isInteger(overlap) || overlap < 0 || overlap >= chunkSize) {
            throw new BadRequestException(`overlap must be an integer in [0, ${chunkSize}), got ${overlap}`);
        }
    }
}
