import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import OpenAI from 'openai';
import openaiConfig from '../../config/openai.config';
import { errorMessage } from '../../common/errors';
import { OPENAI_CLIENT } from './llm.constants';

/**
 * Embedding Service - text to fixed-dimension vectors via the OpenAI API
 */
@Injectable()
export class EmbeddingService {
    private readonly logger = new Logger(EmbeddingService.name);

    constructor(
        @Inject(OPENAI_CLIENT) private readonly client: OpenAI,
        @Inject(openaiConfig.KEY) private readonly config: ConfigType<typeof openaiConfig>,
    ) { }

    get dimension(): number {
        return this.config.embeddingDim;
    }

    /**
     * Generate embedding for text
     */
    async embed(text: string): Promise<number[]> {
        const [embedding] = await this.embedMany([text]);
        return embedding;
    }

    /**
     * Generate embeddings for multiple texts, in input order
     */
    async embedMany(texts: string[]): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }

        try {
            this.logger.debug(`🔄 Generating embeddings for ${texts.length} texts`);

            const response = await this.client.embeddings.create({
                model: this.config.embeddingModel,
                input: texts,
                encoding_format: 'float',
            });

            if (response.data.length !== texts.length) {
                throw new Error(`Expected ${texts.length} embeddings, received ${response.data.length}`);
            }

            const embeddings = [...response.data]
                .sort((a, b) => a.index - b.index)
                .map((item) => item.embedding);

            for (const embedding of embeddings) {
                if (embedding.length !== this.config.embeddingDim) {
                    throw new Error(
                        `Embedding dimension mismatch: expected ${this.config.embeddingDim}, got ${embedding.length}`,
                    );
                }
            }

            this.logger.debug(`✅ Generated ${embeddings.length} embeddings`);
            return embeddings;
        } catch (error) {
            this.logger.error(`❌ Failed to generate embeddings: ${errorMessage(error)}`);
            throw error;
        }
    }
}
