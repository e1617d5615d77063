import { Module } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import OpenAI from 'openai';
import openaiConfig from '../../config/openai.config';
import { OPENAI_CLIENT } from './llm.constants';
import { EmbeddingService } from './embedding.service';
import { GeneratorService } from './generator.service';

/**
 * LLM Module - embeddings and completions over one shared OpenAI client
 */
@Module({
    providers: [
        {
            provide: OPENAI_CLIENT,
            inject: [openaiConfig.KEY],
            useFactory: (config: ConfigType<typeof openaiConfig>) =>
                new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl }),
        },
        EmbeddingService,
        GeneratorService,
    ],
    exports: [EmbeddingService, GeneratorService],
})
export class LlmModule { }
