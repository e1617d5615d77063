import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import OpenAI from 'openai';
import openaiConfig from '../../config/openai.config';
import ragConfig from '../../config/rag.config';
import { errorMessage } from '../../common/errors';
import { OPENAI_CLIENT } from './llm.constants';
import { ChatMessage, CompletionOptions } from './llm.types';
import {
    CONTEXT_SEPARATOR,
    HYDE_SYSTEM_PROMPT,
    RAG_SYSTEM_PROMPT,
    buildRagUserPrompt,
} from './prompts';

/**
 * Generator Service - prompt assembly and chat completions
 */
@Injectable()
export class GeneratorService {
    private readonly logger = new Logger(GeneratorService.name);

    constructor(
        @Inject(OPENAI_CLIENT) private readonly client: OpenAI,
        @Inject(openaiConfig.KEY) private readonly config: ConfigType<typeof openaiConfig>,
        @Inject(ragConfig.KEY) private readonly rag: ConfigType<typeof ragConfig>,
    ) { }

    get model(): string {
        return this.config.chatModel;
    }

    /**
     * Keep contexts in order until the next one would overflow the context
     * budget. The first context is always kept.
     */
    selectContexts(contexts: string[]): string[] {
        const selected: string[] = [];
        let totalLength = 0;

        for (const context of contexts) {
            if (totalLength + context.length > this.rag.maxContextLength && selected.length > 0) {
                this.logger.debug(`⚠️ Context length limit reached (${totalLength} chars)`);
                break;
            }
            selected.push(context);
            totalLength += context.length;
        }

        return selected;
    }

    buildPrompt(question: string, contexts: string[]): string {
        return buildRagUserPrompt(question, this.selectContexts(contexts).join(CONTEXT_SEPARATOR));
    }

    /**
     * Answer a question from retrieved contexts with the fixed model and
     * temperature.
     */
    async generate(question: string, contexts: string[]): Promise<string> {
        this.logger.debug(`🔍 Generating answer for: "${question}" (${contexts.length} contexts)`);

        const answer = await this.complete([
            { role: 'system', content: RAG_SYSTEM_PROMPT },
            { role: 'user', content: this.buildPrompt(question, contexts) },
        ]);
        return answer.trim();
    }

    /**
     * HyDE: write the passage a matching document would contain, to be used as
     * the search key instead of the question.
     */
    async generateHypotheticalDocument(question: string): Promise<string> {
        const passage = await this.complete(
            [
                { role: 'system', content: HYDE_SYSTEM_PROMPT },
                { role: 'user', content: question },
            ],
            { maxTokens: 300 },
        );

        const trimmed = passage.trim();
        this.logger.debug(`📝 Hypothetical document: "${trimmed.substring(0, 80)}..."`);
        return trimmed.length > 0 ? trimmed : question;
    }

    /**
     * Generate chat response
     */
    async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
        try {
            const response = await this.client.chat.completions.create({
                model: options.model ?? this.config.chatModel,
                messages,
                temperature: options.temperature ?? this.config.temperature,
                max_tokens: options.maxTokens ?? this.config.maxTokens,
                ...(options.json ? { response_format: { type: 'json_object' as const } } : {}),
            });

            const content = response.choices[0]?.message.content ?? '';
            this.logger.debug(`📊 Tokens used: ${response.usage?.total_tokens ?? 0}`);
            return content;
        } catch (error) {
            this.logger.error(`❌ Failed to generate chat response: ${errorMessage(error)}`);
            throw error;
        }
    }
}
