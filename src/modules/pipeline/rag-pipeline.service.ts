import { Injectable, Logger } from '@nestjs/common';
import { EvaluationInputError, errorMessage } from '../../common/errors';
import { EvaluationService } from '../evaluation/evaluation.service';
import { GeneratorService } from '../llm/generator.service';
import { RetrievalService } from '../retrieval/retrieval.service';
import {
    AskRequest,
    AskResponse,
    EvaluateRequest,
    EvaluateResponse,
    SearchRequest,
    SearchResponse,
} from './pipeline.types';

/**
 * RAG Pipeline Service - retrieve, generate, evaluate
 */
@Injectable()
export class RagPipelineService {
    private readonly logger = new Logger(RagPipelineService.name);

    constructor(
        private readonly retrievalService: RetrievalService,
        private readonly generatorService: GeneratorService,
        private readonly evaluationService: EvaluationService,
    ) { }

    /**
     * Retrieval only
     */
    async search(request: SearchRequest): Promise<SearchResponse> {
        const mode = request.mode ?? 'dense';
        const startTime = Date.now();

        const sources = await this.retrievalService.retrieve(mode, request.collection, {
            query: request.question,
            topK: request.topK,
            filter: request.filter,
            predicate: request.predicate,
        });

        return { question: request.question, mode, sources, retrievalTime: Date.now() - startTime };
    }

    /**
     * Query RAG pipeline
     */
    async ask(request: AskRequest): Promise<AskResponse> {
        try {
            const startTime = Date.now();
            this.logger.log(`🔍 RAG Query: "${request.question}"`);
            this.logger.log(`📚 Collection: ${request.collection}, mode: ${request.mode ?? 'dense'}`);

            const { mode, sources, retrievalTime } = await this.search(request);

            const generationStart = Date.now();
            const answer = await this.generatorService.generate(
                request.question,
                sources.map((source) => source.text),
            );
            const generationTime = Date.now() - generationStart;
            this.logger.log(`✅ Generated response in ${generationTime}ms`);

            return {
                question: request.question,
                answer,
                mode,
                sources,
                metadata: {
                    retrievalTime,
                    generationTime,
                    totalTime: Date.now() - startTime,
                    modelUsed: this.generatorService.model,
                },
            };
        } catch (error) {
            this.logger.error(`❌ RAG query failed: ${errorMessage(error)}`);
            throw error;
        }
    }

    /**
     * Answer each question in turn, then score the answers against the
     * ground truths.
     */
    async evaluate(request: EvaluateRequest): Promise<EvaluateResponse> {
        if (request.questions.length !== request.groundTruths.length) {
            throw new EvaluationInputError(
                `questions (${request.questions.length}) and groundTruths (${request.groundTruths.length}) differ in length`,
            );
        }
        const mode = request.mode ?? 'dense';

        const answers: string[] = [];
        const contexts: string[][] = [];
        for (const question of request.questions) {
            const response = await this.ask({
                collection: request.collection,
                question,
                mode,
                topK: request.topK,
                filter: request.filter,
            });
            answers.push(response.answer);
            contexts.push(response.sources.map((source) => source.text));
        }

        const report = await this.evaluationService.evaluate(
            { questions: request.questions, contexts, answers, groundTruths: request.groundTruths },
            request.metrics,
        );
        return { ...report, mode, answers };
    }
}
