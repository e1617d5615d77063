import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { z } from 'zod';
import rerankerConfig from '../../config/reranker.config';
import { RerankerError, errorMessage } from '../../common/errors';
import { RetrievedChunk } from './retrieval.types';

const rerankResponseSchema = z.object({
    results: z.array(
        z.object({
            index: z.number().int(),
            relevance_score: z.number(),
        }),
    ),
});

/**
 * Reranker Service - cross-encoder reranking through a hosted `/rerank` API.
 * There is no local fallback: any failure of the service is an error.
 */
@Injectable()
export class RerankerService {
    private readonly logger = new Logger(RerankerService.name);

    constructor(@Inject(rerankerConfig.KEY) private readonly config: ConfigType<typeof rerankerConfig>) { }

    /**
     * Reorder `candidates` by relevance to `query` and keep the best `topN`.
     * The result only ever contains input candidates, each at most once, with
     * `score` replaced by the reranker's relevance score.
     */
    async rerank(query: string, candidates: RetrievedChunk[], topN: number): Promise<RetrievedChunk[]> {
        if (candidates.length === 0 || topN < 1) {
            return [];
        }

        const limit = Math.min(topN, candidates.length);
        const startTime = Date.now();
        this.logger.debug(`🔄 Reranking ${candidates.length} candidates with ${this.config.model}`);

        const payload = await this.request({
            model: this.config.model,
            query,
            documents: candidates.map((candidate) => candidate.text),
            top_n: limit,
        });

        const parsed = rerankResponseSchema.safeParse(payload);
        if (!parsed.success) {
            throw new RerankerError(`malformed response: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
        }

        const seen = new Set<number>();
        const reranked: RetrievedChunk[] = [];
        for (const result of parsed.data.results) {
            if (result.index < 0 || result.index >= candidates.length) {
                throw new RerankerError(`result index ${result.index} is outside 0..${candidates.length - 1}`);
            }
            if (seen.has(result.index)) {
                throw new RerankerError(`result index ${result.index} returned twice`);
            }
            seen.add(result.index);
            reranked.push({ ...candidates[result.index], score: result.relevance_score });
        }

        const top = reranked.sort((a, b) => b.score - a.score).slice(0, limit);
        this.logger.debug(`✅ Reranked to ${top.length} results in ${Date.now() - startTime}ms`);
        return top;
    }

    private async request(body: Record<string, unknown>): Promise<unknown> {
        let response: Response;
        try {
            response = await fetch(`${this.config.baseUrl}/rerank`, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    Accept: 'application/json',
                    Authorization: `Bearer ${this.config.apiKey}`,
                },
                body: JSON.stringify(body),
                signal: AbortSignal.timeout(this.config.timeout),
            });
        } catch (error) {
            this.logger.error(`❌ Reranker unreachable: ${errorMessage(error)}`);
            throw new RerankerError(`request failed: ${errorMessage(error)}`, error);
        }

        if (!response.ok) {
            throw new RerankerError(`HTTP ${response.status} ${response.statusText}`);
        }

        try {
            return await response.json();
        } catch (error) {
            throw new RerankerError('response body is not JSON', error);
        }
    }
}
