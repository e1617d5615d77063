import { Test } from '@nestjs/testing';
import { RerankerError } from '../../common/errors';
import { configProviders } from '../../testing/config.fixtures';
import { RerankerService } from './reranker.service';
import { RetrievedChunk } from './retrieval.types';

const candidates: RetrievedChunk[] = [
    { id: 'a', text: 'alpha', score: 0.1, metadata: { version: '2.2' } },
    { id: 'b', text: 'beta', score: 0.2, metadata: { version: '2.2' } },
    { id: 'c', text: 'gamma', score: 0.3, metadata: { version: '2.3' } },
];

function jsonResponse(body: unknown, init: ResponseInit = { status: 200 }): Response {
    return new Response(JSON.stringify(body), { ...init, headers: { 'Content-Type': 'application/json' } });
}

describe('RerankerService', () => {
    let service: RerankerService;
    let fetchMock: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>;

    beforeEach(async () => {
        const moduleRef = await Test.createTestingModule({
            providers: [RerankerService, ...configProviders()],
        }).compile();

        service = moduleRef.get(RerankerService);
        fetchMock = jest.spyOn(global, 'fetch');
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should reorder candidates by relevance and keep the top N', async () => {
        fetchMock.mockResolvedValue(
            jsonResponse({
                results: [
                    { index: 0, relevance_score: 0.5 },
                    { index: 2, relevance_score: 0.9 },
                ],
            }),
        );

        const results = await service.rerank('which letter?', candidates, 2);

        expect(results).toEqual([
            { id: 'c', text: 'gamma', score: 0.9, metadata: { version: '2.3' } },
            { id: 'a', text: 'alpha', score: 0.5, metadata: { version: '2.2' } },
        ]);
    });

    it('should post the query and documents to the rerank endpoint', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ results: [{ index: 1, relevance_score: 0.7 }] }));

        await service.rerank('which letter?', candidates, 1);

        expect(fetchMock).toHaveBeenCalledTimes(1);
        const [url, init] = fetchMock.mock.calls[0];
        expect(url).toBe('http://reranker.test/v1/rerank');
        expect(init?.method).toBe('POST');
        expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
        expect(JSON.parse(String(init?.body))).toEqual({
            model: 'rerank-test',
            query: 'which letter?',
            documents: ['alpha', 'beta', 'gamma'],
            top_n: 1,
        });
    });

    it('should truncate when the service returns more than requested', async () => {
        fetchMock.mockResolvedValue(
            jsonResponse({
                results: [
                    { index: 1, relevance_score: 0.8 },
                    { index: 0, relevance_score: 0.6 },
                    { index: 2, relevance_score: 0.4 },
                ],
            }),
        );

        const results = await service.rerank('which letter?', candidates, 2);

        expect(results.map((result) => result.id)).toEqual(['b', 'a']);
    });

    it('should return nothing without calling the service for no candidates', async () => {
        await expect(service.rerank('which letter?', [], 3)).resolves.toEqual([]);
        expect(fetchMock).not.toHaveBeenCalled();
    });

    it('should fail on a malformed response', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ data: [] }));

        await expect(service.rerank('which letter?', candidates, 2)).rejects.toBeInstanceOf(RerankerError);
    });

    it('should fail on an index outside the candidate list', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ results: [{ index: 3, relevance_score: 0.9 }] }));

        await expect(service.rerank('which letter?', candidates, 2)).rejects.toThrow(
            'reranker: result index 3 is outside 0..2',
        );
    });

    it('should fail on a repeated index', async () => {
        fetchMock.mockResolvedValue(
            jsonResponse({
                results: [
                    { index: 1, relevance_score: 0.9 },
                    { index: 1, relevance_score: 0.8 },
                ],
            }),
        );

        await expect(service.rerank('which letter?', candidates, 2)).rejects.toThrow(
            'reranker: result index 1 returned twice',
        );
    });

    it('should fail on a non-success status', async () => {
        fetchMock.mockResolvedValue(new Response('overloaded', { status: 503, statusText: 'Service Unavailable' }));

        await expect(service.rerank('which letter?', candidates, 2)).rejects.toThrow(
            'reranker: HTTP 503 Service Unavailable',
        );
    });

    it('should fail when the service is unreachable', async () => {
        fetchMock.mockRejectedValue(new TypeError('fetch failed'));

        const error = await service.rerank('which letter?', candidates, 2).catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(RerankerError);
        expect(error).toMatchObject({ message: 'reranker: request failed: fetch failed' });
    });
});
