import { Test } from '@nestjs/testing';
import { configProviders } from '../../testing/config.fixtures';
import { GeneratorService } from './generator.service';
import { OPENAI_CLIENT } from './llm.constants';
import { RAG_SYSTEM_PROMPT } from './prompts';

function completion(content: string | null) {
    return { choices: [{ message: { content } }], usage: { total_tokens: 12 } };
}

describe('GeneratorService', () => {
    let service: GeneratorService;
    let create: jest.Mock;

    async function createService(maxContextLength = 4000): Promise<GeneratorService> {
        const moduleRef = await Test.createTestingModule({
            providers: [
                GeneratorService,
                { provide: OPENAI_CLIENT, useValue: { chat: { completions: { create } } } },
                ...configProviders({ rag: { maxContextLength } }),
            ],
        }).compile();
        return moduleRef.get(GeneratorService);
    }

    beforeEach(async () => {
        create = jest.fn().mockResolvedValue(completion('  Dynamic fields arrived in 2.3.  '));
        service = await createService();
    });

    it('should fill the fixed context and question template', () => {
        expect(service.buildPrompt('What changed?', ['first context', 'second context'])).toBe(
            'Context:\nfirst context\n\n---\n\nsecond context\n\nQuestion: What changed?\n\nAnswer:',
        );
    });

    it('should stop adding contexts once the length budget is reached', async () => {
        service = await createService(10);

        expect(service.selectContexts(['12345678', 'abcdef', 'x'])).toEqual(['12345678']);
        expect(service.selectContexts(['a context longer than the budget', 'x'])).toEqual([
            'a context longer than the budget',
        ]);
    });

    it('should answer with the configured model and temperature', async () => {
        const answer = await service.generate('What changed?', ['first context']);

        expect(answer).toBe('Dynamic fields arrived in 2.3.');
        expect(create).toHaveBeenCalledWith({
            model: 'chat-test',
            temperature: 0,
            max_tokens: 256,
            messages: [
                { role: 'system', content: RAG_SYSTEM_PROMPT },
                { role: 'user', content: 'Context:\nfirst context\n\nQuestion: What changed?\n\nAnswer:' },
            ],
        });
    });

    it('should request a JSON object when asked to', async () => {
        await service.complete([{ role: 'user', content: 'score this' }], { json: true, model: 'judge-test' });

        expect(create).toHaveBeenCalledWith(
            expect.objectContaining({ model: 'judge-test', response_format: { type: 'json_object' } }),
        );
    });

    it('should fall back to the question when the hypothetical document is empty', async () => {
        create.mockResolvedValue(completion(null));

        await expect(service.generateHypotheticalDocument('What changed?')).resolves.toBe('What changed?');
        expect(create).toHaveBeenCalledWith(expect.objectContaining({ max_tokens: 300 }));
    });

    it('should propagate completion failures', async () => {
        create.mockRejectedValue(new Error('rate limited'));

        await expect(service.generate('What changed?', [])).rejects.toThrow('rate limited');
    });
});
