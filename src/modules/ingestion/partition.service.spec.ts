import { Test } from '@nestjs/testing';
import { PartitionError } from '../../common/errors';
import { configProviders } from '../../testing/config.fixtures';
import { PartitionService } from './partition.service';

const file = { filename: 'guide.pdf', content: Buffer.from('%PDF-1.4 test'), mimeType: 'application/pdf' };

describe('PartitionService', () => {
    let service: PartitionService;
    let fetchMock: jest.SpyInstance<Promise<Response>, Parameters<typeof fetch>>;

    beforeEach(async () => {
        const moduleRef = await Test.createTestingModule({
            providers: [PartitionService, ...configProviders()],
        }).compile();

        service = moduleRef.get(PartitionService);
        fetchMock = jest.spyOn(global, 'fetch');
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    it('should map elements and drop the ones without text', async () => {
        fetchMock.mockResolvedValue(
            new Response(
                JSON.stringify([
                    {
                        type: 'Title',
                        element_id: 'e1',
                        text: 'Guide',
                        metadata: { filename: 'guide.pdf', page_number: 1, languages: ['eng'], coordinates: { points: [] } },
                    },
                    { type: 'PageBreak', element_id: 'e2', text: '', metadata: {} },
                    { type: 'CompositeElement', element_id: 'e3', text: 'Body text', metadata: { filename: 'guide.pdf', page_number: 2 } },
                ]),
                { status: 200 },
            ),
        );

        const elements = await service.partition(file);

        expect(elements).toEqual([
            {
                type: 'Title',
                elementId: 'e1',
                text: 'Guide',
                metadata: { filename: 'guide.pdf', page_number: 1, languages: ['eng'] },
            },
            {
                type: 'CompositeElement',
                elementId: 'e3',
                text: 'Body text',
                metadata: { filename: 'guide.pdf', page_number: 2 },
            },
        ]);
    });

    it('should send the file and partitioning parameters as multipart', async () => {
        fetchMock.mockResolvedValue(new Response('[]', { status: 200 }));

        await service.partition(file, { strategy: 'hi_res' });

        const [url, init] = fetchMock.mock.calls[0];
        expect(url).toBe('http://unstructured.test/general/v0/general');
        expect(init?.headers).toMatchObject({ 'unstructured-api-key': 'test-secret' });

        const form = init?.body;
        expect(form).toBeInstanceOf(FormData);
        if (form instanceof FormData) {
            expect(form.get('strategy')).toBe('hi_res');
            expect(form.get('chunking_strategy')).toBe('by_title');
            expect(form.get('max_characters')).toBe('500');
            expect(form.get('overlap')).toBe('0');

            const uploaded = form.get('files');
            expect(typeof uploaded).toBe('object');
            if (uploaded !== null && typeof uploaded !== 'string') {
                expect(uploaded.name).toBe('guide.pdf');
                expect(uploaded.type).toBe('application/pdf');
            }
        }
    });

    it('should fail on a non-success status', async () => {
        fetchMock.mockResolvedValue(new Response('{}', { status: 422, statusText: 'Unprocessable Entity' }));

        await expect(service.partition(file)).rejects.toThrow('partitioner: HTTP 422 Unprocessable Entity');
    });

    it('should fail when the response is not a list of elements', async () => {
        fetchMock.mockResolvedValue(new Response(JSON.stringify({ detail: 'bad file' }), { status: 200 }));

        await expect(service.partition(file)).rejects.toBeInstanceOf(PartitionError);
    });
});
