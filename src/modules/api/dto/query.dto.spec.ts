import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { EvaluateDto, SearchDto } from './query.dto';

async function errorsOf<T extends object>(cls: new () => T, plain: object): Promise<string[]> {
  const errors = await validate(plainToInstance(cls, plain));
  return errors.map((error) => error.property);
}

describe('query DTOs', () => {
  it('should accept a filtered hybrid search', async () => {
    await expect(
      errorsOf(SearchDto, { collection: 'docs', question: 'What is new?', mode: 'hybrid', topK: 4, filter: { version: '2.2' } }),
    ).resolves.toEqual([]);
  });

  it('should reject unknown modes and nested filter values', async () => {
    await expect(
      errorsOf(SearchDto, { collection: 'docs', question: 'What is new?', mode: 'sparse', filter: { version: { $ne: '2.2' } } }),
    ).resolves.toEqual(['mode', 'filter']);
  });

  it('should reject filter keys that are not identifiers', async () => {
    await expect(
      errorsOf(SearchDto, { collection: 'docs', question: 'q', filter: { 'a"] or 1 == 1': 'x' } }),
    ).resolves.toEqual(['filter']);
  });

  it('should reject unknown evaluation metrics', async () => {
    await expect(
      errorsOf(EvaluateDto, { collection: 'docs', questions: ['q'], groundTruths: ['a'], metrics: ['bleu'] }),
    ).resolves.toEqual(['metrics']);
  });
});
