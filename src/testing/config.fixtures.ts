import { Provider } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import evaluationConfig from '../config/evaluation.config';
import milvusConfig from '../config/milvus.config';
import openaiConfig from '../config/openai.config';
import ragConfig from '../config/rag.config';
import rerankerConfig from '../config/reranker.config';
import unstructuredConfig from '../config/unstructured.config';

export const testConfig = {
  milvus: {
    address: 'http://localhost:19530',
    token: '',
    database: 'default',
    timeout: 1000,
    metricType: 'COSINE',
    insertBatchSize: 100,
  } satisfies ConfigType<typeof milvusConfig>,
  openai: {
    apiKey: 'test-secret',
    baseUrl: 'http://openai.test/v1',
    chatModel: 'chat-test',
    temperature: 0,
    maxTokens: 256,
    embeddingModel: 'embedding-test',
    embeddingDim: 3,
  } satisfies ConfigType<typeof openaiConfig>,
  rag: {
    chunkSize: 1000,
    chunkOverlap: 200,
    topK: 4,
    hybridCandidates: 4,
    maxContextLength: 4000,
    embeddingBatchSize: 2,
    ingestConcurrency: 2,
    downloadTimeout: 1000,
  } satisfies ConfigType<typeof ragConfig>,
  reranker: {
    baseUrl: 'http://reranker.test/v1',
    apiKey: 'test-secret',
    model: 'rerank-test',
    timeout: 1000,
  } satisfies ConfigType<typeof rerankerConfig>,
  unstructured: {
    apiUrl: 'http://unstructured.test/general/v0/general',
    apiKey: 'test-secret',
    strategy: 'fast',
    chunkingStrategy: 'by_title',
    maxCharacters: 500,
    overlap: 0,
    timeout: 1000,
  } satisfies ConfigType<typeof unstructuredConfig>,
  evaluation: {
    model: 'judge-test',
    metrics: ['faithfulness', 'answer_relevancy', 'context_precision', 'context_recall'],
  } satisfies ConfigType<typeof evaluationConfig>,
};

type TestConfig = typeof testConfig;

/**
 * Providers for every config namespace, with per-namespace overrides.
 */
export function configProviders(overrides: { [K in keyof TestConfig]?: Partial<TestConfig[K]> } = {}): Provider[] {
  return [
    { provide: milvusConfig.KEY, useValue: { ...testConfig.milvus, ...overrides.milvus } },
    { provide: openaiConfig.KEY, useValue: { ...testConfig.openai, ...overrides.openai } },
    { provide: ragConfig.KEY, useValue: { ...testConfig.rag, ...overrides.rag } },
    { provide: rerankerConfig.KEY, useValue: { ...testConfig.reranker, ...overrides.reranker } },
    { provide: unstructuredConfig.KEY, useValue: { ...testConfig.unstructured, ...overrides.unstructured } },
    { provide: evaluationConfig.KEY, useValue: { ...testConfig.evaluation, ...overrides.evaluation } },
  ];
}
