import { EvaluationMetric } from '../../config/evaluation.config';
import { EvaluationReport } from '../evaluation/evaluation.types';
import { MetadataFilter } from '../milvus/types/milvus.types';
import { MetadataPredicate, RetrievalMode, RetrievedChunk } from '../retrieval/retrieval.types';

export interface SearchRequest {
    collection: string;
    question: string;
    mode?: RetrievalMode;
    topK?: number;
    filter?: MetadataFilter;
    predicate?: MetadataPredicate;
}

export type AskRequest = SearchRequest;

export interface SearchResponse {
    question: string;
    mode: RetrievalMode;
    sources: RetrievedChunk[];
    retrievalTime: number;
}

export interface AskResponse {
    question: string;
    answer: string;
    mode: RetrievalMode;
    sources: RetrievedChunk[];
    metadata: {
        retrievalTime: number;
        generationTime: number;
        totalTime: number;
        modelUsed: string;
    };
}

export interface EvaluateRequest {
    collection: string;
    questions: string[];
    groundTruths: string[];
    mode?: RetrievalMode;
    topK?: number;
    filter?: MetadataFilter;
    metrics?: EvaluationMetric[];
}

export interface EvaluateResponse extends EvaluationReport {
    mode: RetrievalMode;
    answers: string[];
}
