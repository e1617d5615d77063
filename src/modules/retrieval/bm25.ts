import { ChunkMetadata } from '../milvus/types/milvus.types';

export interface Bm25Document {
    id: string;
    text: string;
    metadata: ChunkMetadata;
}

export interface Bm25Match {
    document: Bm25Document;
    score: number;
}

export interface Bm25Options {
    k1?: number;
    b?: number;
}

interface IndexedDocument {
    document: Bm25Document;
    termFrequencies: Map<string, number>;
    length: number;
}

export function tokenize(text: string): string[] {
    return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

/**
 * In-memory Okapi BM25 index over chunk texts.
 */
export class Bm25Index {
    private readonly k1: number;
    private readonly b: number;
    private readonly documents: IndexedDocument[] = [];
    private readonly ids = new Set<string>();
    private readonly documentFrequencies = new Map<string, number>();
    private totalLength = 0;

    constructor(options: Bm25Options = {}) {
        this.k1 = options.k1 ?? 1.5;
        this.b = options.b ?? 0.75;
    }

    get size(): number {
        return this.documents.length;
    }

    /**
     * Add documents; ids already indexed are ignored.
     */
    add(documents: Iterable<Bm25Document>): number {
        let added = 0;
        for (const document of documents) {
            if (this.ids.has(document.id)) {
                continue;
            }

            const tokens = tokenize(document.text);
            const termFrequencies = new Map<string, number>();
            for (const token of tokens) {
                termFrequencies.set(token, (termFrequencies.get(token) ?? 0) + 1);
            }
            for (const term of termFrequencies.keys()) {
                this.documentFrequencies.set(term, (this.documentFrequencies.get(term) ?? 0) + 1);
            }

            this.documents.push({ document, termFrequencies, length: tokens.length });
            this.ids.add(document.id);
            this.totalLength += tokens.length;
            added++;
        }
        return added;
    }

    idf(term: string): number {
        const n = this.documents.length;
        const df = this.documentFrequencies.get(term) ?? 0;
        return Math.log(1 + (n - df + 0.5) / (df + 0.5));
    }

    /**
     * Documents sharing at least one term with the query, best first. Ties
     * keep insertion order.
     */
    search(query: string, limit: number = this.documents.length): Bm25Match[] {
        const terms = [...new Set(tokenize(query))];
        if (terms.length === 0 || this.documents.length === 0) {
            return [];
        }

        const averageLength = this.totalLength / this.documents.length || 1;
        const matches: Bm25Match[] = [];

        for (const indexed of this.documents) {
            let score = 0;
            for (const term of terms) {
                const tf = indexed.termFrequencies.get(term);
                if (!tf) {
                    continue;
                }
                const norm = 1 - this.b + this.b * (indexed.length / averageLength);
                score += this.idf(term) * ((tf * (this.k1 + 1)) / (tf + this.k1 * norm));
            }
            if (score > 0) {
                matches.push({ document: indexed.document, score });
            }
        }

        return matches.sort((a, b) => b.score - a.score).slice(0, limit);
    }
}
