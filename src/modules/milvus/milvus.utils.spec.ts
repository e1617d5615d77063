import { BadRequestException } from '@nestjs/common';
import {
    batchArray,
    buildFilterExpression,
    buildIdInExpression,
    matchesFilter,
    normalizeSearchRows,
    parseMetadata,
    parseSearchHit,
    toRelevance,
    validateCollectionName,
} from './milvus.utils';

describe('milvus utils', () => {
    describe('buildFilterExpression', () => {
        it('should build an equality clause on the JSON metadata field', () => {
            expect(buildFilterExpression({ version: '2.2' })).toBe('metadata["version"] == "2.2"');
        });

        it('should join several keys with and', () => {
            expect(buildFilterExpression({ version: '2.3', page: 4, draft: false })).toBe(
                'metadata["version"] == "2.3" and metadata["page"] == 4 and metadata["draft"] == false',
            );
        });

        it('should escape quotes in values', () => {
            expect(buildFilterExpression({ title: 'say "hi"' })).toBe('metadata["title"] == "say \\"hi\\""');
        });

        it('should return undefined for a missing or empty filter', () => {
            expect(buildFilterExpression()).toBeUndefined();
            expect(buildFilterExpression({})).toBeUndefined();
        });

        it('should reject keys that are not identifiers', () => {
            expect(() => buildFilterExpression({ 'version"] == "x" or metadata["a': '1' })).toThrow(BadRequestException);
        });
    });

    it('should build an id membership expression', () => {
        expect(buildIdInExpression(['a', 'b'])).toBe('id in ["a","b"]');
    });

    describe('matchesFilter', () => {
        it('should require every key to match exactly', () => {
            expect(matchesFilter({ version: '2.2', page: 1 }, { version: '2.2' })).toBe(true);
            expect(matchesFilter({ version: '2.3' }, { version: '2.2' })).toBe(false);
            expect(matchesFilter({}, { version: '2.2' })).toBe(false);
            expect(matchesFilter({ version: '2.3' })).toBe(true);
        });
    });

    it('should split arrays into batches', () => {
        expect(batchArray([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
        expect(() => batchArray([1], 0)).toThrow('Batch size must be positive, got 0');
    });

    it('should validate collection names', () => {
        expect(() => validateCollectionName('versioned_docs')).not.toThrow();
        expect(() => validateCollectionName('')).toThrow('Collection name cannot be empty');
        expect(() => validateCollectionName('9lives')).toThrow(BadRequestException);
        expect(() => validateCollectionName('has-dash')).toThrow(BadRequestException);
    });

    describe('parseMetadata', () => {
        it('should parse serialized JSON and drop nested objects', () => {
            expect(parseMetadata('{"version":"2.2","tags":["a","b"],"coords":{"x":1},"note":null}')).toEqual({
                version: '2.2',
                tags: ['a', 'b'],
                note: null,
            });
        });

        it('should return an empty object for non-object values', () => {
            expect(parseMetadata(42)).toEqual({});
            expect(parseMetadata(['a'])).toEqual({});
        });

        it('should keep a string that is not JSON under raw', () => {
            expect(parseMetadata('version=2.2')).toEqual({ raw: 'version=2.2' });
        });
    });

    it('should unwrap the per-vector result list', () => {
        expect(normalizeSearchRows([[{ id: 'a' }], [{ id: 'b' }]])).toEqual([{ id: 'a' }]);
        expect(normalizeSearchRows([{ id: 'a' }])).toEqual([{ id: 'a' }]);
        expect(normalizeSearchRows(undefined)).toEqual([]);
    });

    describe('scores', () => {
        it('should turn L2 distances into relevance', () => {
            expect(toRelevance(0, 'L2')).toBe(1);
            expect(toRelevance(1, 'L2')).toBe(0.5);
            expect(toRelevance(0.8, 'COSINE')).toBe(0.8);
        });

        it('should keep the raw value as distance on a parsed hit', () => {
            expect(parseSearchHit({ id: 7, text: 'chunk', metadata: { version: '2.2' }, score: 3 }, 'L2')).toEqual({
                id: '7',
                text: 'chunk',
                metadata: { version: '2.2' },
                distance: 3,
                score: 0.25,
            });
        });
    });
});
