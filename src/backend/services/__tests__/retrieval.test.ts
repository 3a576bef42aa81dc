/**
 * Unit tests for the retrieval helpers
 */

import {
    computeTextEmbedding,
    DEFAULT_EMBEDDING_SETTINGS,
    getSourcesContent,
    serializeForResults,
    trimEmbedding,
} from '../retrieval';
import { FakeModelClient, searchResult } from '../../__tests__/fakes';

describe('computeTextEmbedding', () => {
    it('should build a vector query over the embedding field', async () => {
        const modelClient = new FakeModelClient([], [], [0.5, 0.25]);
        const query = await computeTextEmbedding(
            modelClient,
            { ...DEFAULT_EMBEDDING_SETTINGS, model: 'text-embedding-ada-002', dimensions: 1536 },
            'refund policy'
        );

        expect(query).toEqual({ kind: 'vector', vector: [0.5, 0.25], k: 50, fields: 'embedding' });
        expect(modelClient.embeddingRequests).toEqual([
            { model: 'text-embedding-ada-002', input: 'refund policy', dimensions: undefined },
        ]);
    });

    it('should send dimensions and the deployment for models that accept them', async () => {
        const modelClient = new FakeModelClient();
        await computeTextEmbedding(
            modelClient,
            {
                ...DEFAULT_EMBEDDING_SETTINGS,
                model: 'text-embedding-3-small',
                deployment: 'emb-deployment',
                dimensions: 256,
            },
            'refund policy'
        );

        expect(modelClient.embeddingRequests).toEqual([
            { model: 'emb-deployment', input: 'refund policy', dimensions: 256 },
        ]);
    });
});

describe('getSourcesContent', () => {
    it('should prefix each result with its source page and flatten newlines', () => {
        const results = [
            searchResult({ sourcepage: 'a.pdf#page=1', content: 'line one\nline two' }),
            searchResult({ sourcepage: 'b.pdf#page=3', content: 'other\r\ntext' }),
        ];
        expect(getSourcesContent(results, false)).toEqual([
            'a.pdf#page=1: line one line two',
            'b.pdf#page=3: other  text',
        ]);
    });

    it('should use captions when enabled and present', () => {
        const results = [
            searchResult({
                sourcepage: 'a.pdf#page=1',
                captions: [{ text: 'first caption' }, { text: 'second caption' }],
            }),
            searchResult({ sourcepage: 'b.pdf#page=2', content: 'raw content', captions: [] }),
        ];
        expect(getSourcesContent(results, true)).toEqual([
            'a.pdf#page=1: first caption . second caption',
            'b.pdf#page=2: raw content',
        ]);
    });

    it('should ignore captions when disabled', () => {
        const results = [searchResult({ content: 'raw', captions: [{ text: 'caption' }] })];
        expect(getSourcesContent(results, false)).toEqual(['refunds.pdf#page=2: raw']);
    });
});

describe('trimEmbedding', () => {
    it('should shorten long embeddings', () => {
        expect(trimEmbedding([0.1, 0.2, 0.3, 0.4])).toBe('[0.1, 0.2 ...+2 more]');
    });

    it('should keep short embeddings whole', () => {
        expect(trimEmbedding([0.1, 0.2])).toBe('[0.1, 0.2]');
    });

    it('should return null for a missing embedding', () => {
        expect(trimEmbedding(undefined)).toBeNull();
        expect(trimEmbedding([])).toBeNull();
    });
});

describe('serializeForResults', () => {
    it('should expose the document fields with a trimmed embedding', () => {
        const serialized = serializeForResults(
            searchResult({ embedding: [1, 2, 3], rerankerScore: 2.5, captions: [{ text: 'cap' }] })
        );
        expect(serialized).toEqual({
            id: 'doc-1',
            content: 'Refunds are issued within 14 days.',
            embedding: '[1, 2 ...+1 more]',
            category: null,
            sourcepage: 'refunds.pdf#page=2',
            sourcefile: 'refunds.pdf',
            oids: null,
            groups: null,
            captions: [{ text: 'cap', highlights: null }],
            score: 1.5,
            reranker_score: 2.5,
        });
    });
});
