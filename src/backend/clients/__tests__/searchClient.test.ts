/**
 * Unit tests for the search client
 *
 * fetch is stubbed; no request leaves the process.
 */

import { AzureSearchClient, SearchErrorCode, SearchRequest, SearchServiceError } from '../searchClient';

function jsonResponse(body: unknown, status: number = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' },
    });
}

const baseRequest: SearchRequest = {
    top: 3,
    queryText: 'refund policy',
    filter: null,
    vectors: [],
    useTextSearch: true,
    useVectorSearch: false,
    useSemanticRanker: false,
    useSemanticCaptions: false,
    minimumSearchScore: 0,
    minimumRerankerScore: 0,
};

describe('AzureSearchClient', () => {
    let fetchSpy: jest.SpyInstance<ReturnType<typeof fetch>, Parameters<typeof fetch>>;
    let client: AzureSearchClient;

    beforeEach(() => {
        fetchSpy = jest.spyOn(global, 'fetch');
        client = new AzureSearchClient({
            endpoint: 'https://search.example.test/',
            index: 'docs',
            apiKey: 'test-key',
            queryLanguage: 'en-us',
            querySpeller: 'lexicon',
        });
    });

    afterEach(() => {
        fetchSpy.mockRestore();
    });

    describe('buildRequestBody', () => {
        it('should send a plain text query', () => {
            expect(client.buildRequestBody(baseRequest)).toEqual({ search: 'refund policy', top: 3 });
        });

        it('should send an empty search string when text search is off', () => {
            const vector = { kind: 'vector' as const, vector: [0.1], k: 50, fields: 'embedding' };
            expect(
                client.buildRequestBody({
                    ...baseRequest,
                    useTextSearch: false,
                    useVectorSearch: true,
                    vectors: [vector],
                })
            ).toEqual({ search: '', top: 3, vectorQueries: [vector] });
        });

        it('should add semantic options and the filter', () => {
            expect(
                client.buildRequestBody({
                    ...baseRequest,
                    filter: "category ne 'archive'",
                    useSemanticRanker: true,
                    useSemanticCaptions: true,
                })
            ).toEqual({
                search: 'refund policy',
                top: 3,
                filter: "category ne 'archive'",
                queryType: 'semantic',
                semanticConfiguration: 'default',
                semanticQuery: 'refund policy',
                captions: 'extractive|highlight-false',
                queryLanguage: 'en-us',
                speller: 'lexicon',
            });
        });
    });

    describe('search', () => {
        it('should post to the index and map documents', async () => {
            fetchSpy.mockResolvedValue(
                jsonResponse({
                    value: [
                        {
                            id: 'doc-1',
                            content: 'Refunds take 14 days.',
                            sourcepage: 'refunds.pdf#page=2',
                            sourcefile: 'refunds.pdf',
                            category: null,
                            '@search.score': 2.1,
                            '@search.rerankerScore': 3.2,
                            '@search.captions': [{ text: 'Refunds take 14 days.', highlights: '' }],
                        },
                    ],
                })
            );

            const results = await client.search(baseRequest);

            expect(results).toEqual([
                {
                    id: 'doc-1',
                    content: 'Refunds take 14 days.',
                    sourcepage: 'refunds.pdf#page=2',
                    sourcefile: 'refunds.pdf',
                    category: null,
                    embedding: undefined,
                    oids: undefined,
                    groups: undefined,
                    captions: [{ text: 'Refunds take 14 days.', highlights: '' }],
                    score: 2.1,
                    rerankerScore: 3.2,
                },
            ]);

            const [url, init] = fetchSpy.mock.calls[0] ?? [];
            expect(url).toBe('https://search.example.test/indexes/docs/docs/search?api-version=2024-07-01');
            expect(init?.method).toBe('POST');
            expect(init?.headers).toEqual({ 'Content-Type': 'application/json', 'api-key': 'test-key' });
        });

        it('should drop documents under the score thresholds', async () => {
            fetchSpy.mockResolvedValue(
                jsonResponse({
                    value: [
                        { id: 'low', content: 'a', '@search.score': 0.5, '@search.rerankerScore': 3 },
                        { id: 'high', content: 'b', '@search.score': 2, '@search.rerankerScore': 3 },
                        { id: 'unranked', content: 'c', '@search.score': 2 },
                    ],
                })
            );

            const results = await client.search({ ...baseRequest, minimumSearchScore: 1, minimumRerankerScore: 1 });

            expect(results.map((result) => result.id)).toEqual(['high']);
        });

        it('should read custom content and source page fields', async () => {
            const custom = new AzureSearchClient({
                endpoint: 'https://search.example.test',
                index: 'docs',
                contentField: 'chunk',
                sourcepageField: 'page',
            });
            fetchSpy.mockResolvedValue(jsonResponse({ value: [{ id: 1, chunk: 'text', page: 'p1' }] }));

            const [result] = await custom.search(baseRequest);

            expect(result).toMatchObject({ id: '1', content: 'text', sourcepage: 'p1' });
        });

        it('should raise API_ERROR with the service message', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({ error: { message: 'Invalid filter' } }, 400));

            await expect(client.search(baseRequest)).rejects.toMatchObject({
                name: 'SearchServiceError',
                code: SearchErrorCode.API_ERROR,
                status: 400,
                message: 'Search service error: Invalid filter',
            });
        });

        it('should raise INVALID_RESPONSE for an unexpected body', async () => {
            fetchSpy.mockResolvedValue(jsonResponse({ results: [] }));

            await expect(client.search(baseRequest)).rejects.toMatchObject({
                code: SearchErrorCode.INVALID_RESPONSE,
            });
        });

        it('should raise CONNECTION_REFUSED when fetch fails', async () => {
            fetchSpy.mockRejectedValue(new TypeError('fetch failed'));

            const error = await client.search(baseRequest).catch((caught: unknown) => caught);

            expect(error).toBeInstanceOf(SearchServiceError);
            expect(error).toMatchObject({ code: SearchErrorCode.CONNECTION_REFUSED });
        });
    });
});
