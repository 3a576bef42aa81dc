/**
 * Search Client
 *
 * Wrapper for the Azure AI Search REST API, the retrieval service behind
 * the chat approaches. One endpoint is used:
 * - POST /indexes/{index}/docs/search - text, vector and hybrid queries,
 *   optionally re-ranked by the semantic ranker
 *
 * We use fetch() directly: the request body is small and the response is
 * validated with zod before anything downstream reads it.
 */

import { z } from 'zod';
import { SearchCaption, SearchResult, VectorQuery } from '../../shared/types';
import { createLogger } from '../logger';

const log = createLogger('search-client');

/**
 * Configuration for the search client.
 */
export interface SearchClientConfig {
    /** Service endpoint, e.g. https://<service>.search.windows.net */
    endpoint: string;
    index: string;
    /** Admin or query key, sent as the api-key header */
    apiKey?: string;
    apiVersion: string;
    /** Language for semantic queries (e.g. en-us) */
    queryLanguage?: string;
    /** Spell correction for semantic queries (e.g. lexicon) */
    querySpeller?: string;
    /** Index field holding the passage text */
    contentField: string;
    /** Index field naming the source page */
    sourcepageField: string;
    /** Semantic configuration defined on the index */
    semanticConfiguration: string;
    timeoutMs: number;
}

export const DEFAULT_SEARCH_CLIENT_CONFIG: Omit<SearchClientConfig, 'endpoint' | 'index'> = {
    apiVersion: '2024-07-01',
    contentField: 'content',
    sourcepageField: 'sourcepage',
    semanticConfiguration: 'default',
    timeoutMs: 30000,
};

export enum SearchErrorCode {
    /** Search service unreachable */
    CONNECTION_REFUSED = 'CONNECTION_REFUSED',
    TIMEOUT = 'TIMEOUT',
    /** Service returned a non-2xx status */
    API_ERROR = 'API_ERROR',
    /** Body did not have the documented shape */
    INVALID_RESPONSE = 'INVALID_RESPONSE',
    UNKNOWN = 'UNKNOWN',
}

export class SearchServiceError extends Error {
    constructor(
        message: string,
        public readonly code: SearchErrorCode,
        public readonly status?: number,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'SearchServiceError';
    }
}

/**
 * Everything one retrieval needs.
 */
export interface SearchRequest {
    top: number;
    queryText: string;
    filter: string | null;
    vectors: VectorQuery[];
    useTextSearch: boolean;
    useVectorSearch: boolean;
    useSemanticRanker: boolean;
    useSemanticCaptions: boolean;
    minimumSearchScore: number;
    minimumRerankerScore: number;
}

/**
 * Interface defining the retrieval service contract.
 */
export interface ISearchClient {
    search(request: SearchRequest): Promise<SearchResult[]>;
}

const captionSchema = z.object({
    text: z.string().nullish(),
    highlights: z.string().nullish(),
});

const documentSchema = z
    .object({
        id: z.union([z.string(), z.number()]).optional(),
        category: z.string().nullish(),
        sourcefile: z.string().nullish(),
        embedding: z.array(z.number()).nullish(),
        oids: z.array(z.string()).nullish(),
        groups: z.array(z.string()).nullish(),
        '@search.score': z.number().nullish(),
        '@search.rerankerScore': z.number().nullish(),
        '@search.captions': z.array(captionSchema).nullish(),
    })
    .passthrough();

const searchResponseSchema = z.object({
    value: z.array(documentSchema),
});

type SearchDocument = z.infer<typeof documentSchema>;

function stringField(document: SearchDocument, field: string): string | undefined {
    const value: unknown = document[field];
    return typeof value === 'string' ? value : undefined;
}

export class AzureSearchClient implements ISearchClient {
    private readonly config: SearchClientConfig;

    constructor(config: Pick<SearchClientConfig, 'endpoint' | 'index'> & Partial<SearchClientConfig>) {
        this.config = { ...DEFAULT_SEARCH_CLIENT_CONFIG, ...config };
    }

    /**
     * Runs one search and drops documents under the score thresholds.
     *
     * Text search is disabled by sending an empty search string, vector
     * search by sending no vector queries. With the semantic ranker on, the
     * query is also sent as the semantic query and captions are requested
     * when asked for.
     */
    async search(request: SearchRequest): Promise<SearchResult[]> {
        const url =
            `${this.config.endpoint.replace(/\/+$/, '')}/indexes/${encodeURIComponent(this.config.index)}` +
            `/docs/search?api-version=${encodeURIComponent(this.config.apiVersion)}`;

        const body = this.buildRequestBody(request);
        log.debug(`search index=${this.config.index} top=${request.top} semantic=${request.useSemanticRanker}`);

        let payload: unknown;
        try {
            const response = await this.fetchWithTimeout(url, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/json',
                    ...(this.config.apiKey ? { 'api-key': this.config.apiKey } : {}),
                },
                body: JSON.stringify(body),
            });

            if (!response.ok) {
                await this.handleErrorResponse(response);
            }

            payload = await response.json();
        } catch (error) {
            throw this.wrapError(error, 'Search request failed');
        }

        const parsed = searchResponseSchema.safeParse(payload);
        if (!parsed.success) {
            throw new SearchServiceError(
                `Unexpected search response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
                SearchErrorCode.INVALID_RESPONSE
            );
        }

        const documents = parsed.data.value.map((document) => this.toSearchResult(document));

        return documents.filter(
            (doc) =>
                (doc.score ?? 0) >= request.minimumSearchScore &&
                (doc.rerankerScore ?? 0) >= request.minimumRerankerScore
        );
    }

    /**
     * Request body for the docs/search endpoint.
     */
    buildRequestBody(request: SearchRequest): Record<string, unknown> {
        const body: Record<string, unknown> = {
            search: request.useTextSearch ? request.queryText : '',
            top: request.top,
        };

        if (request.filter) {
            body.filter = request.filter;
        }

        if (request.useVectorSearch && request.vectors.length > 0) {
            body.vectorQueries = request.vectors;
        }

        if (request.useSemanticRanker) {
            body.queryType = 'semantic';
            body.semanticConfiguration = this.config.semanticConfiguration;
            body.semanticQuery = request.queryText;
            if (request.useSemanticCaptions) {
                body.captions = 'extractive|highlight-false';
            }
            if (this.config.queryLanguage) {
                body.queryLanguage = this.config.queryLanguage;
            }
            if (this.config.querySpeller) {
                body.speller = this.config.querySpeller;
            }
        }

        return body;
    }

    private toSearchResult(document: SearchDocument): SearchResult {
        const captions: SearchCaption[] = (document['@search.captions'] ?? []).map((caption) => ({
            text: caption.text ?? '',
            highlights: caption.highlights ?? null,
        }));

        return {
            id: document.id === undefined ? '' : String(document.id),
            content: stringField(document, this.config.contentField) ?? '',
            sourcepage: stringField(document, this.config.sourcepageField),
            sourcefile: document.sourcefile ?? undefined,
            category: document.category ?? null,
            embedding: document.embedding ?? undefined,
            oids: document.oids ?? undefined,
            groups: document.groups ?? undefined,
            captions,
            score: document['@search.score'] ?? undefined,
            rerankerScore: document['@search.rerankerScore'] ?? undefined,
        };
    }

    private async fetchWithTimeout(url: string, options: RequestInit): Promise<Response> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.config.timeoutMs);

        try {
            return await fetch(url, { ...options, signal: controller.signal });
        } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
                throw new SearchServiceError(
                    `Search request timed out after ${this.config.timeoutMs}ms`,
                    SearchErrorCode.TIMEOUT
                );
            }
            throw error;
        } finally {
            clearTimeout(timeoutId);
        }
    }

    private async handleErrorResponse(response: Response): Promise<never> {
        let detail: string;
        try {
            const errorBody: unknown = await response.json();
            const parsed = z.object({ error: z.object({ message: z.string() }) }).safeParse(errorBody);
            detail = parsed.success ? parsed.data.error.message : `HTTP ${response.status}`;
        } catch {
            detail = `HTTP ${response.status}: ${response.statusText}`;
        }

        throw new SearchServiceError(
            `Search service error: ${detail}`,
            SearchErrorCode.API_ERROR,
            response.status
        );
    }

    private wrapError(error: unknown, context: string): SearchServiceError {
        if (error instanceof SearchServiceError) {
            return error;
        }

        if (error instanceof TypeError && error.message.includes('fetch')) {
            return new SearchServiceError(
                `Cannot connect to the search service at ${this.config.endpoint}`,
                SearchErrorCode.CONNECTION_REFUSED,
                undefined,
                error
            );
        }

        const message = error instanceof Error ? error.message : String(error);
        return new SearchServiceError(
            `${context}: ${message}`,
            SearchErrorCode.UNKNOWN,
            undefined,
            error instanceof Error ? error : undefined
        );
    }
}

export function createSearchClient(
    config: Pick<SearchClientConfig, 'endpoint' | 'index'> & Partial<SearchClientConfig>
): AzureSearchClient {
    return new AzureSearchClient(config);
}
