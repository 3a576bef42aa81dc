/**
 * External service clients
 *
 * Wrappers for external service communication:
 * - OpenAIModelClient: Chat completions and embeddings (OpenAI or Azure OpenAI)
 * - AzureSearchClient: Text, vector and hybrid retrieval over a search index
 */

export {
    OpenAIModelClient,
    createModelClient,
    toChatCompletionMessage,
    type IModelClient,
    type CompletionRequest,
    type EmbeddingRequest,
} from './modelClient';

export {
    AzureSearchClient,
    createSearchClient,
    SearchServiceError,
    SearchErrorCode,
    DEFAULT_SEARCH_CLIENT_CONFIG,
    type ISearchClient,
    type SearchClientConfig,
    type SearchRequest,
} from './searchClient';
