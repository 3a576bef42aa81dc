/**
 * Backend services
 *
 * Core business logic components:
 * - ChatApproach: Base class turning a pipeline into envelope or stream responses
 * - ChatReadRetrieveReadApproach: Query rewrite, retrieval and grounded answer
 * - Prompt templates, token budgeting and access-control filters
 * - Extractors for the search query and follow-up questions
 */

export { ChatApproach, InputError } from './chatApproach';

export type { FinalCall, IChatApproach } from './chatApproach';

export {
    ChatReadRetrieveReadApproach,
    createChatReadRetrieveReadApproach,
} from './chatReadRetrieveRead';

export type {
    ChatReadRetrieveReadOptions,
    ChatReadRetrieveReadDependencies,
} from './chatReadRetrieveRead';

export {
    DEFAULT_PROMPT_TEMPLATES,
    INJECT_PROMPT_MARKER,
    createPromptTemplates,
    formatTemplate,
    resolveSystemPrompt,
    FormatError,
} from './promptTemplates';

export type { PromptTemplates } from './promptTemplates';

export {
    getTokenLimit,
    countTokens,
    countTokensForMessage,
    countTokensForTools,
    buildMessages,
    UnknownModelError,
    TokenLimitExceededError,
} from './tokenBudget';

export type { BuildMessagesOptions } from './tokenBudget';

export {
    AuthenticationHelper,
    createAuthHelper,
    AuthConfigurationError,
    DEFAULT_AUTH_HELPER_CONFIG,
} from './authHelper';

export type { AuthHelperConfig } from './authHelper';

export { getSearchQuery, NO_RESPONSE, SEARCH_SOURCES_TOOL, SEARCH_TOOL_NAME } from './queryExtractor';

export { extractFollowupQuestions } from './followupExtractor';

export type { FollowupExtraction } from './followupExtractor';

export { normalizeStream } from './streamNormalizer';

export type { NormalizerState } from './streamNormalizer';

export {
    computeTextEmbedding,
    getSourcesContent,
    trimEmbedding,
    serializeForResults,
    DEFAULT_EMBEDDING_SETTINGS,
} from './retrieval';

export type { EmbeddingSettings } from './retrieval';
