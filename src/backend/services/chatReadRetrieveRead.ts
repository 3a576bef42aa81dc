/**
 * Chat Read-Retrieve-Read Approach
 *
 * Answers a conversational question over an indexed document collection:
 * 1. Ask the chat model to turn the conversation into a search query
 * 2. Retrieve passages with text, vector or hybrid search
 * 3. Ask the chat model to answer from those passages, citing sources
 *
 * Everything up to step 3 happens in runUntilFinalCall(); the answer call
 * itself is returned unstarted so the base class can either await it or
 * stream it.
 */

import type { ChatCompletion, ChatCompletionChunk } from 'openai/resources/chat/completions';
import { AuthClaims, ExtraInfo, Message, Overrides, VectorQuery } from '../../shared/types';
import { createModelClient, IModelClient } from '../clients/modelClient';
import { createSearchClient, ISearchClient } from '../clients/searchClient';
import { AppConfig } from '../config';
import { createLogger } from '../logger';
import { AuthenticationHelper, createAuthHelper } from './authHelper';
import { ChatApproach, FinalCall, InputError } from './chatApproach';
import { createPromptTemplates, PromptTemplates } from './promptTemplates';
import { getSearchQuery, SEARCH_SOURCES_TOOL } from './queryExtractor';
import {
    computeTextEmbedding,
    DEFAULT_EMBEDDING_SETTINGS,
    EmbeddingSettings,
    getSourcesContent,
    serializeForResults,
} from './retrieval';
import { buildMessages, getTokenLimit } from './tokenBudget';

const log = createLogger('chat-read-retrieve-read');

/** Response budget of the query-generation call */
const QUERY_RESPONSE_TOKENS = 100;
/** Response budget of the answer call */
const ANSWER_RESPONSE_TOKENS = 1024;

const DEFAULT_TOP = 3;
const DEFAULT_TEMPERATURE = 0.3;

export interface ChatReadRetrieveReadOptions {
    searchClient: ISearchClient;
    modelClient: IModelClient;
    authHelper: AuthenticationHelper;
    chatModel: string;
    /** Azure OpenAI deployment; sent instead of the model name when set */
    chatDeployment?: string;
    embedding: EmbeddingSettings;
    /** Fall back to the smallest known context window for unknown models */
    allowNonGptModels?: boolean;
    prompts?: Partial<PromptTemplates>;
}

export class ChatReadRetrieveReadApproach extends ChatApproach {
    private readonly searchClient: ISearchClient;
    private readonly modelClient: IModelClient;
    private readonly authHelper: AuthenticationHelper;
    private readonly chatModel: string;
    private readonly chatDeployment?: string;
    private readonly embedding: EmbeddingSettings;
    private readonly chatTokenLimit: number;

    constructor(options: ChatReadRetrieveReadOptions) {
        super(createPromptTemplates(options.prompts));
        this.searchClient = options.searchClient;
        this.modelClient = options.modelClient;
        this.authHelper = options.authHelper;
        this.chatModel = options.chatModel;
        this.chatDeployment = options.chatDeployment;
        this.embedding = options.embedding;
        this.chatTokenLimit = getTokenLimit(options.chatModel, options.allowNonGptModels ?? false);
    }

    get systemMessageTemplate(): string {
        return this.prompts.systemMessageTemplate;
    }

    runUntilFinalCall(
        messages: Message[],
        overrides: Overrides,
        authClaims: AuthClaims,
        shouldStream: false
    ): Promise<FinalCall<ChatCompletion>>;
    runUntilFinalCall(
        messages: Message[],
        overrides: Overrides,
        authClaims: AuthClaims,
        shouldStream: true
    ): Promise<FinalCall<AsyncIterable<ChatCompletionChunk>>>;
    async runUntilFinalCall(
        messages: Message[],
        overrides: Overrides,
        authClaims: AuthClaims,
        shouldStream: boolean
    ): Promise<FinalCall<ChatCompletion> | FinalCall<AsyncIterable<ChatCompletionChunk>>> {
        const lastMessage = messages[messages.length - 1];
        if (!lastMessage) {
            throw new InputError('At least one message is required');
        }
        const originalUserQuery = lastMessage.content;
        if (typeof originalUserQuery !== 'string') {
            throw new InputError('The most recent message content must be a string.');
        }

        const retrievalMode = overrides.retrieval_mode ?? null;
        const useTextSearch = retrievalMode === null || retrievalMode === 'text' || retrievalMode === 'hybrid';
        const useVectorSearch = retrievalMode === null || retrievalMode === 'vectors' || retrievalMode === 'hybrid';
        const useSemanticRanker = Boolean(overrides.semantic_ranker);
        const useSemanticCaptions = Boolean(overrides.semantic_captions);
        const top = overrides.top ?? DEFAULT_TOP;
        const minimumSearchScore = overrides.minimum_search_score ?? 0;
        const minimumRerankerScore = overrides.minimum_reranker_score ?? 0;
        const filter = this.authHelper.buildFilter(overrides, authClaims);
        const seed = overrides.seed;

        const pastMessages = messages.slice(0, -1);
        const modelName = this.chatDeployment ?? this.chatModel;
        const modelProps = this.modelProps();

        // Query rewrite
        const queryMessages = buildMessages({
            model: this.chatModel,
            systemPrompt: this.prompts.queryPromptTemplate,
            tools: [SEARCH_SOURCES_TOOL],
            fewShots: this.prompts.queryFewShots,
            pastMessages,
            newUserContent: `Generate search query for: ${originalUserQuery}`,
            maxTokens: this.chatTokenLimit - QUERY_RESPONSE_TOKENS,
        });

        const queryCompletion = await this.modelClient.createCompletion({
            model: modelName,
            messages: queryMessages,
            temperature: 0,
            maxTokens: QUERY_RESPONSE_TOKENS,
            tools: [SEARCH_SOURCES_TOOL],
            seed,
        });

        const queryText = getSearchQuery(queryCompletion, originalUserQuery);
        log.debug(`search query: ${queryText}`);

        // Retrieval
        const vectors: VectorQuery[] = [];
        if (useVectorSearch) {
            vectors.push(await computeTextEmbedding(this.modelClient, this.embedding, queryText));
            log.debug(`computed query embedding with ${this.embedding.model}`);
        }

        const results = await this.searchClient.search({
            top,
            queryText,
            filter,
            vectors,
            useTextSearch,
            useVectorSearch,
            useSemanticRanker,
            useSemanticCaptions,
            minimumSearchScore,
            minimumRerankerScore,
        });
        log.debug(`search returned ${results.length} results`);

        const sourcesContent = getSourcesContent(results, useSemanticCaptions);
        const content = sourcesContent.join('\n');

        // Answer prompt; sources follow the question in the user turn
        const systemMessage = this.getSystemPrompt(
            overrides.prompt_template,
            this.followUpQuestionsPrompt(overrides)
        );

        const answerMessages = buildMessages({
            model: this.chatModel,
            systemPrompt: systemMessage,
            pastMessages,
            newUserContent: `${originalUserQuery}\n\nSources:\n${content}`,
            maxTokens: this.chatTokenLimit - ANSWER_RESPONSE_TOKENS,
        });
        log.debug(`answer prompt has ${answerMessages.length} messages`);

        const extraInfo: ExtraInfo = {
            data_points: { text: sourcesContent },
            thoughts: [
                {
                    title: 'Prompt to generate search query',
                    content: queryMessages,
                    props: modelProps,
                },
                {
                    title: 'Search using generated search query',
                    content: queryText,
                    props: {
                        use_semantic_captions: useSemanticCaptions,
                        use_semantic_ranker: useSemanticRanker,
                        top,
                        filter,
                        use_vector_search: useVectorSearch,
                        use_text_search: useTextSearch,
                    },
                },
                {
                    title: 'Search results',
                    content: results.map(serializeForResults),
                    props: {},
                },
                {
                    title: 'Prompt to generate answer',
                    content: answerMessages,
                    props: modelProps,
                },
            ],
        };

        const answerRequest = {
            model: modelName,
            messages: answerMessages,
            temperature: overrides.temperature ?? DEFAULT_TEMPERATURE,
            maxTokens: ANSWER_RESPONSE_TOKENS,
            seed,
        };

        if (shouldStream) {
            return {
                extraInfo,
                pendingGeneration: () => this.modelClient.streamCompletion(answerRequest),
            };
        }
        return {
            extraInfo,
            pendingGeneration: () => this.modelClient.createCompletion(answerRequest),
        };
    }

    private modelProps(): Record<string, unknown> {
        return this.chatDeployment ? { model: this.chatModel, deployment: this.chatDeployment } : { model: this.chatModel };
    }
}

/**
 * Optional collaborators for createChatReadRetrieveReadApproach().
 * Anything not supplied is built from the configuration.
 */
export interface ChatReadRetrieveReadDependencies {
    modelClient?: IModelClient;
    searchClient?: ISearchClient;
}

/**
 * Factory function to wire the approach from application configuration.
 */
export function createChatReadRetrieveReadApproach(
    config: AppConfig,
    dependencies: ChatReadRetrieveReadDependencies = {}
): ChatReadRetrieveReadApproach {
    const { openai, search } = config;

    return new ChatReadRetrieveReadApproach({
        modelClient: dependencies.modelClient ?? createModelClient(openai),
        searchClient:
            dependencies.searchClient ??
            createSearchClient({
                endpoint: search.endpoint,
                index: search.index,
                apiKey: search.apiKey,
                apiVersion: search.apiVersion,
                queryLanguage: search.queryLanguage,
                querySpeller: search.querySpeller,
                contentField: search.contentField,
                sourcepageField: search.sourcepageField,
            }),
        authHelper: createAuthHelper({
            requireAccessControl: search.requireAccessControl,
            hasAuthFields: search.hasAuthFields,
        }),
        chatModel: openai.chatModel,
        chatDeployment: openai.chatDeployment,
        embedding: {
            ...DEFAULT_EMBEDDING_SETTINGS,
            model: openai.embeddingModel,
            deployment: openai.embeddingDeployment,
            dimensions: openai.embeddingDimensions,
        },
        allowNonGptModels: openai.allowNonGptModels,
        prompts: config.prompts,
    });
}
