/**
 * In-process stand-ins for the model and search services, plus builders
 * for the completion objects they return.
 */

import type {
    ChatCompletion,
    ChatCompletionChunk,
    ChatCompletionMessage,
    ChatCompletionMessageToolCall,
} from 'openai/resources/chat/completions';
import { SearchResult } from '../../shared/types';
import { CompletionRequest, EmbeddingRequest, IModelClient } from '../clients/modelClient';
import { ISearchClient, SearchRequest } from '../clients/searchClient';

export function completion(message: Partial<ChatCompletionMessage> = {}): ChatCompletion {
    return {
        id: 'chatcmpl-test',
        object: 'chat.completion',
        created: 0,
        model: 'gpt-35-turbo',
        choices: [
            {
                index: 0,
                finish_reason: 'stop',
                logprobs: null,
                message: { role: 'assistant', content: null, refusal: null, ...message },
            },
        ],
    };
}

export function toolCall(name: string, args: string): ChatCompletionMessageToolCall {
    return {
        id: 'call-1',
        type: 'function',
        function: { name, arguments: args },
    };
}

export function searchQueryCompletion(searchQuery: string): ChatCompletion {
    return completion({
        tool_calls: [toolCall('search_sources', JSON.stringify({ search_query: searchQuery }))],
    });
}

export function chunk(content?: string, role?: 'assistant'): ChatCompletionChunk {
    return {
        id: 'chatcmpl-test',
        object: 'chat.completion.chunk',
        created: 0,
        model: 'gpt-35-turbo',
        choices: [{ index: 0, delta: { content, role }, finish_reason: null }],
    };
}

export function emptyChunk(): ChatCompletionChunk {
    return {
        id: 'chatcmpl-test',
        object: 'chat.completion.chunk',
        created: 0,
        model: 'gpt-35-turbo',
        choices: [],
    };
}

export async function* fromArray<T>(items: readonly T[]): AsyncGenerator<T> {
    for (const item of items) {
        yield item;
    }
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
    const items: T[] = [];
    for await (const item of iterable) {
        items.push(item);
    }
    return items;
}

/**
 * Answers completions from a queue and records every request.
 */
export class FakeModelClient implements IModelClient {
    readonly completionRequests: CompletionRequest[] = [];
    readonly streamRequests: CompletionRequest[] = [];
    readonly embeddingRequests: EmbeddingRequest[] = [];

    constructor(
        private readonly completions: ChatCompletion[] = [],
        private readonly chunks: ChatCompletionChunk[] = [],
        private readonly embedding: number[] = [0.1, 0.2, 0.3]
    ) {}

    async createCompletion(request: CompletionRequest): Promise<ChatCompletion> {
        this.completionRequests.push(request);
        const next = this.completions.shift();
        if (!next) {
            throw new Error('FakeModelClient has no completion queued');
        }
        return next;
    }

    async streamCompletion(request: CompletionRequest): Promise<AsyncIterable<ChatCompletionChunk>> {
        this.streamRequests.push(request);
        return fromArray(this.chunks);
    }

    async createEmbedding(request: EmbeddingRequest): Promise<number[]> {
        this.embeddingRequests.push(request);
        return this.embedding;
    }

    get callCount(): number {
        return this.completionRequests.length + this.streamRequests.length + this.embeddingRequests.length;
    }
}

export class FakeSearchClient implements ISearchClient {
    readonly requests: SearchRequest[] = [];

    constructor(private readonly results: SearchResult[] = []) {}

    async search(request: SearchRequest): Promise<SearchResult[]> {
        this.requests.push(request);
        return this.results;
    }
}

export function searchResult(overrides: Partial<SearchResult> = {}): SearchResult {
    return {
        id: 'doc-1',
        content: 'Refunds are issued within 14 days.',
        sourcepage: 'refunds.pdf#page=2',
        sourcefile: 'refunds.pdf',
        category: null,
        captions: [],
        score: 1.5,
        ...overrides,
    };
}
