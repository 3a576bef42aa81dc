/**
 * Model Client
 *
 * Adapter over the `openai` SDK for the two model services the chat
 * approaches use:
 * - chat completions, either awaited whole or streamed as chunks
 * - text embeddings for vector search
 *
 * The same SDK talks to OpenAI and to Azure OpenAI; with Azure the `model`
 * field carries the deployment name. Errors from the SDK are not wrapped:
 * callers see the provider's own error types.
 */

import OpenAI, { AzureOpenAI } from 'openai';
import type {
    ChatCompletion,
    ChatCompletionChunk,
    ChatCompletionMessageParam,
    ChatCompletionTool,
} from 'openai/resources/chat/completions';
import { Message } from '../../shared/types';
import { OpenAIConfig } from '../config';
import { createLogger } from '../logger';

const log = createLogger('model-client');

export interface CompletionRequest {
    /** Model name, or deployment name for Azure OpenAI */
    model: string;
    messages: Message[];
    temperature: number;
    maxTokens: number;
    seed?: number;
    tools?: ChatCompletionTool[];
}

export interface EmbeddingRequest {
    model: string;
    input: string;
    /** Only sent to models that accept a reduced dimension count */
    dimensions?: number;
}

/**
 * Interface defining the generation/embedding service contract.
 * Tests substitute an in-process fake.
 */
export interface IModelClient {
    createCompletion(request: CompletionRequest): Promise<ChatCompletion>;
    streamCompletion(request: CompletionRequest): Promise<AsyncIterable<ChatCompletionChunk>>;
    createEmbedding(request: EmbeddingRequest): Promise<number[]>;
}

function textOf(content: Message['content']): string {
    if (typeof content === 'string') {
        return content;
    }
    return content
        .map((part) => (part.type === 'text' ? part.text : ''))
        .join('');
}

/**
 * Maps our message shape onto the SDK's. Only user turns may carry image
 * parts; system and assistant turns are flattened to text.
 */
export function toChatCompletionMessage(message: Message): ChatCompletionMessageParam {
    switch (message.role) {
        case 'system':
            return { role: 'system', content: textOf(message.content) };
        case 'assistant':
            return { role: 'assistant', content: textOf(message.content) };
        case 'user':
            return { role: 'user', content: message.content };
    }
}

export class OpenAIModelClient implements IModelClient {
    constructor(private readonly client: OpenAI) {}

    async createCompletion(request: CompletionRequest): Promise<ChatCompletion> {
        log.debug(`chat completion model=${request.model} messages=${request.messages.length}`);
        return this.client.chat.completions.create({
            model: request.model,
            messages: request.messages.map(toChatCompletionMessage),
            temperature: request.temperature,
            max_tokens: request.maxTokens,
            n: 1,
            seed: request.seed,
            tools: request.tools,
            stream: false,
        });
    }

    async streamCompletion(request: CompletionRequest): Promise<AsyncIterable<ChatCompletionChunk>> {
        log.debug(`streamed chat completion model=${request.model} messages=${request.messages.length}`);
        return this.client.chat.completions.create({
            model: request.model,
            messages: request.messages.map(toChatCompletionMessage),
            temperature: request.temperature,
            max_tokens: request.maxTokens,
            n: 1,
            seed: request.seed,
            tools: request.tools,
            stream: true,
        });
    }

    async createEmbedding(request: EmbeddingRequest): Promise<number[]> {
        const response = await this.client.embeddings.create({
            model: request.model,
            input: request.input,
            ...(request.dimensions !== undefined ? { dimensions: request.dimensions } : {}),
        });
        const first = response.data[0];
        if (!first) {
            throw new Error(`Embedding response for model ${request.model} contained no vectors`);
        }
        return first.embedding;
    }
}

/**
 * Creates a model client for the configured host.
 */
export function createModelClient(config: OpenAIConfig): OpenAIModelClient {
    if (config.host === 'azure') {
        const azure = new AzureOpenAI({
            endpoint: config.azureEndpoint,
            apiKey: config.apiKey,
            apiVersion: config.azureApiVersion,
        });
        return new OpenAIModelClient(azure);
    }
    return new OpenAIModelClient(new OpenAI({ apiKey: config.apiKey }));
}
