/**
 * Token budgeting
 *
 * Chat models reject requests whose prompt plus reserved response exceed
 * the context window. buildMessages() assembles a prompt that always keeps
 * the system message, the few-shot examples and the new user turn, then
 * adds as much conversation history as still fits, newest first.
 *
 * Counts follow the chat-format accounting: every message costs a few
 * tokens of framing on top of its encoded role and content.
 */

import { getEncoding, Tiktoken, TiktokenEncoding } from 'js-tiktoken';
import type { ChatCompletionTool } from 'openai/resources/chat/completions';
import { Message, MessageContentPart } from '../../shared/types';
import { createLogger } from '../logger';

const log = createLogger('token-budget');

/** Framing tokens added to every message */
const TOKENS_PER_MESSAGE = 3;
/** Flat estimate for an image part (low-detail tile) */
const TOKENS_PER_IMAGE = 85;
/** Framing tokens for each declared tool */
const TOKENS_PER_TOOL = 12;

const MODEL_TOKEN_LIMITS: Readonly<Record<string, number>> = Object.freeze({
    'gpt-35-turbo': 4000,
    'gpt-3.5-turbo': 4000,
    'gpt-35-turbo-16k': 16000,
    'gpt-3.5-turbo-16k': 16000,
    'gpt-4': 8100,
    'gpt-4-32k': 32000,
    'gpt-4v': 128000,
    'gpt-4o': 128000,
    'gpt-4o-mini': 128000,
});

export class UnknownModelError extends Error {
    constructor(public readonly model: string) {
        super(`Expected model gpt-35-turbo and above. Received: ${model}`);
        this.name = 'UnknownModelError';
    }
}

/**
 * Raised when the mandatory part of a prompt (system message, few-shots and
 * the new user turn) does not fit the token ceiling on its own.
 */
export class TokenLimitExceededError extends Error {
    constructor(
        public readonly requiredTokens: number,
        public readonly maxTokens: number
    ) {
        super(`Prompt needs ${requiredTokens} tokens but the limit is ${maxTokens}`);
        this.name = 'TokenLimitExceededError';
    }
}

/**
 * Context window of a chat model.
 *
 * @param defaultToMinimum - Use the smallest known window for unknown models
 *   instead of failing (needed for non-GPT models served behind the same API)
 * @throws UnknownModelError for an unknown model when defaultToMinimum is false
 */
export function getTokenLimit(model: string, defaultToMinimum: boolean = false): number {
    const limit = MODEL_TOKEN_LIMITS[model];
    if (limit !== undefined) {
        return limit;
    }
    if (defaultToMinimum) {
        return Math.min(...Object.values(MODEL_TOKEN_LIMITS));
    }
    throw new UnknownModelError(model);
}

// Encoders are large; build each one once, on first use
const encoders = new Map<TiktokenEncoding, Tiktoken>();

function encodingNameForModel(model: string): TiktokenEncoding {
    return model.startsWith('gpt-4o') ? 'o200k_base' : 'cl100k_base';
}

function getEncoder(model: string): Tiktoken {
    const name = encodingNameForModel(model);
    let encoder = encoders.get(name);
    if (!encoder) {
        encoder = getEncoding(name);
        encoders.set(name, encoder);
    }
    return encoder;
}

export function countTokens(model: string, text: string): number {
    return getEncoder(model).encode(text).length;
}

function countContentTokens(model: string, content: string | MessageContentPart[]): number {
    if (typeof content === 'string') {
        return countTokens(model, content);
    }
    let total = 0;
    for (const part of content) {
        total += part.type === 'text' ? countTokens(model, part.text) : TOKENS_PER_IMAGE;
    }
    return total;
}

export function countTokensForMessage(model: string, message: Message): number {
    return TOKENS_PER_MESSAGE + countTokens(model, message.role) + countContentTokens(model, message.content);
}

/**
 * Approximates what tool declarations cost. The exact serialization is
 * internal to the provider.
 */
export function countTokensForTools(model: string, tools: readonly ChatCompletionTool[]): number {
    let total = 0;
    for (const tool of tools) {
        total += TOKENS_PER_TOOL;
        total += countTokens(model, tool.function.name);
        total += countTokens(model, tool.function.description ?? '');
        total += countTokens(model, JSON.stringify(tool.function.parameters ?? {}));
    }
    return total;
}

export interface BuildMessagesOptions {
    model: string;
    systemPrompt: string;
    newUserContent: string;
    pastMessages?: readonly Message[];
    fewShots?: readonly Message[];
    tools?: readonly ChatCompletionTool[];
    /** Ceiling for the whole prompt */
    maxTokens: number;
}

/**
 * Assembles [system, ...fewShots, ...history, user] within maxTokens.
 *
 * History is walked newest to oldest and stops at the first message that
 * would overflow, so the oldest turns are the ones dropped.
 *
 * @throws TokenLimitExceededError when the mandatory messages alone overflow
 */
export function buildMessages(options: BuildMessagesOptions): Message[] {
    const { model, systemPrompt, newUserContent, maxTokens } = options;
    const pastMessages = options.pastMessages ?? [];
    const fewShots = options.fewShots ?? [];

    const head: Message[] = [{ role: 'system', content: systemPrompt }, ...fewShots];
    const newUserMessage: Message = { role: 'user', content: newUserContent };

    let totalTokens = 0;
    for (const message of [...head, newUserMessage]) {
        totalTokens += countTokensForMessage(model, message);
    }
    if (options.tools) {
        totalTokens += countTokensForTools(model, options.tools);
    }
    if (totalTokens > maxTokens) {
        throw new TokenLimitExceededError(totalTokens, maxTokens);
    }

    const history: Message[] = [];
    for (let i = pastMessages.length - 1; i >= 0; i--) {
        const message = pastMessages[i];
        if (!message) {
            continue;
        }
        const messageTokens = countTokensForMessage(model, message);
        if (totalTokens + messageTokens > maxTokens) {
            log.info(`Reached max tokens of ${maxTokens}, history will be truncated`);
            break;
        }
        history.unshift({ role: message.role, content: message.content });
        totalTokens += messageTokens;
    }

    return [...head, ...history, newUserMessage];
}
