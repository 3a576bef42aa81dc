/**
 * Chat Approach
 *
 * Base class for conversational approaches. A concrete approach supplies
 * two things:
 * - its default system message template
 * - runUntilFinalCall(): everything up to (but not including) the answer
 *   request, returned as diagnostics plus a deferred generation
 *
 * This class turns that deferred generation into the two public response
 * shapes: one ChatResponse envelope, or a stream of StreamEvents.
 */

import type { ChatCompletion, ChatCompletionChunk } from 'openai/resources/chat/completions';
import {
    AuthClaims,
    ChatRequestContext,
    ChatResponse,
    ExtraInfo,
    Message,
    Overrides,
    StreamEvent,
} from '../../shared/types';
import { extractFollowupQuestions } from './followupExtractor';
import { PromptTemplates, resolveSystemPrompt } from './promptTemplates';
import { normalizeStream } from './streamNormalizer';

/**
 * Raised for requests the pipeline cannot process, before any remote call.
 */
export class InputError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InputError';
    }
}

/**
 * Diagnostics for a request plus the answer call, not yet started.
 * Invoking pendingGeneration issues the (expensive) final request.
 */
export interface FinalCall<T> {
    extraInfo: ExtraInfo;
    pendingGeneration: () => Promise<T>;
}

/**
 * The public surface the HTTP layer depends on.
 */
export interface IChatApproach {
    run(messages: Message[], sessionState?: unknown, context?: ChatRequestContext): Promise<ChatResponse>;
    runStream(messages: Message[], sessionState?: unknown, context?: ChatRequestContext): AsyncGenerator<StreamEvent>;
}

export abstract class ChatApproach implements IChatApproach {
    protected constructor(protected readonly prompts: Readonly<PromptTemplates>) {}

    /** Default system message, with {follow_up_questions_prompt} and {injected_prompt} */
    abstract get systemMessageTemplate(): string;

    abstract runUntilFinalCall(
        messages: Message[],
        overrides: Overrides,
        authClaims: AuthClaims,
        shouldStream: false
    ): Promise<FinalCall<ChatCompletion>>;
    abstract runUntilFinalCall(
        messages: Message[],
        overrides: Overrides,
        authClaims: AuthClaims,
        shouldStream: true
    ): Promise<FinalCall<AsyncIterable<ChatCompletionChunk>>>;

    /**
     * Resolves the answer-step system message.
     *
     * @throws FormatError when the template references an unknown placeholder
     */
    getSystemPrompt(overridePrompt: string | undefined, followUpQuestionsPrompt: string): string {
        return resolveSystemPrompt(this.systemMessageTemplate, overridePrompt, followUpQuestionsPrompt);
    }

    protected followUpQuestionsPrompt(overrides: Overrides): string {
        return overrides.suggest_followup_questions ? this.prompts.followUpQuestionsPrompt : '';
    }

    async runWithoutStreaming(
        messages: Message[],
        overrides: Overrides,
        authClaims: AuthClaims,
        sessionState: unknown = null
    ): Promise<ChatResponse> {
        const { extraInfo, pendingGeneration } = await this.runUntilFinalCall(
            messages,
            overrides,
            authClaims,
            false
        );
        const chatCompletion = await pendingGeneration();
        const message = chatCompletion.choices[0]?.message;

        let content = message?.content ?? '';
        const role = message?.role ?? 'assistant';

        if (overrides.suggest_followup_questions) {
            const extraction = extractFollowupQuestions(content);
            content = extraction.content;
            extraInfo.followup_questions = extraction.followupQuestions;
        }

        return {
            message: { content, role },
            context: extraInfo,
            session_state: sessionState,
        };
    }

    /**
     * Streams the answer. The first event carries the role and the full
     * ExtraInfo; the answer request is only issued after it has been pulled.
     */
    async *runWithStreaming(
        messages: Message[],
        overrides: Overrides,
        authClaims: AuthClaims,
        sessionState: unknown = null
    ): AsyncGenerator<StreamEvent> {
        const { extraInfo, pendingGeneration } = await this.runUntilFinalCall(
            messages,
            overrides,
            authClaims,
            true
        );

        yield { delta: { role: 'assistant' }, context: extraInfo, session_state: sessionState };

        const chunks = await pendingGeneration();
        yield* normalizeStream(chunks, Boolean(overrides.suggest_followup_questions));
    }

    async run(
        messages: Message[],
        sessionState: unknown = null,
        context: ChatRequestContext = {}
    ): Promise<ChatResponse> {
        return this.runWithoutStreaming(
            messages,
            context.overrides ?? {},
            context.auth_claims ?? {},
            sessionState
        );
    }

    runStream(
        messages: Message[],
        sessionState: unknown = null,
        context: ChatRequestContext = {}
    ): AsyncGenerator<StreamEvent> {
        return this.runWithStreaming(
            messages,
            context.overrides ?? {},
            context.auth_claims ?? {},
            sessionState
        );
    }
}
