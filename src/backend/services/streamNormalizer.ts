/**
 * Streaming Normalizer
 *
 * Re-emits a raw chat-completion chunk stream as uniform StreamEvents.
 * When follow-up questions were requested, everything from the first "<<"
 * onwards is held back and returned at the end as one event carrying the
 * parsed questions instead of content.
 *
 *   PASSTHROUGH ──fragment contains "<<"──▶ BUFFERING_FOLLOWUPS
 *
 * There is no way back: once buffering starts, the rest of the stream is
 * follow-up markup.
 */

import type { ChatCompletionChunk } from 'openai/resources/chat/completions';
import { StreamEvent } from '../../shared/types';
import { extractFollowupQuestions, FOLLOWUP_OPEN } from './followupExtractor';

export type NormalizerState = 'PASSTHROUGH' | 'BUFFERING_FOLLOWUPS';

/**
 * Normalizes a chunk stream.
 *
 * Chunks with no choices are skipped; some API versions send one before
 * the first real delta. If the consumer stops iterating early, the source
 * is released and any buffered follow-up text is dropped.
 *
 * @param chunks - Raw chunks from the generation service
 * @param suggestFollowupQuestions - Whether to divert "<<...>>" markup
 */
export async function* normalizeStream(
    chunks: AsyncIterable<ChatCompletionChunk>,
    suggestFollowupQuestions: boolean
): AsyncGenerator<StreamEvent> {
    let state: NormalizerState = 'PASSTHROUGH';
    let followupContent = '';

    for await (const chunk of chunks) {
        const choice = chunk.choices[0];
        if (!choice) {
            continue;
        }

        const content = choice.delta.content ?? '';
        const role = choice.delta.role ?? undefined;

        if (!suggestFollowupQuestions) {
            yield { delta: buildDelta(choice.delta.content ?? undefined, role) };
            continue;
        }

        if (state === 'BUFFERING_FOLLOWUPS') {
            followupContent += content;
            continue;
        }

        const openIndex = content.indexOf(FOLLOWUP_OPEN);
        if (openIndex === -1) {
            yield { delta: buildDelta(choice.delta.content ?? undefined, role) };
            continue;
        }

        const earlierContent = content.slice(0, openIndex);
        if (earlierContent) {
            yield { delta: buildDelta(earlierContent, role) };
        }
        followupContent += content.slice(openIndex);
        state = 'BUFFERING_FOLLOWUPS';
    }

    if (followupContent) {
        const { followupQuestions } = extractFollowupQuestions(followupContent);
        yield {
            delta: { role: 'assistant' },
            context: { followup_questions: followupQuestions },
        };
    }
}

function buildDelta(content: string | undefined, role: string | undefined): StreamEvent['delta'] {
    const delta: StreamEvent['delta'] = {};
    if (content !== undefined) {
        delta.content = content;
    }
    if (role !== undefined) {
        delta.role = role;
    }
    return delta;
}
