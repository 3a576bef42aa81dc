/**
 * Unit tests for the streaming normalizer
 */

import type { ChatCompletionChunk } from 'openai/resources/chat/completions';
import { normalizeStream } from '../streamNormalizer';
import { chunk, collect, emptyChunk, fromArray } from '../../__tests__/fakes';

describe('normalizeStream', () => {
    it('should pass every delta through when follow-ups are off', async () => {
        const events = await collect(
            normalizeStream(fromArray([chunk('', 'assistant'), chunk('Hello'), chunk(' <<Q?>>')]), false)
        );
        expect(events).toEqual([
            { delta: { content: '', role: 'assistant' } },
            { delta: { content: 'Hello' } },
            { delta: { content: ' <<Q?>>' } },
        ]);
    });

    it('should skip chunks without choices', async () => {
        const events = await collect(normalizeStream(fromArray([emptyChunk(), chunk('Hi')]), false));
        expect(events).toEqual([{ delta: { content: 'Hi' } }]);
    });

    it('should hold back follow-up markup and emit the questions at the end', async () => {
        const events = await collect(
            normalizeStream(fromArray([chunk('The answer is X. '), chunk('<<What about Y?>>')]), true)
        );
        expect(events).toEqual([
            { delta: { content: 'The answer is X. ' } },
            { delta: { role: 'assistant' }, context: { followup_questions: ['What about Y?'] } },
        ]);
    });

    it('should emit the text before "<<" when both share a fragment', async () => {
        const events = await collect(
            normalizeStream(fromArray([chunk('Done.<<First'), chunk('?>>'), chunk('<<Second?>>')]), true)
        );
        expect(events).toEqual([
            { delta: { content: 'Done.' } },
            { delta: { role: 'assistant' }, context: { followup_questions: ['First?', 'Second?'] } },
        ]);
    });

    it('should not emit an empty prefix', async () => {
        const events = await collect(normalizeStream(fromArray([chunk('<<Only?>>')]), true));
        expect(events).toEqual([
            { delta: { role: 'assistant' }, context: { followup_questions: ['Only?'] } },
        ]);
    });

    it('should emit no trailing event when there was no markup', async () => {
        const events = await collect(normalizeStream(fromArray([chunk('Plain answer.')]), true));
        expect(events).toEqual([{ delta: { content: 'Plain answer.' } }]);
    });

    it('should release the source and drop the buffer when the consumer stops early', async () => {
        let finished = false;
        async function* source(): AsyncGenerator<ChatCompletionChunk> {
            try {
                yield chunk('First. ');
                yield chunk('<<Buffered?>>');
                yield chunk('never read');
            } finally {
                finished = true;
            }
        }

        const stream = normalizeStream(source(), true);
        const first = await stream.next();
        expect(first.value).toEqual({ delta: { content: 'First. ' } });

        const closed = await stream.return(undefined);
        expect(closed.done).toBe(true);
        expect(finished).toBe(true);
    });
});
