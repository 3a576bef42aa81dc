/**
 * Follow-up Extractor
 *
 * When asked for follow-up questions, the model appends them to its answer
 * as `<<question>>` blocks. This module separates the visible answer from
 * those suggestions.
 */

export const FOLLOWUP_OPEN = '<<';

const FOLLOWUP_PATTERN = /<<([^>]+)>>/g;

export interface FollowupExtraction {
    /** Answer text before the first "<<" */
    content: string;
    /** Enclosed questions, in order of appearance */
    followupQuestions: string[];
}

/**
 * Splits generated text into visible content and follow-up questions.
 *
 * An opening "<<" without a closing ">>" still truncates the content but
 * yields no question.
 */
export function extractFollowupQuestions(content: string): FollowupExtraction {
    const openIndex = content.indexOf(FOLLOWUP_OPEN);
    const visible = openIndex === -1 ? content : content.slice(0, openIndex);

    const followupQuestions: string[] = [];
    for (const match of content.matchAll(FOLLOWUP_PATTERN)) {
        const question = match[1];
        if (question !== undefined) {
            followupQuestions.push(question);
        }
    }

    return { content: visible, followupQuestions };
}
