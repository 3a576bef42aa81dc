/**
 * Prompt Template Store
 *
 * Static text used by the chat approaches:
 * - the instructions for turning a conversation into a search query
 * - few-shot examples for that step
 * - the system message for answer generation
 * - the directive asking the model for follow-up questions
 *
 * Prompt content differs per deployment, so approaches receive a
 * PromptTemplates value instead of reading these constants directly.
 * The defaults are frozen; build a variant with createPromptTemplates().
 */

import { Message } from '../../shared/types';

export interface PromptTemplates {
    /** System prompt for the search-query generation step */
    queryPromptTemplate: string;
    /** Example exchanges shown before the real conversation */
    queryFewShots: readonly Message[];
    /**
     * System message for the answer step. May reference
     * {follow_up_questions_prompt} and {injected_prompt}.
     */
    systemMessageTemplate: string;
    /** Substituted for {follow_up_questions_prompt} when follow-ups are requested */
    followUpQuestionsPrompt: string;
}

/** Prefix of an override that appends to the default system message */
export const INJECT_PROMPT_MARKER = '>>>';

const DEFAULT_QUERY_PROMPT = `Below is a history of the conversation so far, and a new question asked by the user that needs to be answered by searching in a knowledge base.
You have access to a search index containing the organization's documents.
Generate a search query based on the conversation and the new question.
Do not include cited source filenames and document names e.g. info.txt or doc.pdf in the search query terms.
Do not include any text inside [] or <<>> in the search query terms.
Do not include any special characters like '+'.
If the question is not in English, translate the question to English before generating the search query.
If you cannot generate a search query, return just the number 0.
`;

const DEFAULT_QUERY_FEW_SHOTS: readonly Message[] = Object.freeze([
    { role: 'user', content: 'How do I get a refund for a cancelled trip?' },
    { role: 'assistant', content: 'Refund policy for cancelled trips' },
    { role: 'user', content: 'And what if I paid with a monthly pass?' },
    { role: 'assistant', content: 'Monthly pass refund or credit eligibility' },
]);

const DEFAULT_SYSTEM_MESSAGE = `Assistant helps customers with questions about services, schedules, tickets and policies. Be brief in your answers.
Answer ONLY with the facts listed in the list of sources below. If there isn't enough information below, say you don't know. Do not generate answers that don't use the sources below. If asking a clarifying question to the user would help, ask the question.
If the question is not in English, answer in the language used in the question.
Each source has a name followed by colon and the actual information, always include the source name for each fact you use in the response. Use square brackets to reference the source, for example [info1.txt]. Don't combine sources, list each source separately, for example [info1.txt][info2.pdf].
{follow_up_questions_prompt}
{injected_prompt}
`;

const DEFAULT_FOLLOW_UP_QUESTIONS_PROMPT = `Generate 3 very brief follow-up questions that the user would likely ask next.
Enclose the follow-up questions in double angle brackets. Example:
<<Which routes run on public holidays?>>
<<Can I change the date on my ticket?>>
<<Where can I buy a monthly pass?>>
Do not repeat questions that have already been asked.
Make sure the last question ends with ">>".
`;

export const DEFAULT_PROMPT_TEMPLATES: Readonly<PromptTemplates> = Object.freeze({
    queryPromptTemplate: DEFAULT_QUERY_PROMPT,
    queryFewShots: DEFAULT_QUERY_FEW_SHOTS,
    systemMessageTemplate: DEFAULT_SYSTEM_MESSAGE,
    followUpQuestionsPrompt: DEFAULT_FOLLOW_UP_QUESTIONS_PROMPT,
});

/**
 * Builds a template set for a deployment, falling back to the defaults
 * for anything not supplied.
 */
export function createPromptTemplates(templates: Partial<PromptTemplates> = {}): Readonly<PromptTemplates> {
    return Object.freeze({ ...DEFAULT_PROMPT_TEMPLATES, ...templates });
}

/**
 * Raised when a template references a placeholder that was not supplied,
 * or contains an unmatched brace.
 */
export class FormatError extends Error {
    constructor(message: string, public readonly placeholder?: string) {
        super(message);
        this.name = 'FormatError';
    }
}

/**
 * Substitutes {name} placeholders.
 *
 * `{{` and `}}` produce literal braces. Values that are supplied but never
 * referenced are fine; a referenced name without a value is a FormatError.
 *
 * @example
 * formatTemplate('Hello {who}', { who: 'world' }) // 'Hello world'
 */
export function formatTemplate(template: string, values: Record<string, string>): string {
    let output = '';
    let i = 0;

    while (i < template.length) {
        const char = template[i];

        if (char === '{') {
            if (template[i + 1] === '{') {
                output += '{';
                i += 2;
                continue;
            }
            const close = template.indexOf('}', i + 1);
            if (close === -1) {
                throw new FormatError(`Single '{' encountered in format string at position ${i}`);
            }
            const name = template.slice(i + 1, close);
            if (!Object.prototype.hasOwnProperty.call(values, name)) {
                throw new FormatError(`Unknown placeholder "{${name}}" in prompt template`, name);
            }
            output += values[name] ?? '';
            i = close + 1;
            continue;
        }

        if (char === '}') {
            if (template[i + 1] === '}') {
                output += '}';
                i += 2;
                continue;
            }
            throw new FormatError(`Single '}' encountered in format string at position ${i}`);
        }

        output += char;
        i += 1;
    }

    return output;
}

/**
 * Resolves the system message for the answer step.
 *
 * - no override: default template, nothing injected
 * - override starting with ">>>": default template, the rest of the
 *   override injected at {injected_prompt}
 * - any other override: the override replaces the template entirely and
 *   only {follow_up_questions_prompt} is available to it
 */
export function resolveSystemPrompt(
    defaultTemplate: string,
    overridePrompt: string | undefined,
    followUpQuestionsPrompt: string
): string {
    if (overridePrompt === undefined) {
        return formatTemplate(defaultTemplate, {
            injected_prompt: '',
            follow_up_questions_prompt: followUpQuestionsPrompt,
        });
    }

    if (overridePrompt.startsWith(INJECT_PROMPT_MARKER)) {
        return formatTemplate(defaultTemplate, {
            injected_prompt: overridePrompt.slice(INJECT_PROMPT_MARKER.length),
            follow_up_questions_prompt: followUpQuestionsPrompt,
        });
    }

    return formatTemplate(overridePrompt, {
        follow_up_questions_prompt: followUpQuestionsPrompt,
    });
}
