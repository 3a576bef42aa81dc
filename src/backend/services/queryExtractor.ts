/**
 * Query Extractor
 *
 * The query-generation step lets the model answer either by calling the
 * `search_sources` tool or with plain text. This module declares that tool
 * and decides which string is actually sent to the search index.
 */

import type { ChatCompletion, ChatCompletionTool } from 'openai/resources/chat/completions';

/**
 * Reserved answer meaning "no better query than the user's own question".
 */
export const NO_RESPONSE = '0';

export const SEARCH_TOOL_NAME = 'search_sources';

export const SEARCH_SOURCES_TOOL: ChatCompletionTool = {
    type: 'function',
    function: {
        name: SEARCH_TOOL_NAME,
        description: 'Retrieve sources from the search index',
        parameters: {
            type: 'object',
            properties: {
                search_query: {
                    type: 'string',
                    description: "Query string to retrieve documents from the search index e.g.: 'refund policy'",
                },
            },
            required: ['search_query'],
        },
    },
};

function readSearchQuery(rawArguments: string): string {
    const parsed: unknown = JSON.parse(rawArguments);
    if (typeof parsed === 'object' && parsed !== null && 'search_query' in parsed) {
        const value = parsed.search_query;
        if (typeof value === 'string') {
            return value;
        }
    }
    return NO_RESPONSE;
}

/**
 * Picks the effective search query from the query-generation completion.
 *
 * Order of preference:
 * 1. `search_query` argument of a `search_sources` tool call
 * 2. the completion's free text, trimmed, when there were no tool calls
 * 3. the original user question
 *
 * The sentinel "0" at step 1 or 2 falls through to step 3. Malformed tool
 * arguments raise the JSON parse error.
 */
export function getSearchQuery(chatCompletion: ChatCompletion, userQuery: string): string {
    const responseMessage = chatCompletion.choices[0]?.message;
    if (!responseMessage) {
        return userQuery;
    }

    const toolCalls = responseMessage.tool_calls ?? [];
    if (toolCalls.length > 0) {
        for (const tool of toolCalls) {
            if (tool.type !== 'function') {
                continue;
            }
            if (tool.function.name === SEARCH_TOOL_NAME) {
                const searchQuery = readSearchQuery(tool.function.arguments);
                if (searchQuery !== NO_RESPONSE) {
                    return searchQuery;
                }
            }
        }
    } else if (responseMessage.content) {
        const queryText = responseMessage.content.trim();
        if (queryText !== NO_RESPONSE) {
            return queryText;
        }
    }

    return userQuery;
}
