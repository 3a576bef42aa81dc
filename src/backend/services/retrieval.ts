/**
 * Retrieval helpers shared by the chat approaches:
 * - turning the effective query into a vector query
 * - flattening search results into the "Sources:" lines of the prompt
 * - serializing results for the diagnostic thoughts
 */

import { SearchResult, VectorQuery } from '../../shared/types';
import { IModelClient } from '../clients/modelClient';

/**
 * Embedding models that accept a `dimensions` parameter.
 */
const SUPPORTED_DIMENSIONS_MODELS: Readonly<Record<string, boolean>> = Object.freeze({
    'text-embedding-ada-002': false,
    'text-embedding-3-small': true,
    'text-embedding-3-large': true,
});

export interface EmbeddingSettings {
    model: string;
    /** Azure OpenAI deployment; used in place of the model name when set */
    deployment?: string;
    dimensions: number;
    /** Index field holding document vectors */
    field: string;
    /** Neighbours requested from the vector index */
    kNearestNeighbors: number;
}

export const DEFAULT_EMBEDDING_SETTINGS: Pick<EmbeddingSettings, 'field' | 'kNearestNeighbors'> = {
    field: 'embedding',
    kNearestNeighbors: 50,
};

export async function computeTextEmbedding(
    modelClient: IModelClient,
    settings: EmbeddingSettings,
    text: string
): Promise<VectorQuery> {
    const vector = await modelClient.createEmbedding({
        model: settings.deployment ?? settings.model,
        input: text,
        dimensions: SUPPORTED_DIMENSIONS_MODELS[settings.model] ? settings.dimensions : undefined,
    });

    return {
        kind: 'vector',
        vector,
        k: settings.kNearestNeighbors,
        fields: settings.field,
    };
}

function nonewlines(text: string): string {
    return text.replace(/\n/g, ' ').replace(/\r/g, ' ');
}

/**
 * One "<sourcepage>: <text>" line per result, in rank order.
 * Captions are used instead of the raw content when requested and present.
 */
export function getSourcesContent(results: SearchResult[], useSemanticCaptions: boolean): string[] {
    return results.map((doc) => {
        const citation = doc.sourcepage ?? '';
        const text =
            useSemanticCaptions && doc.captions.length > 0
                ? doc.captions.map((caption) => caption.text).join(' . ')
                : doc.content;
        return `${citation}: ${nonewlines(text)}`;
    });
}

/**
 * Short textual form of an embedding: the first two components and a count.
 */
export function trimEmbedding(embedding: number[] | undefined): string | null {
    if (!embedding || embedding.length === 0) {
        return null;
    }
    if (embedding.length > 2) {
        return `[${embedding[0]}, ${embedding[1]} ...+${embedding.length - 2} more]`;
    }
    return `[${embedding.join(', ')}]`;
}

export function serializeForResults(doc: SearchResult): Record<string, unknown> {
    return {
        id: doc.id,
        content: doc.content,
        embedding: trimEmbedding(doc.embedding),
        category: doc.category ?? null,
        sourcepage: doc.sourcepage ?? null,
        sourcefile: doc.sourcefile ?? null,
        oids: doc.oids ?? null,
        groups: doc.groups ?? null,
        captions: doc.captions.map((caption) => ({
            text: caption.text,
            highlights: caption.highlights ?? null,
        })),
        score: doc.score ?? null,
        reranker_score: doc.rerankerScore ?? null,
    };
}
