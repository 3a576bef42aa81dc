/**
 * Shared type definitions for the chat orchestrator
 *
 * These types define the contract between the HTTP layer, the chat
 * approaches and any client consuming the API. They're organized by domain:
 * - Chat: Messages and conversation input
 * - Overrides: Per-request tuning options
 * - Search: Documents returned by the retrieval service
 * - Responses: The non-streaming envelope and the streamed events
 * - API: Request/response shapes
 *
 * Field names that travel over the wire (data_points, session_state,
 * followup_questions, overrides) keep their snake_case spelling.
 */

// ============================================================================
// Chat Types
// ============================================================================

export type MessageRole = 'system' | 'user' | 'assistant';

export interface TextContentPart {
    type: 'text';
    text: string;
}

export interface ImageContentPart {
    type: 'image_url';
    image_url: {
        url: string;
    };
}

export type MessageContentPart = TextContentPart | ImageContentPart;

/**
 * A single turn of the conversation history.
 * The caller owns the history; the approaches only read it.
 */
export interface Message {
    role: MessageRole;
    content: string | MessageContentPart[];
}

// ============================================================================
// Override Types
// ============================================================================

/**
 * - text: keyword search only
 * - vectors: embedding search only
 * - hybrid: both (same as leaving it unset)
 */
export type RetrievalMode = 'text' | 'vectors' | 'hybrid';

/**
 * Per-request options. Every option is optional and falls back to a
 * documented default; keys not listed here are ignored.
 */
export interface Overrides {
    retrieval_mode?: RetrievalMode | null;
    semantic_ranker?: boolean;
    semantic_captions?: boolean;
    /** Number of search results (default 3) */
    top?: number;
    minimum_search_score?: number;
    minimum_reranker_score?: number;
    seed?: number;
    /** Answer temperature (default 0.3) */
    temperature?: number;
    /** Full replacement template, or text to inject when prefixed with ">>>" */
    prompt_template?: string;
    suggest_followup_questions?: boolean;
    exclude_category?: string;
    use_oid_security_filter?: boolean;
    use_groups_security_filter?: boolean;
}

/**
 * Claims of the authenticated caller, used for document-level access control.
 */
export interface AuthClaims {
    oid?: string;
    groups?: string[];
    [claim: string]: unknown;
}

// ============================================================================
// Search Types
// ============================================================================

export interface SearchCaption {
    text: string;
    highlights?: string | null;
}

/**
 * A ranked document fragment produced by the retrieval service.
 */
export interface SearchResult {
    id: string;
    content: string;
    sourcepage?: string;
    sourcefile?: string;
    category?: string | null;
    embedding?: number[];
    oids?: string[];
    groups?: string[];
    captions: SearchCaption[];
    score?: number;
    rerankerScore?: number;
}

/**
 * Vector query sent alongside (or instead of) the keyword query.
 */
export interface VectorQuery {
    kind: 'vector';
    vector: number[];
    k: number;
    fields: string;
}

// ============================================================================
// Response Types
// ============================================================================

/**
 * A diagnostic record exposing one stage's inputs and parameters.
 */
export interface ThoughtStep {
    title: string;
    content: unknown;
    props: Record<string, unknown>;
}

export interface DataPoints {
    text: string[];
}

export interface ExtraInfo {
    data_points: DataPoints;
    thoughts: ThoughtStep[];
    followup_questions?: string[];
}

export interface ResponseMessage {
    content: string;
    role: string;
}

/**
 * Non-streaming response envelope.
 */
export interface ChatResponse {
    message: ResponseMessage;
    context: ExtraInfo;
    session_state: unknown;
}

export interface StreamDelta {
    content?: string;
    role?: string;
}

/**
 * Context of the trailing stream event, which carries only follow-up
 * questions.
 */
export interface FollowupContext {
    followup_questions: string[];
}

/**
 * One event of a streamed response.
 * The first event always declares the assistant role and carries the full
 * ExtraInfo; content events carry deltas only.
 */
export interface StreamEvent {
    delta: StreamDelta;
    context?: ExtraInfo | FollowupContext;
    session_state?: unknown;
}

// ============================================================================
// API Types
// ============================================================================

export interface ChatRequestContext {
    overrides?: Overrides;
    auth_claims?: AuthClaims;
}

/**
 * Request body for POST /api/chat and POST /api/chat/stream
 */
export interface ChatRequest {
    messages: Message[];
    context?: { overrides?: Overrides };
    session_state?: unknown;
}

/**
 * Response body for GET /api/health
 */
export interface HealthResponse {
    status: 'ok';
    model: string;
    searchIndex: string;
}

/**
 * Body written when a request fails.
 */
export interface ErrorResponse {
    error: string;
    code?: string;
}
