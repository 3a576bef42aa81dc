/**
 * Express Server Configuration and Routes
 *
 * HTTP layer of the chat orchestrator. Endpoints:
 * - GET  /api/health       configured model and search index
 * - POST /api/chat         one ChatResponse envelope
 * - POST /api/chat/stream  newline-delimited StreamEvents
 *
 * Routes validate the body, resolve the caller's claims and delegate to the
 * chat approach; failures are mapped to status codes in one error handler.
 */

import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { Server } from 'http';
import { APIError } from 'openai';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { AuthClaims, ChatRequest, ErrorResponse, HealthResponse, StreamEvent } from '../../shared/types';
import { IModelClient, ISearchClient } from '../clients';
import { AppConfig, loadConfig } from '../config';
import { createLogger } from '../logger';
import {
    createChatReadRetrieveReadApproach,
    FormatError,
    IChatApproach,
    InputError,
    TokenLimitExceededError,
} from '../services';

const log = createLogger('server');

/**
 * Resolves the authenticated caller's claims for a request.
 */
export type AuthClaimsResolver = (req: Request) => AuthClaims | Promise<AuthClaims>;

/**
 * Server configuration options.
 */
export interface ServerConfig {
    /** Port to listen on */
    port: number;
    /** CORS origin (default: allow all) */
    corsOrigin?: string;
    /** Application configuration; loaded from the environment when omitted */
    appConfig?: AppConfig;
    /** Chat approach instance (for dependency injection) */
    approach?: IChatApproach;
    /** Model client for the default approach; built from appConfig when omitted */
    modelClient?: IModelClient;
    /** Search client for the default approach; built from appConfig when omitted */
    searchClient?: ISearchClient;
    /** Claims resolver; without one every caller is anonymous */
    getAuthClaims?: AuthClaimsResolver;
}

/**
 * Default server configuration.
 */
export const DEFAULT_SERVER_CONFIG: ServerConfig = {
    port: 3001,
    corsOrigin: '*',
};

const anonymousClaims: AuthClaimsResolver = () => ({});

/**
 * Custom error class for API errors.
 * Includes HTTP status code for proper response handling.
 */
export class ApiError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number = 500,
        public readonly code?: string
    ) {
        super(message);
        this.name = 'ApiError';
    }
}

// ============================================================================
// Request validation
// ============================================================================

const contentPartSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('text'), text: z.string() }),
    z.object({ type: z.literal('image_url'), image_url: z.object({ url: z.string() }) }),
]);

const messageSchema = z.object({
    role: z.enum(['system', 'user', 'assistant']),
    content: z.union([z.string(), z.array(contentPartSchema)]),
});

// Unknown override keys are stripped
const overridesSchema = z.object({
    retrieval_mode: z.enum(['text', 'vectors', 'hybrid']).nullish(),
    semantic_ranker: z.boolean().optional(),
    semantic_captions: z.boolean().optional(),
    top: z.number().int().positive().optional(),
    minimum_search_score: z.number().optional(),
    minimum_reranker_score: z.number().optional(),
    seed: z.number().int().optional(),
    temperature: z.number().min(0).max(2).optional(),
    prompt_template: z.string().optional(),
    suggest_followup_questions: z.boolean().optional(),
    exclude_category: z.string().optional(),
    use_oid_security_filter: z.boolean().optional(),
    use_groups_security_filter: z.boolean().optional(),
});

export const chatRequestSchema = z.object({
    messages: z.array(messageSchema).min(1, 'messages must contain at least one message'),
    context: z.object({ overrides: overridesSchema.optional() }).optional(),
    session_state: z.unknown().optional(),
});

function parseChatRequest(body: unknown): ChatRequest {
    const parsed = chatRequestSchema.safeParse(body);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
        throw new ApiError(`${where}${issue?.message ?? 'Invalid request body'}`, 400, 'INVALID_REQUEST');
    }
    return parsed.data;
}

// ============================================================================
// Error mapping
// ============================================================================

const CONTENT_FILTER_MESSAGE = 'Your message contains content that was flagged by the content filter.';

/**
 * Maps an error to a status code and a body safe to show the caller.
 */
export function toErrorResponse(error: unknown): { statusCode: number; body: ErrorResponse } {
    if (error instanceof ApiError) {
        return { statusCode: error.statusCode, body: { error: error.message, code: error.code } };
    }
    // Malformed JSON, rejected by express.json()
    if (error instanceof SyntaxError && 'body' in error) {
        return { statusCode: 400, body: { error: 'Request body is not valid JSON', code: 'INVALID_REQUEST' } };
    }
    if (error instanceof InputError) {
        return { statusCode: 400, body: { error: error.message, code: 'INVALID_INPUT' } };
    }
    if (error instanceof FormatError) {
        return { statusCode: 400, body: { error: error.message, code: 'INVALID_PROMPT_TEMPLATE' } };
    }
    if (error instanceof TokenLimitExceededError) {
        return { statusCode: 400, body: { error: error.message, code: 'TOKEN_LIMIT_EXCEEDED' } };
    }
    if (error instanceof APIError && error.code === 'content_filter') {
        return { statusCode: 400, body: { error: CONTENT_FILTER_MESSAGE, code: 'CONTENT_FILTERED' } };
    }

    const errorType = error instanceof Error ? error.name : typeof error;
    return {
        statusCode: 500,
        body: {
            error: `The app encountered an error processing your request. Error type: ${errorType}`,
            code: 'INTERNAL_ERROR',
        },
    };
}

function requestIdOf(res: Response): string {
    const requestId: unknown = res.locals.requestId;
    return typeof requestId === 'string' ? requestId : '-';
}

/**
 * Creates and configures the Express application.
 *
 * @param config - Server configuration options
 * @returns Configured Express application
 */
export function createApp(config: Partial<ServerConfig> = {}): Express {
    const mergedConfig = { ...DEFAULT_SERVER_CONFIG, ...config };
    const app = express();

    const appConfig = mergedConfig.appConfig ?? loadConfig();
    const approach =
        mergedConfig.approach ??
        createChatReadRetrieveReadApproach(appConfig, {
            modelClient: mergedConfig.modelClient,
            searchClient: mergedConfig.searchClient,
        });
    const getAuthClaims = mergedConfig.getAuthClaims ?? anonymousClaims;

    // =========================================================================
    // Middleware Setup
    // =========================================================================

    app.use(
        cors({
            origin: mergedConfig.corsOrigin,
            methods: ['GET', 'POST'],
            allowedHeaders: ['Content-Type', 'Authorization'],
        })
    );

    app.use(express.json({ limit: '10mb' }));

    // Request logging, tagged with a per-request id
    app.use((req: Request, res: Response, next: NextFunction) => {
        const requestId = uuidv4();
        const startedAt = Date.now();
        res.locals.requestId = requestId;
        res.setHeader('X-Request-Id', requestId);
        res.on('finish', () => {
            log.info(`${req.method} ${req.path} ${res.statusCode} ${Date.now() - startedAt}ms [${requestId}]`);
        });
        next();
    });

    // =========================================================================
    // Health Endpoint
    // =========================================================================

    app.get('/api/health', (_req: Request, res: Response) => {
        const response: HealthResponse = {
            status: 'ok',
            model: appConfig.openai.chatModel,
            searchIndex: appConfig.search.index,
        };
        res.json(response);
    });

    // =========================================================================
    // Chat Endpoints
    // =========================================================================

    /**
     * POST /api/chat
     *
     * Runs the whole pipeline and returns one envelope with the answer,
     * the data points and the thoughts.
     */
    app.post('/api/chat', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const body = parseChatRequest(req.body);
            const authClaims = await getAuthClaims(req);

            const response = await approach.run(body.messages, body.session_state ?? null, {
                overrides: body.context?.overrides ?? {},
                auth_claims: authClaims,
            });

            res.json(response);
        } catch (error) {
            next(error);
        }
    });

    /**
     * POST /api/chat/stream
     *
     * Streams StreamEvents as application/x-ndjson. The first event is
     * pulled before the status line is written, so failures up to the
     * header event still get a regular error response. Later failures are
     * written as a final {"error": ...} line.
     *
     * Once the client disconnects nothing more is pulled or written and the
     * approach's generator is returned, releasing the upstream stream.
     */
    app.post('/api/chat/stream', async (req: Request, res: Response, next: NextFunction) => {
        const requestId = requestIdOf(res);
        let started: AsyncGenerator<StreamEvent> | undefined;
        let clientGone = false;

        const disconnected = new Promise<undefined>((resolve) => {
            res.on('close', () => {
                if (res.writableFinished) {
                    return;
                }
                clientGone = true;
                log.info(`client disconnected, stream abandoned [${requestId}]`);
                void started?.return(undefined).catch((error: unknown) => {
                    log.warn(`stream cleanup failed [${requestId}]`, error);
                });
                resolve(undefined);
            });
        });

        // Resolves undefined when the client leaves first
        const pull = (stream: AsyncGenerator<StreamEvent>): Promise<IteratorResult<StreamEvent> | undefined> => {
            const pending = stream.next();
            void pending.catch((error: unknown) => {
                if (clientGone) {
                    log.debug(`stream failed after disconnect [${requestId}]`, error);
                }
            });
            return Promise.race([pending, disconnected]);
        };

        let events: AsyncGenerator<StreamEvent>;
        let first: IteratorResult<StreamEvent> | undefined;
        try {
            const body = parseChatRequest(req.body);
            const authClaims = await getAuthClaims(req);
            if (clientGone) {
                return;
            }

            events = approach.runStream(body.messages, body.session_state ?? null, {
                overrides: body.context?.overrides ?? {},
                auth_claims: authClaims,
            });
            started = events;
            first = await pull(events);
        } catch (error) {
            if (clientGone) {
                log.debug(`request failed after disconnect [${requestId}]`, error);
                return;
            }
            next(error);
            return;
        }

        if (first === undefined || clientGone) {
            return;
        }

        res.status(200);
        res.setHeader('Content-Type', 'application/x-ndjson');

        try {
            let result: IteratorResult<StreamEvent> = first;
            while (!result.done) {
                res.write(`${JSON.stringify(result.value)}\n`);
                const pulled = await pull(events);
                if (pulled === undefined || clientGone) {
                    return;
                }
                result = pulled;
            }
        } catch (error) {
            if (clientGone) {
                return;
            }
            log.error(`stream failed [${requestId}]`, error);
            res.write(`${JSON.stringify(toErrorResponse(error).body)}\n`);
        }
        res.end();
    });

    // =========================================================================
    // Error Handling Middleware
    // =========================================================================

    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        const { statusCode, body } = toErrorResponse(err);
        if (statusCode >= 500) {
            log.error(`request failed [${requestIdOf(res)}]`, err);
        } else {
            log.warn(`request rejected: ${body.error} [${requestIdOf(res)}]`);
        }
        res.status(statusCode).json(body);
    });

    return app;
}

/**
 * Starts the Express server.
 *
 * @param app - The Express application to start
 * @param port - Port to listen on (0 picks a free port)
 * @returns Promise that resolves with the listening server
 */
export function startServer(app: Express, port: number = DEFAULT_SERVER_CONFIG.port): Promise<Server> {
    return new Promise((resolve, reject) => {
        const server = app.listen(port, () => {
            log.info(`Chat server running on port ${port}`);
            log.info(`Health check: http://localhost:${port}/api/health`);
            resolve(server);
        });
        server.on('error', reject);
    });
}

/**
 * Factory function to create and optionally start the server.
 *
 * @param config - Server configuration
 * @param autoStart - Whether to start the server immediately
 * @returns The Express app (and starts listening if autoStart is true)
 */
export async function createServer(
    config: Partial<ServerConfig> = {},
    autoStart: boolean = false
): Promise<Express> {
    const app = createApp(config);

    if (autoStart) {
        const port = config.port ?? config.appConfig?.port ?? DEFAULT_SERVER_CONFIG.port;
        await startServer(app, port);
    }

    return app;
}
