/**
 * Application configuration
 *
 * Everything the backend needs from the environment is read and validated
 * here, once, at startup. A missing endpoint or a malformed number fails
 * fast with every problem listed instead of surfacing on the first request.
 *
 * Values come from process.env; the entry point loads `.env` through dotenv
 * before this module is evaluated.
 */

import * as fs from 'fs';
import { z } from 'zod';
import { PromptTemplates } from './services/promptTemplates';

const booleanFlag = z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .transform((value) => value === 'true' || value === '1' || value === 'yes');

const optionalString = z
    .string()
    .optional()
    .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const envSchema = z
    .object({
        OPENAI_HOST: z.enum(['openai', 'azure']).default('azure'),
        OPENAI_API_KEY: optionalString,
        AZURE_OPENAI_ENDPOINT: optionalString,
        AZURE_OPENAI_API_KEY: optionalString,
        AZURE_OPENAI_API_VERSION: z.string().default('2024-06-01'),
        OPENAI_CHATGPT_MODEL: z.string().default('gpt-35-turbo'),
        AZURE_OPENAI_CHATGPT_DEPLOYMENT: optionalString,
        OPENAI_EMB_MODEL: z.string().default('text-embedding-ada-002'),
        AZURE_OPENAI_EMB_DEPLOYMENT: optionalString,
        OPENAI_EMB_DIMENSIONS: z.coerce.number().int().positive().default(1536),

        AZURE_SEARCH_ENDPOINT: z.string().url(),
        AZURE_SEARCH_INDEX: z.string().min(1),
        AZURE_SEARCH_KEY: optionalString,
        AZURE_SEARCH_API_VERSION: z.string().default('2024-07-01'),
        AZURE_SEARCH_QUERY_LANGUAGE: z.string().default('en-us'),
        AZURE_SEARCH_QUERY_SPELLER: z.string().default('lexicon'),
        KB_FIELDS_CONTENT: z.string().default('content'),
        KB_FIELDS_SOURCEPAGE: z.string().default('sourcepage'),
        AZURE_ENFORCE_ACCESS_CONTROL: booleanFlag.default('false'),
        AZURE_SEARCH_HAS_AUTH_FIELDS: booleanFlag.default('false'),
        ALLOW_NON_GPT_MODELS: booleanFlag.default('true'),

        CHAT_SYSTEM_PROMPT_FILE: optionalString,
        QUERY_PROMPT_FILE: optionalString,

        PORT: z.coerce.number().int().min(0).max(65535).default(3001),
        CORS_ORIGIN: z.string().default('*'),
    })
    .superRefine((env, ctx) => {
        if (env.OPENAI_HOST === 'openai' && !env.OPENAI_API_KEY) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['OPENAI_API_KEY'],
                message: 'OPENAI_API_KEY is required when OPENAI_HOST=openai',
            });
        }
        if (env.OPENAI_HOST === 'azure' && !env.AZURE_OPENAI_ENDPOINT) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['AZURE_OPENAI_ENDPOINT'],
                message: 'AZURE_OPENAI_ENDPOINT is required when OPENAI_HOST=azure',
            });
        }
    });

export type OpenAIHost = 'openai' | 'azure';

export interface OpenAIConfig {
    host: OpenAIHost;
    apiKey?: string;
    azureEndpoint?: string;
    azureApiVersion: string;
    chatModel: string;
    chatDeployment?: string;
    embeddingModel: string;
    embeddingDeployment?: string;
    embeddingDimensions: number;
    allowNonGptModels: boolean;
}

export interface SearchConfig {
    endpoint: string;
    index: string;
    apiKey?: string;
    apiVersion: string;
    queryLanguage: string;
    querySpeller: string;
    contentField: string;
    sourcepageField: string;
    requireAccessControl: boolean;
    hasAuthFields: boolean;
}

export interface AppConfig {
    openai: OpenAIConfig;
    search: SearchConfig;
    prompts: Partial<PromptTemplates>;
    port: number;
    corsOrigin: string;
}

/**
 * Thrown when the environment does not describe a runnable deployment.
 */
export class ConfigError extends Error {
    constructor(message: string, public readonly issues: string[] = []) {
        super(message);
        this.name = 'ConfigError';
    }
}

function readPromptFile(filePath: string | undefined, variable: string): string | undefined {
    if (!filePath) {
        return undefined;
    }
    if (!fs.existsSync(filePath)) {
        throw new ConfigError(`${variable} points to a missing file: ${filePath}`);
    }
    return fs.readFileSync(filePath, 'utf-8');
}

/**
 * Builds the typed configuration from an environment map.
 *
 * @param env - Defaults to process.env; tests pass their own map
 * @throws ConfigError listing every invalid or missing variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(
            (issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`
        );
        throw new ConfigError(`Invalid configuration:\n  ${issues.join('\n  ')}`, issues);
    }

    const values = parsed.data;
    const isAzure = values.OPENAI_HOST === 'azure';

    const prompts: Partial<PromptTemplates> = {};
    const systemTemplate = readPromptFile(values.CHAT_SYSTEM_PROMPT_FILE, 'CHAT_SYSTEM_PROMPT_FILE');
    if (systemTemplate !== undefined) {
        prompts.systemMessageTemplate = systemTemplate;
    }
    const queryPrompt = readPromptFile(values.QUERY_PROMPT_FILE, 'QUERY_PROMPT_FILE');
    if (queryPrompt !== undefined) {
        prompts.queryPromptTemplate = queryPrompt;
    }

    return {
        openai: {
            host: values.OPENAI_HOST,
            apiKey: isAzure ? values.AZURE_OPENAI_API_KEY : values.OPENAI_API_KEY,
            azureEndpoint: values.AZURE_OPENAI_ENDPOINT,
            azureApiVersion: values.AZURE_OPENAI_API_VERSION,
            chatModel: values.OPENAI_CHATGPT_MODEL,
            // Deployment names only mean something to Azure OpenAI
            chatDeployment: isAzure ? values.AZURE_OPENAI_CHATGPT_DEPLOYMENT : undefined,
            embeddingModel: values.OPENAI_EMB_MODEL,
            embeddingDeployment: isAzure ? values.AZURE_OPENAI_EMB_DEPLOYMENT : undefined,
            embeddingDimensions: values.OPENAI_EMB_DIMENSIONS,
            allowNonGptModels: values.ALLOW_NON_GPT_MODELS,
        },
        search: {
            endpoint: values.AZURE_SEARCH_ENDPOINT,
            index: values.AZURE_SEARCH_INDEX,
            apiKey: values.AZURE_SEARCH_KEY,
            apiVersion: values.AZURE_SEARCH_API_VERSION,
            queryLanguage: values.AZURE_SEARCH_QUERY_LANGUAGE,
            querySpeller: values.AZURE_SEARCH_QUERY_SPELLER,
            contentField: values.KB_FIELDS_CONTENT,
            sourcepageField: values.KB_FIELDS_SOURCEPAGE,
            requireAccessControl: values.AZURE_ENFORCE_ACCESS_CONTROL,
            hasAuthFields: values.AZURE_SEARCH_HAS_AUTH_FIELDS,
        },
        prompts,
        port: values.PORT,
        corsOrigin: values.CORS_ORIGIN,
    };
}
