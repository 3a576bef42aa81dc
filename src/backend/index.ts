/**
 * Backend module entry point
 *
 * The backend is organized into:
 * - server/: Express app configuration and route handlers
 * - services/: Chat approaches and the helpers they share
 * - clients/: Model and search service clients
 * - config.ts / logger.ts: Environment configuration and logging
 *
 * When run directly, this file loads .env and starts the server.
 * When imported, it exports the server factory functions.
 */

import 'dotenv/config';
import { AppConfig, ConfigError, loadConfig } from './config';
import { logger } from './logger';
import { createServer } from './server';

// Re-export server components
export {
    createApp,
    createServer,
    startServer,
    toErrorResponse,
    chatRequestSchema,
    ApiError,
    DEFAULT_SERVER_CONFIG,
} from './server';

export type { ServerConfig, AuthClaimsResolver } from './server';

// Re-export services
export * from './services';

// Re-export clients
export * from './clients';

export { loadConfig, ConfigError } from './config';

export type { AppConfig, OpenAIConfig, SearchConfig, OpenAIHost } from './config';

export { logger, createLogger } from './logger';

function loadConfigOrExit(): AppConfig {
    try {
        return loadConfig();
    } catch (error) {
        if (error instanceof ConfigError) {
            logger.fatal(error.message);
        } else {
            logger.fatal('Failed to load configuration:', error);
        }
        process.exit(1);
    }
}

// Main entry point - start server when run directly
if (require.main === module) {
    const appConfig = loadConfigOrExit();

    createServer({ appConfig, port: appConfig.port, corsOrigin: appConfig.corsOrigin }, true)
        .then(() => {
            logger.info(`Serving ${appConfig.openai.chatModel} over index ${appConfig.search.index}`);
        })
        .catch((error: unknown) => {
            logger.fatal('Failed to start server:', error);
            process.exit(1);
        });
}
