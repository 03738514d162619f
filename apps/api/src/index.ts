import dotenv from 'dotenv';
import type { Server } from 'http';
import path from 'path';
import { fileURLToPath } from 'url';
import { CapacityError } from '@taskdeck/domain';
import { InMemoryTaskStore, seedSampleTasks } from '@taskdeck/infrastructure';
import { createApp } from './app.js';
import { ConfigError, loadConfig } from './config.js';
import type { AppConfig } from './config.js';
import { Logger } from './logger.js';
import { RateLimiter } from './middleware/rate-limit.js';

const SERVICE_NAME = 'taskdeck-api';
const SHUTDOWN_GRACE_MS = 30_000;

const __dirname = path.dirname(fileURLToPath(import.meta.url));
dotenv.config({ path: path.join(__dirname, '../../../.env') });
dotenv.config();

function closeServer(server: Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
    });
}

function loadConfigOrExit(): AppConfig {
    try {
        return loadConfig();
    } catch (err) {
        if (err instanceof ConfigError) {
            new Logger(SERVICE_NAME).error('Failed to load configuration', err);
            process.exit(1);
        }
        throw err;
    }
}

async function main(): Promise<void> {
    const config = loadConfigOrExit();

    const logger = new Logger(SERVICE_NAME, config.app.logLevel, undefined, { environment: config.app.environment });
    const store = new InMemoryTaskStore({
        maxTasks: config.features.maxTasks,
        defaultStatus: config.defaults.taskStatus,
        defaultPriority: config.defaults.taskPriority,
    });

    if (config.features.seedSampleData) {
        try {
            const seeded = await seedSampleTasks(store);
            logger.info('Loaded sample tasks', { count: seeded.length });
        } catch (err) {
            if (!(err instanceof CapacityError)) throw err;
            logger.warn('Sample data truncated by task limit', { maxTasks: err.limit });
        }
    }

    const rateLimiter = new RateLimiter({ requestsPerMinute: config.features.rateLimitPerMin });
    rateLimiter.start();

    const app = createApp({ config, store, logger, rateLimiter });
    const { port, host, readTimeoutMs, writeTimeoutMs, idleTimeoutMs } = config.server;

    const server = app.listen(port, host, () => {
        logger.info(`${config.app.name} v${config.app.version} listening`, {
            url: `http://${host}:${port}`,
            maxTasks: config.features.maxTasks,
            rateLimitPerMin: config.features.rateLimitPerMin,
        });
    });
    server.requestTimeout = readTimeoutMs + writeTimeoutMs;
    server.headersTimeout = readTimeoutMs;
    server.keepAliveTimeout = idleTimeoutMs;

    let shuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info('Shutting down', { signal });

        const forced = setTimeout(() => {
            logger.error('Graceful shutdown timed out, forcing exit');
            process.exit(1);
        }, SHUTDOWN_GRACE_MS);
        forced.unref();

        rateLimiter.stop();
        try {
            await closeServer(server);
            logger.info('Server stopped');
            process.exit(0);
        } catch (err) {
            logger.error('Error while closing server', err);
            process.exit(1);
        }
    };

    process.on('SIGINT', () => void shutdown('SIGINT'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
    new Logger(SERVICE_NAME).error('Fatal startup error', err);
    process.exit(1);
});
