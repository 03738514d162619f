import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import {
    TASK_PRIORITIES,
    TASK_STATUSES,
    TaskPriority,
    TaskStatus,
    isTaskPriority,
    isTaskStatus,
    validateOneOf,
} from '@taskdeck/domain';
import { LOG_LEVELS, isLogLevel } from './logger.js';
import type { LogLevel } from './logger.js';

export const ENVIRONMENTS = ['development', 'staging', 'production'] as const;

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export interface AppConfig {
    server: {
        port: number;
        host: string;
        readTimeoutMs: number;
        writeTimeoutMs: number;
        idleTimeoutMs: number;
    };
    app: {
        name: string;
        version: string;
        debug: boolean;
        environment: string;
        logLevel: LogLevel;
    };
    features: {
        enableCors: boolean;
        enableLogging: boolean;
        maxTasks: number;
        rateLimitPerMin: number;
        seedSampleData: boolean;
    };
    defaults: {
        taskStatus: TaskStatus;
        taskPriority: TaskPriority;
    };
}

// Shape of config.json. Every key is optional; unknown keys are ignored.
const configFileSchema = z.object({
    server: z.object({
        port: z.union([z.number().int(), z.string()]),
        host: z.string(),
        read_timeout_ms: z.number().int().nonnegative(),
        write_timeout_ms: z.number().int().nonnegative(),
        idle_timeout_ms: z.number().int().nonnegative(),
    }).partial(),
    app: z.object({
        name: z.string(),
        version: z.string(),
        debug: z.boolean(),
        environment: z.string(),
        log_level: z.string(),
    }).partial(),
    features: z.object({
        enable_cors: z.boolean(),
        enable_logging: z.boolean(),
        max_tasks: z.number().int(),
        rate_limit_per_min: z.number().int(),
        seed_sample_data: z.boolean(),
    }).partial(),
    defaults: z.object({
        task_status: z.string(),
        task_priority: z.string(),
    }).partial(),
}).partial();

type ConfigFile = z.infer<typeof configFileSchema>;

/** Raw layered values, before the enum-typed fields have been checked. */
interface DraftConfig {
    server: AppConfig['server'];
    app: Omit<AppConfig['app'], 'logLevel'> & { logLevel?: string };
    features: AppConfig['features'];
    defaults: { taskStatus: string; taskPriority: string };
}

export function defaultConfig(): DraftConfig {
    return {
        server: {
            port: 8080,
            host: 'localhost',
            readTimeoutMs: 15_000,
            writeTimeoutMs: 15_000,
            idleTimeoutMs: 60_000,
        },
        app: {
            name: 'Task Manager API',
            version: '1.0.0',
            debug: false,
            environment: 'development',
        },
        features: {
            enableCors: true,
            enableLogging: true,
            maxTasks: 100,
            rateLimitPerMin: 60,
            seedSampleData: true,
        },
        defaults: {
            taskStatus: TaskStatus.PENDING,
            taskPriority: TaskPriority.MEDIUM,
        },
    };
}

function parsePort(value: string | number): number {
    if (typeof value === 'number') return value;
    const trimmed = value.trim().replace(/^:/, '');
    return /^\d+$/.test(trimmed) ? Number(trimmed) : Number.NaN;
}

function parseInteger(value: string | undefined): number | undefined {
    if (value === undefined || !/^-?\d+$/.test(value.trim())) return undefined;
    return Number(value.trim());
}

function readConfigFile(file: string): ConfigFile {
    let raw: string;
    try {
        raw = fs.readFileSync(file, 'utf8');
    } catch (err) {
        if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
            return {};
        }
        throw new ConfigError(`failed to read config file ${file}: ${err instanceof Error ? err.message : String(err)}`);
    }

    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (err) {
        throw new ConfigError(`config file ${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }

    const parsed = configFileSchema.safeParse(json);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue ? issue.path.join('.') : '';
        throw new ConfigError(`config file ${file} is invalid at ${where}: ${issue?.message ?? 'unknown error'}`);
    }
    return parsed.data;
}

function applyFile(config: DraftConfig, file: ConfigFile): void {
    const { server, app, features, defaults } = file;

    if (server?.port !== undefined) config.server.port = parsePort(server.port);
    if (server?.host !== undefined) config.server.host = server.host;
    if (server?.read_timeout_ms !== undefined) config.server.readTimeoutMs = server.read_timeout_ms;
    if (server?.write_timeout_ms !== undefined) config.server.writeTimeoutMs = server.write_timeout_ms;
    if (server?.idle_timeout_ms !== undefined) config.server.idleTimeoutMs = server.idle_timeout_ms;

    if (app?.name !== undefined) config.app.name = app.name;
    if (app?.version !== undefined) config.app.version = app.version;
    if (app?.debug !== undefined) config.app.debug = app.debug;
    if (app?.environment !== undefined) config.app.environment = app.environment;
    if (app?.log_level !== undefined) config.app.logLevel = app.log_level;

    if (features?.enable_cors !== undefined) config.features.enableCors = features.enable_cors;
    if (features?.enable_logging !== undefined) config.features.enableLogging = features.enable_logging;
    if (features?.max_tasks !== undefined) config.features.maxTasks = features.max_tasks;
    if (features?.rate_limit_per_min !== undefined) config.features.rateLimitPerMin = features.rate_limit_per_min;
    if (features?.seed_sample_data !== undefined) config.features.seedSampleData = features.seed_sample_data;

    if (defaults?.task_status !== undefined) config.defaults.taskStatus = defaults.task_status;
    if (defaults?.task_priority !== undefined) config.defaults.taskPriority = defaults.task_priority;
}

function applyEnv(config: DraftConfig, env: NodeJS.ProcessEnv): void {
    if (env.PORT) config.server.port = parsePort(env.PORT);
    if (env.HOST) config.server.host = env.HOST;
    if (env.DEBUG) config.app.debug = env.DEBUG === 'true' || env.DEBUG === '1';
    if (env.ENVIRONMENT) config.app.environment = env.ENVIRONMENT;
    if (env.LOG_LEVEL) config.app.logLevel = env.LOG_LEVEL;

    const maxTasks = parseInteger(env.MAX_TASKS);
    if (maxTasks !== undefined) config.features.maxTasks = maxTasks;

    const rateLimit = parseInteger(env.RATE_LIMIT_PER_MIN);
    if (rateLimit !== undefined) config.features.rateLimitPerMin = rateLimit;
}

function validate(config: DraftConfig): AppConfig {
    const { server, app, features, defaults } = config;

    if (!Number.isInteger(server.port) || server.port < 1 || server.port > 65535) {
        throw new ConfigError('server port must be an integer between 1 and 65535');
    }
    if (!app.name.trim()) throw new ConfigError('app name is required');
    if (!app.version.trim()) throw new ConfigError('app version is required');

    const environmentFailure = validateOneOf('environment', app.environment, ENVIRONMENTS);
    if (environmentFailure) throw new ConfigError(environmentFailure);

    if (features.maxTasks <= 0) throw new ConfigError('max_tasks must be positive');
    if (features.rateLimitPerMin <= 0) throw new ConfigError('rate_limit_per_min must be positive');

    const { taskStatus, taskPriority } = defaults;
    if (!isTaskStatus(taskStatus)) {
        throw new ConfigError(validateOneOf('default task_status', taskStatus, TASK_STATUSES) ?? 'invalid default task_status');
    }
    if (!isTaskPriority(taskPriority)) {
        throw new ConfigError(
            validateOneOf('default task_priority', taskPriority, TASK_PRIORITIES) ?? 'invalid default task_priority',
        );
    }

    const requestedLevel = app.logLevel ?? (app.debug ? 'debug' : 'info');
    if (!isLogLevel(requestedLevel)) {
        throw new ConfigError(validateOneOf('log level', requestedLevel, LOG_LEVELS) ?? 'invalid log level');
    }

    return {
        server,
        app: { ...app, logLevel: requestedLevel },
        features,
        defaults: { taskStatus, taskPriority },
    };
}

export interface LoadConfigOptions {
    file?: string;
    env?: NodeJS.ProcessEnv;
}

/**
 * Defaults, then the JSON file (missing file is fine), then environment
 * overrides, then validation.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
    const env = options.env ?? process.env;
    const file = options.file ?? env.CONFIG_FILE ?? path.resolve(process.cwd(), 'config.json');

    const config = defaultConfig();
    applyFile(config, readConfigFile(file));
    applyEnv(config, env);
    return validate(config);
}
