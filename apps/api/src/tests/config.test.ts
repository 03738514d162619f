import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigError, loadConfig } from '../config.js';

describe('loadConfig', () => {
    let dir: string;
    let file: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'taskdeck-config-'));
        file = path.join(dir, 'config.json');
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    function writeConfig(contents: unknown): void {
        fs.writeFileSync(file, typeof contents === 'string' ? contents : JSON.stringify(contents));
    }

    it('falls back to defaults when the file does not exist', () => {
        const config = loadConfig({ file, env: {} });

        expect(config.server).toEqual({
            port: 8080,
            host: 'localhost',
            readTimeoutMs: 15_000,
            writeTimeoutMs: 15_000,
            idleTimeoutMs: 60_000,
        });
        expect(config.app).toEqual({
            name: 'Task Manager API',
            version: '1.0.0',
            debug: false,
            environment: 'development',
            logLevel: 'info',
        });
        expect(config.features.maxTasks).toBe(100);
        expect(config.features.rateLimitPerMin).toBe(60);
        expect(config.features.seedSampleData).toBe(true);
        expect(config.defaults).toEqual({ taskStatus: 'pending', taskPriority: 'medium' });
    });

    it('layers the file under environment overrides', () => {
        writeConfig({
            server: { port: 9000, host: '0.0.0.0' },
            app: { environment: 'staging' },
            features: { max_tasks: 5, seed_sample_data: false },
            defaults: { task_priority: 'high' },
        });

        const config = loadConfig({ file, env: { PORT: ':7070', ENVIRONMENT: 'production' } });

        expect(config.server.port).toBe(7070);
        expect(config.server.host).toBe('0.0.0.0');
        expect(config.app.environment).toBe('production');
        expect(config.features.maxTasks).toBe(5);
        expect(config.features.seedSampleData).toBe(false);
        expect(config.defaults.taskPriority).toBe('high');
    });

    it('ignores non-integer numeric overrides', () => {
        const config = loadConfig({ file, env: { MAX_TASKS: 'lots', RATE_LIMIT_PER_MIN: '2.5' } });
        expect(config.features.maxTasks).toBe(100);
        expect(config.features.rateLimitPerMin).toBe(60);
    });

    it('uses debug logging when debug mode is on', () => {
        expect(loadConfig({ file, env: { DEBUG: 'true' } }).app.logLevel).toBe('debug');
        expect(loadConfig({ file, env: { DEBUG: '1', LOG_LEVEL: 'warn' } }).app.logLevel).toBe('warn');
    });

    it('reads the file named by CONFIG_FILE', () => {
        writeConfig({ app: { name: 'Sprint Board' } });
        expect(loadConfig({ env: { CONFIG_FILE: file } }).app.name).toBe('Sprint Board');
    });

    it('rejects a file that is not JSON', () => {
        writeConfig('{ "server": ');
        expect(() => loadConfig({ file, env: {} })).toThrow(ConfigError);
    });

    it('rejects values of the wrong type', () => {
        writeConfig({ features: { max_tasks: 'many' } });
        expect(() => loadConfig({ file, env: {} })).toThrow(/features\.max_tasks/);
    });

    it('rejects an out-of-range port', () => {
        expect(() => loadConfig({ file, env: { PORT: '70000' } })).toThrow(
            'server port must be an integer between 1 and 65535',
        );
    });

    it('rejects an unknown environment', () => {
        expect(() => loadConfig({ file, env: { ENVIRONMENT: 'qa' } })).toThrow(
            'environment must be one of: development, staging, production',
        );
    });

    it('rejects non-positive limits', () => {
        expect(() => loadConfig({ file, env: { MAX_TASKS: '0' } })).toThrow('max_tasks must be positive');
        expect(() => loadConfig({ file, env: { RATE_LIMIT_PER_MIN: '-3' } })).toThrow(
            'rate_limit_per_min must be positive',
        );
    });

    it('rejects an invalid default status', () => {
        writeConfig({ defaults: { task_status: 'done' } });
        expect(() => loadConfig({ file, env: {} })).toThrow(
            'default task_status must be one of: pending, in-progress, completed, cancelled',
        );
    });

    it('rejects an unknown log level', () => {
        expect(() => loadConfig({ file, env: { LOG_LEVEL: 'verbose' } })).toThrow(
            'log level must be one of: debug, info, warn, error',
        );
    });

    it('rejects log levels inherited from Object.prototype', () => {
        expect(() => loadConfig({ file, env: { LOG_LEVEL: 'toString' } })).toThrow(ConfigError);
        writeConfig({ app: { log_level: 'constructor' } });
        expect(() => loadConfig({ file, env: {} })).toThrow(ConfigError);
    });
});
