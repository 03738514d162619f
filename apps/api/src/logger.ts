export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export type LogSink = (line: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

/**
 * One JSON object per line: level, timestamp, service, message, then any
 * context fields. Entries below the configured level are dropped.
 */
export class Logger {
    constructor(
        private readonly service: string,
        private readonly level: LogLevel = 'info',
        private readonly sink: LogSink = (line) => console.log(line),
        private readonly baseContext: LogContext = {},
    ) { }

    child(context: LogContext): Logger {
        return new Logger(this.service, this.level, this.sink, { ...this.baseContext, ...context });
    }

    isEnabled(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
    }

    debug(message: string, context?: LogContext): void {
        this.log('debug', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.log('info', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.log('warn', message, context);
    }

    error(message: string, error?: unknown, context?: LogContext): void {
        const errorContext = error instanceof Error
            ? { error: { name: error.name, message: error.message, stack: error.stack } }
            : error !== undefined ? { error: String(error) } : {};
        this.log('error', message, { ...context, ...errorContext });
    }

    private log(level: LogLevel, message: string, context?: LogContext): void {
        if (!this.isEnabled(level)) return;

        const entry: LogContext = {
            level,
            timestamp: new Date().toISOString(),
            service: this.service,
            message,
            ...this.baseContext,
            ...context,
        };

        for (const key of Object.keys(entry)) {
            if (entry[key] === undefined) delete entry[key];
        }

        this.sink(JSON.stringify(entry));
    }
}
