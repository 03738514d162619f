/**
 * Per-client rate limiting over a sliding one-minute window, kept in memory.
 */
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Logger } from '../logger.js';

const WINDOW_MS = 60_000;
const CLEANUP_INTERVAL_MS = 5 * 60_000;
const IDLE_CLIENT_MS = 10 * 60_000;

export interface RateLimitConfig {
    requestsPerMinute: number;
    now?: () => number;
}

export class RateLimitError extends Error {
    constructor(
        message: string,
        public readonly retryAfter: number,
    ) {
        super(message);
        this.name = 'RateLimitError';
    }
}

interface ClientWindow {
    requests: number[];
    lastSeen: number;
}

export interface RateLimitDecision {
    limit: number;
    remaining: number;
}

export class RateLimiter {
    private readonly clients: Map<string, ClientWindow> = new Map();
    private readonly now: () => number;
    private cleanupTimer: NodeJS.Timeout | null = null;

    constructor(private readonly config: RateLimitConfig) {
        this.now = config.now ?? Date.now;
    }

    get limit(): number {
        return this.config.requestsPerMinute;
    }

    /** Records a request for `clientId`, or throws when the client is over its limit. */
    checkLimit(clientId: string): RateLimitDecision {
        const now = this.now();
        const client = this.clients.get(clientId) ?? { requests: [], lastSeen: now };
        client.requests = client.requests.filter((at) => at > now - WINDOW_MS);
        client.lastSeen = now;
        this.clients.set(clientId, client);

        if (client.requests.length >= this.limit) {
            throw new RateLimitError('Rate limit exceeded', WINDOW_MS / 1000);
        }

        client.requests.push(now);
        return { limit: this.limit, remaining: Math.max(0, this.limit - client.requests.length) };
    }

    /** Forgets clients that have been silent for ten minutes. Returns how many were dropped. */
    purgeIdleClients(): number {
        const cutoff = this.now() - IDLE_CLIENT_MS;
        let purged = 0;
        for (const [clientId, client] of this.clients) {
            if (client.lastSeen < cutoff) {
                this.clients.delete(clientId);
                purged++;
            }
        }
        return purged;
    }

    get trackedClients(): number {
        return this.clients.size;
    }

    start(): void {
        if (this.cleanupTimer) return;
        this.cleanupTimer = setInterval(() => this.purgeIdleClients(), CLEANUP_INTERVAL_MS);
        this.cleanupTimer.unref();
    }

    stop(): void {
        if (this.cleanupTimer) {
            clearInterval(this.cleanupTimer);
            this.cleanupTimer = null;
        }
    }
}

export function clientKey(req: Request): string {
    // The left-most X-Forwarded-For entry is the originating client.
    const forwarded = req.get('x-forwarded-for')?.split(',')[0]?.trim();
    if (forwarded) return forwarded;

    const realIp = req.get('x-real-ip');
    if (realIp) return realIp;

    return req.socket.remoteAddress ?? 'unknown';
}

export function rateLimit(limiter: RateLimiter, logger: Logger): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        const client = clientKey(req);
        res.setHeader('X-RateLimit-Limit', String(limiter.limit));

        try {
            const decision = limiter.checkLimit(client);
            res.setHeader('X-RateLimit-Remaining', String(decision.remaining));
            next();
        } catch (err) {
            if (err instanceof RateLimitError) {
                logger.warn('Rate limit exceeded', { client, path: req.path });
                res.setHeader('X-RateLimit-Remaining', '0');
            }
            next(err);
        }
    };
}
