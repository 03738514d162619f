import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Logger } from '../logger.js';
import { clientKey } from './rate-limit.js';

const SLOW_REQUEST_MS = 1000;

/** Logs one line per completed request and warns when it took longer than a second. */
export function requestLogger(logger: Logger): RequestHandler {
    return (req: Request, res: Response, next: NextFunction) => {
        const started = process.hrtime.bigint();
        logger.debug('Request started', {
            method: req.method,
            url: req.originalUrl,
            client: clientKey(req),
            userAgent: req.get('user-agent'),
        });

        res.on('finish', () => {
            const durationMs = Number(process.hrtime.bigint() - started) / 1e6;
            const entry = {
                method: req.method,
                path: req.originalUrl.split('?')[0],
                status: res.statusCode,
                durationMs: Math.round(durationMs * 100) / 100,
                client: clientKey(req),
            };
            logger.info(`${entry.method} ${entry.path} ${entry.status}`, entry);

            if (durationMs > SLOW_REQUEST_MS) {
                logger.warn('Slow request detected', entry);
            }
        });

        next();
    };
}
