import type { ErrorRequestHandler, Request, Response } from 'express';
import { ZodError } from 'zod';
import { CapacityError, NotFoundError, ValidationError } from '@taskdeck/domain';
import type { Logger } from '../logger.js';
import { RateLimitError } from '../middleware/rate-limit.js';
import { sendError } from './response.js';

export class InvalidTaskIdError extends Error {
    constructor() {
        super('Invalid task ID');
        this.name = 'InvalidTaskIdError';
    }
}

function isJsonParseFailure(err: unknown): boolean {
    return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

/** Single place where errors become HTTP statuses. */
export function errorHandler(logger: Logger): ErrorRequestHandler {
    return (err: unknown, req: Request, res: Response, _next) => {
        if (err instanceof RateLimitError) {
            res.setHeader('Retry-After', String(err.retryAfter));
            sendError(res, 429, err.message);
            return;
        }
        if (err instanceof NotFoundError) {
            sendError(res, 404, err.message);
            return;
        }
        if (err instanceof ValidationError || err instanceof CapacityError || err instanceof InvalidTaskIdError) {
            sendError(res, 400, err.message);
            return;
        }
        if (err instanceof ZodError) {
            sendError(res, 400, err.issues[0]?.message ?? 'Invalid request body');
            return;
        }
        if (isJsonParseFailure(err)) {
            sendError(res, 400, 'Invalid JSON format');
            return;
        }

        logger.error('Unhandled request error', err, { method: req.method, path: req.path });
        sendError(res, 500, 'Internal server error');
    };
}

export function notFoundHandler(req: Request, res: Response): void {
    sendError(res, 404, `Endpoint not found: ${req.method} ${req.path}`);
}
