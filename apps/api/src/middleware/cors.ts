import cors from 'cors';
import type { CorsOptions } from 'cors';
import type { RequestHandler } from 'express';

export const CORS_OPTIONS: CorsOptions = {
    origin: '*',
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With'],
    maxAge: 86400,
    optionsSuccessStatus: 200,
};

export function corsMiddleware(): RequestHandler {
    return cors(CORS_OPTIONS);
}
