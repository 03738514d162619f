import type { Response } from 'express';

export interface ApiResponse<T = unknown> {
    success: boolean;
    data?: T;
    error?: string;
    timestamp: string;
}

export function sendJson<T>(res: Response, status: number, body: ApiResponse<T>): void {
    res.status(status).json(body);
}

export function sendSuccess<T>(res: Response, data: T): void {
    sendJson(res, 200, { success: true, data, timestamp: new Date().toISOString() });
}

export function sendCreated<T>(res: Response, data: T): void {
    sendJson(res, 201, { success: true, data, timestamp: new Date().toISOString() });
}

export function sendNoContent(res: Response): void {
    res.status(204).end();
}

export function sendError(res: Response, status: number, message: string): void {
    sendJson(res, status, { success: false, error: message, timestamp: new Date().toISOString() });
}
