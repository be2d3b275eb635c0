import type { Request, Response, NextFunction } from 'express';

export interface ApiResponse<T = unknown> {
    status: 'SUCCESS' | 'FAILED' | 'RATE_LIMITED';
    data?: T;
    error?: string | Record<string, unknown>;
    timestamp: string;
    requestId?: string;
}

const isEnvelope = (data: unknown): data is object =>
    typeof data === 'object' && data !== null && !Array.isArray(data) && ('status' in data || 'error' in data);

export const responseEnvelopeMiddleware = (req: Request, res: Response, next: NextFunction): void => {
    const originalJson = res.json.bind(res);

    res.json = function (data: unknown): Response {
        if (isEnvelope(data)) {
            return originalJson({ ...data, requestId: req.id });
        }

        const envelope: ApiResponse = {
            status: res.statusCode >= 400 ? 'FAILED' : 'SUCCESS',
            data,
            timestamp: new Date().toISOString(),
            requestId: req.id
        };

        return originalJson(envelope);
    };

    next();
};

export const errorResponse = (error: string | Record<string, unknown>): ApiResponse => ({
    status: 'FAILED',
    error,
    timestamp: new Date().toISOString()
});
