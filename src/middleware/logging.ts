import { randomUUID } from 'crypto';
import type { Request, Response, NextFunction } from 'express';
import logger from '@/lib/logger';

const REQUEST_ID_HEADER = 'x-request-id';

export const requestLoggingMiddleware = (req: Request, res: Response, next: NextFunction): void => {
    const incomingId = req.get(REQUEST_ID_HEADER);
    req.id = incomingId && incomingId.length <= 128 ? incomingId : randomUUID();
    req.startTime = Date.now();
    res.set(REQUEST_ID_HEADER, req.id);

    logger.info('→ Request', {
        requestId: req.id,
        method: req.method,
        path: req.path,
        ip: req.ip
    });

    // Never log the Authorization header; tokens are credentials
    res.on('finish', () => {
        logger.info('← Response', {
            requestId: req.id,
            clientId: req.principal?.clientId,
            statusCode: res.statusCode,
            durationMs: Date.now() - req.startTime
        });
    });

    next();
};
