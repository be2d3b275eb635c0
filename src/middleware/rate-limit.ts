import type { Request, Response, NextFunction } from 'express';
import rateLimit from 'express-rate-limit';
import logger from '@/lib/logger';
import { RATE_LIMITS } from '@/constants';

export const apiLimiter = rateLimit({
    windowMs: RATE_LIMITS.API.windowMs,
    limit: RATE_LIMITS.API.max,
    standardHeaders: true,
    legacyHeaders: false,
    skip: (req) => req.path === '/health',
    // Authenticated callers are limited per client rather than per address
    keyGenerator: (req) => req.principal?.clientId ?? req.ip ?? 'unknown',
    handler: (req: Request, res: Response, _next: NextFunction, options) => {
        logger.warn('Rate limit exceeded', { ip: req.ip, path: req.path, clientId: req.principal?.clientId });
        res.status(options.statusCode).json({
            status: 'RATE_LIMITED',
            error: options.message
        });
    }
});
