import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { StatusCodes } from 'http-status-codes';
import type { AuthenticationHandler, Principal } from '@/auth/types';
import { AUTH } from '@/constants';
import { UnauthorizedError } from '@/errors/app-error';
import { errorResponse } from '@/middleware/response';
import logger from '@/lib/logger';

export interface RequestContext {
    clientId: string;
    requestId: string;
    principal: Principal;
}

/**
 * Runs the authentication handlers in order. The first `success` wins,
 * `no-result` falls through and a `failure` ends the request with 401.
 * When nobody recognises the caller the request continues anonymous.
 */
export const authenticate = (...handlers: AuthenticationHandler[]): RequestHandler =>
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        const controller = new AbortController();
        res.once('close', () => {
            if (!res.writableFinished) controller.abort();
        });

        const authRequest = {
            authorization: req.headers.authorization,
            requestId: req.id,
            signal: controller.signal
        };

        try {
            for (const handler of handlers) {
                const outcome = await handler.authenticate(authRequest);

                if (outcome.kind === 'success') {
                    req.principal = outcome.principal;
                    logger.debug('Request authenticated', {
                        requestId: req.id,
                        handler: handler.name,
                        clientId: outcome.principal.clientId
                    });
                    break;
                }

                if (outcome.kind === 'failure') {
                    logger.info('Authentication rejected', { requestId: req.id, handler: handler.name, reason: outcome.reason });
                    res.status(StatusCodes.UNAUTHORIZED)
                        .set('WWW-Authenticate', AUTH.SCHEME)
                        .json(errorResponse(outcome.reason));
                    return;
                }
            }

            next();
        } catch (error: unknown) {
            next(error);
        }
    };

export const requireAuth = (req: Request, res: Response, next: NextFunction): void => {
    if (!req.principal) {
        res.status(StatusCodes.UNAUTHORIZED)
            .set('WWW-Authenticate', AUTH.SCHEME)
            .json(errorResponse('Unauthorized'));
        return;
    }
    next();
};

export const getRequestContext = (req: Request): RequestContext => {
    if (!req.principal) {
        throw new UnauthorizedError();
    }
    return { clientId: req.principal.clientId, requestId: req.id, principal: req.principal };
};
