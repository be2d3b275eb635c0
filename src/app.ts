import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { StatusCodes } from 'http-status-codes';
import type { AuthenticationHandler } from '@/auth/types';
import { HistoryController, type HistoryControllerDependencies } from '@/controllers/history.controller';
import { authenticate } from '@/middleware/authenticate';
import { requestLoggingMiddleware } from '@/middleware/logging';
import { responseEnvelopeMiddleware } from '@/middleware/response';
import { createRoutes } from '@/routes';

export interface AppDependencies {
    authHandlers: AuthenticationHandler[];
    clients: HistoryControllerDependencies;
}

export const createApp = ({ authHandlers, clients }: AppDependencies): Express => {
    const app = express();

    app.use(helmet());
    app.use(cors());
    app.use(express.json());

    app.use(requestLoggingMiddleware);
    app.use(responseEnvelopeMiddleware);

    // Health
    app.get('/health', (_req, res) => {
        res.json({ status: 'OK', timestamp: new Date().toISOString() });
    });

    // Routes
    app.use('/api', authenticate(...authHandlers), createRoutes({ history: new HistoryController(clients) }));

    // 404 fallback
    app.use((_req, res) => {
        res.status(StatusCodes.NOT_FOUND).json({
            status: 'FAILED',
            error: 'Route not found',
            timestamp: new Date().toISOString()
        });
    });

    return app;
};
