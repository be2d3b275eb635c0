import { Router } from 'express';
import { createHistoryRoutes } from '@/routes/v1/history.routes';
import type { HistoryController } from '@/controllers/history.controller';
import { requireAuth } from '@/middleware/authenticate';
import { apiLimiter } from '@/middleware/rate-limit';

export interface V1Controllers {
    history: HistoryController;
}

export const createV1Routes = (controllers: V1Controllers): Router => {
    const router = Router();

    router.use(requireAuth, apiLimiter);
    router.use('/history', createHistoryRoutes(controllers.history));

    return router;
};
