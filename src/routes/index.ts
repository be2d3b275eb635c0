import { Router } from 'express';
import { createV1Routes, type V1Controllers } from '@/routes/v1';

export const createRoutes = (controllers: V1Controllers): Router => {
    const router = Router();

    router.use('/', createV1Routes(controllers));

    return router;
};
