import { Router } from 'express';
import type { HistoryController } from '@/controllers/history.controller';

export const createHistoryRoutes = (controller: HistoryController): Router => {
    const router = Router();

    // Query: operationType[], assetId, assetPairId, take, skip
    router.get('/wallet/:walletId', controller.getByWalletId);

    // Query: assetPairId, tradeType, take, skip, from, to
    router.get('/:walletId/trades', controller.getTradesByWalletId);

    // Query: operation[], assetId, take, skip, from, to
    router.get('/:walletId/funds', controller.getFundsByWalletId);

    router.get('/crypto/:assetId/transactions/:transactionHash/links', controller.getExplorerLinks);

    return router;
};
