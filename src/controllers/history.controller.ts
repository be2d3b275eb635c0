import type { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import type { AccountClient, AssetsClient, ExplorerLinkProvider, HistoryClient } from '@/clients/types';
import {
    fundsQuerySchema,
    FUNDS_OPERATIONS,
    isValidDateRange,
    tradesQuerySchema,
    walletHistoryQuerySchema
} from '@/validators/history.validator';
import {
    byTimestampDesc,
    FUNDS_HISTORY_TYPES,
    toFundsResponse,
    toHistoryResponse,
    toTradeResponse,
    type FundsResponseModel
} from '@/models/history';
import { getRequestContext } from '@/middleware/authenticate';
import { errorResponse } from '@/middleware/response';
import { AppError } from '@/errors/app-error';
import { ERC20_BLOCKCHAIN_TYPE } from '@/constants';
import logger from '@/lib/logger';

export interface HistoryControllerDependencies {
    accounts: AccountClient;
    history: HistoryClient;
    assets: AssetsClient;
    explorers: ExplorerLinkProvider;
}

const INVALID_DATE_RANGE = 'fromDt value should be less than toDt value';

export class HistoryController {
    constructor(private readonly deps: HistoryControllerDependencies) {}

    getByWalletId = async (req: Request, res: Response): Promise<void> => {
        const { id: requestId } = req;

        try {
            const { clientId } = getRequestContext(req);
            const parsed = walletHistoryQuerySchema.safeParse(req.query);

            if (!parsed.success) {
                res.status(StatusCodes.BAD_REQUEST).json(
                    errorResponse({ message: 'Validation failed', details: parsed.error.issues })
                );
                return;
            }

            const walletId = await this.resolveHistoryWalletId(String(req.params.walletId), clientId);
            if (!walletId) {
                res.status(StatusCodes.NOT_FOUND).json(errorResponse('Wallet not found'));
                return;
            }

            const { operationType, assetId, assetPairId, take, skip } = parsed.data;
            logger.info('Fetching wallet history', { requestId, walletId, operationType, take, skip });

            const items = await this.deps.history.getHistoryByWallet(walletId, {
                types: operationType,
                assetId,
                assetPairId,
                offset: skip,
                limit: take
            });

            res.status(StatusCodes.OK).json(items.map(toHistoryResponse));

        } catch (error: unknown) {
            this.fail(res, requestId, 'Error fetching wallet history', error);
        }
    };

    getTradesByWalletId = async (req: Request, res: Response): Promise<void> => {
        const { id: requestId } = req;

        try {
            const { clientId } = getRequestContext(req);
            const parsed = tradesQuerySchema.safeParse(req.query);

            if (!parsed.success) {
                res.status(StatusCodes.BAD_REQUEST).json(
                    errorResponse({ message: 'Validation failed', details: parsed.error.issues })
                );
                return;
            }

            const { assetPairId, tradeType, take, skip, from, to } = parsed.data;
            if (!isValidDateRange(from, to)) {
                res.status(StatusCodes.BAD_REQUEST).json(errorResponse(INVALID_DATE_RANGE));
                return;
            }

            const walletId = await this.resolveHistoryWalletId(String(req.params.walletId), clientId);
            if (!walletId) {
                res.status(StatusCodes.NOT_FOUND).json(errorResponse('Wallet not found'));
                return;
            }

            logger.info('Fetching trades', { requestId, walletId, assetPairId, tradeType, take, skip });

            const trades = await this.deps.history.getTradesByWallet(walletId, {
                assetPairId,
                tradeType,
                offset: skip,
                limit: take,
                from,
                to
            });

            res.status(StatusCodes.OK).json(trades.map(toTradeResponse).sort(byTimestampDesc));

        } catch (error: unknown) {
            this.fail(res, requestId, 'Error fetching trades', error);
        }
    };

    getFundsByWalletId = async (req: Request, res: Response): Promise<void> => {
        const { id: requestId } = req;

        try {
            const { clientId } = getRequestContext(req);
            const parsed = fundsQuerySchema.safeParse(req.query);

            if (!parsed.success) {
                res.status(StatusCodes.BAD_REQUEST).json(
                    errorResponse({ message: 'Validation failed', details: parsed.error.issues })
                );
                return;
            }

            const { assetId, take, skip, from, to } = parsed.data;
            if (!isValidDateRange(from, to)) {
                res.status(StatusCodes.BAD_REQUEST).json(errorResponse(INVALID_DATE_RANGE));
                return;
            }

            const walletId = await this.resolveHistoryWalletId(String(req.params.walletId), clientId);
            if (!walletId) {
                res.status(StatusCodes.NOT_FOUND).json(errorResponse('Wallet not found'));
                return;
            }

            const operations = parsed.data.operation.length > 0 ? parsed.data.operation : [...FUNDS_OPERATIONS];
            logger.info('Fetching funds history', { requestId, walletId, operations, take, skip });

            const items = await this.deps.history.getHistoryByWallet(walletId, {
                types: operations.map((op) => FUNDS_HISTORY_TYPES[op]),
                assetId,
                offset: skip,
                limit: take,
                from,
                to
            });

            const funds = items
                .map(toFundsResponse)
                .filter((item): item is FundsResponseModel => item !== null)
                .sort(byTimestampDesc);

            res.status(StatusCodes.OK).json(funds);

        } catch (error: unknown) {
            this.fail(res, requestId, 'Error fetching funds history', error);
        }
    };

    getExplorerLinks = async (req: Request, res: Response): Promise<void> => {
        const { id: requestId } = req;

        try {
            const assetId = String(req.params.assetId).trim();
            const transactionHash = String(req.params.transactionHash).trim();

            if (!assetId) {
                res.status(StatusCodes.BAD_REQUEST).json(errorResponse('assetId should not be empty'));
                return;
            }
            if (!transactionHash) {
                res.status(StatusCodes.BAD_REQUEST).json(errorResponse('transactionHash should not be empty'));
                return;
            }

            const asset = await this.deps.assets.getAsset(assetId);
            if (!asset) {
                res.status(StatusCodes.BAD_REQUEST).json(errorResponse('assetId should exist'));
                return;
            }

            const blockchainType = asset.blockchainIntegrationLayerId
                || (asset.type === 'Erc20Token' ? ERC20_BLOCKCHAIN_TYPE : null);

            if (!blockchainType) {
                res.status(StatusCodes.NO_CONTENT).end();
                return;
            }

            logger.debug('Fetching explorer links', { requestId, assetId, blockchainType });

            const links = await this.deps.explorers.getLinks(blockchainType, transactionHash);
            res.status(StatusCodes.OK).json({
                links: links.map((link) => ({ name: link.name, url: link.urlFormatted }))
            });

        } catch (error: unknown) {
            this.fail(res, requestId, 'Error fetching explorer links', error);
        }
    };

    /**
     * Checks the wallet belongs to the caller and returns the id its history
     * is stored under downstream: trading wallets are keyed by the client id.
     */
    private async resolveHistoryWalletId(walletId: string, clientId: string): Promise<string | null> {
        const wallet = await this.deps.accounts.getWallet(walletId);

        if (!wallet || wallet.clientId !== clientId) return null;

        return wallet.type === 'Trading' ? clientId : walletId;
    }

    private fail(res: Response, requestId: string, message: string, error: unknown): void {
        const status = error instanceof AppError ? error.statusCode : StatusCodes.INTERNAL_SERVER_ERROR;
        const text = error instanceof Error ? error.message : 'Internal Server Error';
        logger.error(message, { requestId, error: text });
        res.status(status).json(errorResponse(text));
    }
}
